/**
 * @description: Provides structured request logging for backend endpoints.
 * @groundcheck-scope: utility
 * @groundcheck-module: RequestLogger
 * @groundcheck-risk: low - Logging failures reduce observability but do not block requests.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { logger } from '@groundcheck/shared';

const httpLogger = logger.child({ module: 'http' });

type LogRequest = (req: IncomingMessage, res: ServerResponse, extra?: string) => void;

/**
 * One line per request. Query strings are dropped; bodies are never logged.
 */
const logRequest: LogRequest = (req, res, extra = '') => {
  let logPath = req.url || '';
  try {
    logPath = new URL(logPath, 'http://localhost').pathname;
  } catch {
    logPath = logPath.split('?')[0];
  }

  const line = `${req.method} ${logPath} -> ${res.statusCode} ${extra}`.trim();
  if (res.statusCode >= 500) {
    httpLogger.error(line);
  } else {
    httpLogger.info(line);
  }
};

export { logRequest };
export type { LogRequest };
