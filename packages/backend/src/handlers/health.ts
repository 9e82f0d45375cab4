/**
 * @description: Reports liveness and the entity extraction strategy chosen at startup.
 * @groundcheck-scope: backend
 * @groundcheck-module: HealthHandler
 * @groundcheck-risk: low - Health output affects monitoring, not scoring.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ExtractionStrategyName } from 'validation-core';
import { sendJson } from '../utils/http.js';
import type { LogRequest } from '../utils/requestLogger.js';

type HealthHandlerDeps = {
  extractionStrategy: ExtractionStrategyName;
  storeAvailable: boolean;
  logRequest: LogRequest;
};

// --- Handler factory ---
const createHealthHandler = ({ extractionStrategy, storeAvailable, logRequest }: HealthHandlerDeps) =>
  (req: IncomingMessage, res: ServerResponse): void => {
    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method not allowed' }, { Allow: 'GET' });
      logRequest(req, res, 'health method-not-allowed');
      return;
    }

    sendJson(res, 200, {
      status: 'ok',
      extractionStrategy,
      store: storeAvailable ? 'ok' : 'unavailable'
    });
    logRequest(req, res, `health strategy=${extractionStrategy}`);
  };

export { createHealthHandler };
