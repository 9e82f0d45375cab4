/**
 * @description: Routes HTTP requests to the validation, record and health handlers.
 * @groundcheck-scope: core
 * @groundcheck-module: WebServer
 * @groundcheck-risk: high - Server failures block every answer from being scored.
 */
import http from 'node:http';
import type { ConfidenceRecordStore } from '@groundcheck/shared';
import type { ConfidencePipeline } from 'validation-core';
import { createHealthHandler } from './handlers/health.js';
import { createRecordHandler } from './handlers/records.js';
import { createValidateHandler } from './handlers/validate.js';
import type { SimpleRateLimiter } from './services/rateLimiter.js';
import { sendJson } from './utils/http.js';
import { logRequest as defaultLogRequest, type LogRequest } from './utils/requestLogger.js';

type ServerDeps = {
  pipeline: ConfidencePipeline;
  store: ConfidenceRecordStore | null;
  limiter: SimpleRateLimiter;
  maxBodyBytes: number;
  trustProxy: boolean;
  logRequest?: LogRequest;
  generateResponseId?: () => string;
};

const createServer = ({
  pipeline,
  store,
  limiter,
  maxBodyBytes,
  trustProxy,
  logRequest = defaultLogRequest,
  generateResponseId
}: ServerDeps): http.Server => {
  // --- Handler wiring ---
  const handleValidateRequest = createValidateHandler({
    pipeline,
    store,
    limiter,
    logRequest,
    maxBodyBytes,
    trustProxy,
    generateResponseId
  });
  const handleRecordRequest = createRecordHandler({ store, logRequest });
  const handleHealthRequest = createHealthHandler({
    extractionStrategy: pipeline.extractionStrategy,
    storeAvailable: store !== null,
    logRequest
  });

  // --- HTTP server ---
  return http.createServer(async (req, res) => {
    // --- Early request guard ---
    if (!req.url) {
      sendJson(res, 400, { error: 'Bad request' });
      return;
    }

    try {
      const parsedUrl = new URL(req.url, 'http://localhost');

      if (parsedUrl.pathname === '/api/validate') {
        await handleValidateRequest(req, res);
        return;
      }

      if (parsedUrl.pathname.startsWith('/records/') && parsedUrl.pathname.endsWith('.json')) {
        await handleRecordRequest(req, res, parsedUrl);
        return;
      }

      if (parsedUrl.pathname === '/healthz') {
        handleHealthRequest(req, res);
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
      logRequest(req, res);
    } catch (error) {
      sendJson(res, 500, { error: 'Internal server error' });
      logRequest(req, res, error instanceof Error ? error.message : 'unknown error');
    }
  });
};

export { createServer };
export type { ServerDeps };
