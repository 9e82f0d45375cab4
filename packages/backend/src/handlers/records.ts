/**
 * @description: Serves stored confidence records so clients can show why an answer scored as it did.
 * @groundcheck-scope: backend
 * @groundcheck-module: RecordHandlers
 * @groundcheck-risk: moderate - Serving the wrong record would misexplain a response.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { logger, type ConfidenceRecordStore } from '@groundcheck/shared';
import { sendJson } from '../utils/http.js';
import type { LogRequest } from '../utils/requestLogger.js';

const recordsLogger = logger.child({ module: 'recordHandlers' });

type RecordHandlerDeps = {
  store: ConfidenceRecordStore | null;
  logRequest: LogRequest;
};

const RECORD_PATH = /^\/records\/([A-Za-z0-9_-]{1,128})\.json$/;

// --- Handler factory ---
const createRecordHandler = ({ store, logRequest }: RecordHandlerDeps) =>
  async (req: IncomingMessage, res: ServerResponse, parsedUrl: URL): Promise<void> => {
    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method not allowed' }, { Allow: 'GET' });
      logRequest(req, res, 'record method-not-allowed');
      return;
    }

    // Expect /records/{id}.json.
    const pathMatch = parsedUrl.pathname.match(RECORD_PATH);
    if (!pathMatch) {
      sendJson(res, 400, { error: 'Invalid record request format' });
      logRequest(req, res, 'record invalid-format');
      return;
    }
    const responseId = pathMatch[1];

    if (!store) {
      sendJson(res, 503, { error: 'Confidence store unavailable' });
      logRequest(req, res, 'record store-unavailable');
      return;
    }

    try {
      const record = await store.retrieve(responseId);
      if (!record) {
        sendJson(res, 404, { error: 'Record not found' });
        logRequest(req, res, 'record not-found');
        return;
      }

      sendJson(res, 200, record);
      logRequest(req, res, 'record success');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      recordsLogger.error(`Failed to retrieve confidence record "${responseId}": ${errorMessage}`);
      sendJson(res, 500, { error: 'Failed to read record' });
      logRequest(req, res, `record error ${errorMessage}`);
    }
  };

export { createRecordHandler };
