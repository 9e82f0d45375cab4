/**
 * @description: Handles answer validation requests: scores the answer, composes the user-facing reply and stores the record.
 * @groundcheck-scope: backend
 * @groundcheck-module: ValidateHandler
 * @groundcheck-risk: high - This endpoint decides whether an answer is refused, qualified or delivered.
 */
import { randomUUID } from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { logger, type ConfidenceRecordStore } from '@groundcheck/shared';
import { ValidationInputError, type ConfidencePipeline, type ConfidenceRecord } from 'validation-core';
import type { SimpleRateLimiter } from '../services/rateLimiter.js';
import { composeResponse } from '../services/responseComposer.js';
import { getClientIp, readJsonBody, sendJson } from '../utils/http.js';
import type { LogRequest } from '../utils/requestLogger.js';

const validateLogger = logger.child({ module: 'validateHandler' });

type ValidateHandlerDeps = {
  pipeline: ConfidencePipeline;
  store: ConfidenceRecordStore | null;
  limiter: SimpleRateLimiter;
  logRequest: LogRequest;
  maxBodyBytes: number;
  trustProxy: boolean;
  generateResponseId?: () => string;
};

const RESPONSE_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

// Only the envelope is checked here; the pipeline validates the answer text and context bundle.
const ValidateRequestSchema = z.object({
  answer: z.string(),
  reasoning: z.string().nullable().optional(),
  context: z.unknown(),
  responseId: z
    .string()
    .regex(RESPONSE_ID_PATTERN, 'responseId must be 1-128 letters, digits, "-" or "_"')
    .optional()
});

// --- Handler factory ---
const createValidateHandler = ({
  pipeline,
  store,
  limiter,
  logRequest,
  maxBodyBytes,
  trustProxy,
  generateResponseId = randomUUID
}: ValidateHandlerDeps) =>
  async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    try {
      if (req.method !== 'POST') {
        sendJson(res, 405, { error: 'Method not allowed' }, { Allow: 'POST' });
        logRequest(req, res, 'validate method-not-allowed');
        return;
      }

      // --- Rate limiting ---
      const rateLimitResult = limiter.check(getClientIp(req, trustProxy));
      if (!rateLimitResult.allowed) {
        sendJson(
          res,
          429,
          { error: 'Too many validation requests', retryAfter: rateLimitResult.retryAfter },
          { 'Retry-After': rateLimitResult.retryAfter.toString() }
        );
        logRequest(req, res, 'validate rate-limited');
        return;
      }

      // --- Body parsing ---
      const body = await readJsonBody(req, maxBodyBytes);
      if (!body.ok) {
        sendJson(res, body.status, { error: body.error });
        logRequest(req, res, `validate ${body.error.toLowerCase()}`);
        return;
      }

      const envelope = ValidateRequestSchema.safeParse(body.value);
      if (!envelope.success) {
        const issues = envelope.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
        sendJson(res, 400, { error: 'Invalid request', issues });
        logRequest(req, res, 'validate invalid-request');
        return;
      }

      // --- Scoring ---
      const { answer, reasoning, context } = envelope.data;
      let record: ConfidenceRecord;
      try {
        record = pipeline.evaluate(answer, reasoning ?? null, context);
      } catch (error) {
        if (error instanceof ValidationInputError) {
          sendJson(res, 400, { error: 'Invalid evaluation input', issues: error.issues });
          logRequest(req, res, 'validate invalid-input');
          return;
        }
        throw error;
      }

      const composed = composeResponse(answer, record);
      const responseId = envelope.data.responseId ?? generateResponseId();

      // --- Persistence ---
      // A storage failure loses the audit copy, not the response.
      if (store) {
        try {
          await store.upsert(responseId, record);
        } catch (error) {
          validateLogger.error(
            `Failed to store confidence record "${responseId}": ${error instanceof Error ? error.message : String(error)}`
          );
        }
      } else {
        validateLogger.warn(`Confidence store unavailable; record "${responseId}" was not persisted.`);
      }

      sendJson(res, 200, { responseId, state: composed.state, content: composed.content, record });
      logRequest(
        req,
        res,
        `validate ${composed.state.toLowerCase()} confidence=${record.confidenceFinal} risk=${record.riskLevel}`
      );
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'unknown error';
      validateLogger.error(`Validation request failed: ${errorMessage}`);
      sendJson(res, 500, { error: 'Internal server error' });
      logRequest(req, res, `validate error ${errorMessage}`);
    }
  };

export { createValidateHandler };
export type { ValidateHandlerDeps };
