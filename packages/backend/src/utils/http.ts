/**
 * @description: JSON response, body reading and client address helpers shared by the HTTP handlers.
 * @groundcheck-scope: utility
 * @groundcheck-module: HttpHelpers
 * @groundcheck-risk: moderate - Body limits here are the only guard against oversized payloads.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';

type JsonBodyResult =
  | { ok: true; value: unknown }
  | { ok: false; status: 400 | 413; error: string };

const sendJson = (
  res: ServerResponse,
  statusCode: number,
  payload: unknown,
  headers: Record<string, string> = {}
): void => {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Cache-Control', 'no-store');
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  res.end(JSON.stringify(payload));
};

/**
 * Reads and parses a JSON body, stopping as soon as it exceeds maxBytes.
 */
const readJsonBody = async (req: IncomingMessage, maxBytes: number): Promise<JsonBodyResult> => {
  // Reject early when the client announces an oversized body.
  const contentLength = Number(req.headers['content-length']);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    return { ok: false, status: 413, error: 'Payload too large' };
  }

  const chunks: Buffer[] = [];
  let received = 0;
  // Keep draining past the limit so the socket stays usable for the 413 reply.
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    received += buffer.length;
    if (received <= maxBytes) {
      chunks.push(buffer);
    }
  }
  if (received > maxBytes) {
    return { ok: false, status: 413, error: 'Payload too large' };
  }

  const body = Buffer.concat(chunks).toString('utf-8');
  if (!body.trim()) {
    return { ok: false, status: 400, error: 'Missing request body' };
  }

  try {
    const value: unknown = JSON.parse(body);
    return { ok: true, value };
  } catch {
    return { ok: false, status: 400, error: 'Invalid JSON body' };
  }
};

// --- Client IP parsing ---
const getClientIp = (req: IncomingMessage, trustProxy: boolean): string => {
  let clientIp = req.socket.remoteAddress || 'unknown';

  // Honor reverse proxy headers only when explicitly enabled.
  if (trustProxy) {
    const forwardedFor = req.headers['x-forwarded-for'];
    const first = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor?.split(',')[0];
    if (first?.trim()) {
      clientIp = first.trim();
    }
  }

  if (clientIp.startsWith('::ffff:')) {
    clientIp = clientIp.substring(7);
  }

  return clientIp;
};

export { getClientIp, readJsonBody, sendJson };
export type { JsonBodyResult };
