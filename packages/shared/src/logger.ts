/**
 * @groundcheck-module: Logger
 * @groundcheck-risk: low
 * @groundcheck-scope: utility
 *
 * @description: Winston-based logging utility with console and daily file transports, shared by every package.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break scoring.
 * Answers and source text pass through here, so the sanitizer trims and redacts them first.
 */

import fs from 'node:fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
const EMAIL_REGEX = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;
export const MAX_LOGGED_STRING_LENGTH = 500;

/**
 * Recursively redacts e-mail addresses and truncates long strings so answer
 * and source text cannot flood the logs.
 */
export function sanitizeLogData(value: unknown): unknown {
  if (typeof value === 'string') {
    const redacted = value.replace(EMAIL_REGEX, '[REDACTED_EMAIL]');
    if (redacted.length <= MAX_LOGGED_STRING_LENGTH) {
      return redacted;
    }
    const omitted = redacted.length - MAX_LOGGED_STRING_LENGTH;
    return `${redacted.slice(0, MAX_LOGGED_STRING_LENGTH)}... [truncated ${omitted} chars]`;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry));
  }

  if (value instanceof Error) {
    return value;
  }

  if (value && typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(entry);
    }
    return sanitized;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  // Extra args passed to logger.info/debug/etc.
  const splat = info[splatSymbol];
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item) => sanitizeLogData(item));
  }

  return info;
});

const logFormat = printf(({ level, message, timestamp, module }) => {
  const scope = typeof module === 'string' ? ` (${module})` : '';
  return `${String(timestamp)} [${level}]${scope}: ${String(message)}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

export const logger = createLogger({
  level: (process.env.LOG_LEVEL || 'debug').toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});
