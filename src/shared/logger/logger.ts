/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the record service (service + env on every line).
 * - Secrets, records and derived hashes must never reach a log sink, even when a
 *   call site forgets: the `redactSensitive` format runs before serialization.
 *
 * HOW TO USE:
 * - Inside request handlers use `withRequestContext(req)` so lines carry requestId.
 * - Pass errors as `{ err }` or message/stack fields, not bare Error objects.
 * - Log iterations, lengths, match and timings. Never the inputs or outputs of the KDF.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'pbkdf2-record-service';
const level = process.env.LOG_LEVEL ?? 'info';

export const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set(['secret', 'password', 'record', 'hash', 'token']);

/** Shallow copy of a meta object with sensitive keys masked. */
export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_KEYS.has(k) ? REDACTED : v;
  }
  return out;
}

export const redactSensitive = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_KEYS.has(key)) info[key] = REDACTED;
  }
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSensitive(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
