/**
 * src/shared/security/pbkdf2/pbkdf2-record.ts
 *
 * WHY:
 * - Canonical encode/decode of `pbkdf2_sha256$<iterations>$<salt>$<hash>`.
 * - The verifier must reject anything that is not exactly this shape.
 *
 * PARSING (strict):
 * - Split the whole record on `$` -> exactly 4 fields, none empty, first is the tag.
 *   A positional parse that tolerates `pbkdf2_sha256$1$$AAAA` is NOT accepted.
 * - Iterations: 1-10 ASCII digits, 0 < n <= MAX_ITERATIONS.
 * - Salt/hash: standard alphabet, padded, canonical (re-encodes to the same text).
 *   Buffer.from(s, 'base64') alone silently skips bad characters, hence the checks.
 *
 * OWNERSHIP:
 * - parseRecord returns fresh buffers. The caller wipes them.
 */

import {
  ALGORITHM_TAG,
  FIELD_SEPARATOR,
  MAX_ITERATIONS,
  MAX_ITERATION_DIGITS,
} from './pbkdf2.constants';
import { wipe } from './secure-buffer';

export type ParsedRecord = {
  iterations: number;
  salt: Buffer;
  hash: Buffer;
};

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const ITERATIONS_PATTERN = new RegExp(`^[0-9]{1,${MAX_ITERATION_DIGITS}}$`);

export function formatRecord(iterations: number, salt: Uint8Array, hash: Uint8Array): string {
  const saltB64 = Buffer.from(salt.buffer, salt.byteOffset, salt.byteLength).toString('base64');
  const hashB64 = Buffer.from(hash.buffer, hash.byteOffset, hash.byteLength).toString('base64');

  return [ALGORITHM_TAG, String(iterations), saltB64, hashB64].join(FIELD_SEPARATOR);
}

export function parseIterations(text: string): number | null {
  if (!ITERATIONS_PATTERN.test(text)) return null;

  const n = Number(text);
  if (n <= 0 || n > MAX_ITERATIONS) return null;
  return n;
}

/** Strict standard Base64 -> bytes, or null. Empty payloads are rejected. */
export function decodeBase64Strict(text: string): Buffer | null {
  if (text.length === 0 || text.length % 4 !== 0) return null;
  if (!BASE64_PATTERN.test(text)) return null;

  const bytes = Buffer.from(text, 'base64');
  if (bytes.length === 0 || bytes.toString('base64') !== text) {
    wipe(bytes);
    return null;
  }
  return bytes;
}

export function parseRecord(record: string): ParsedRecord | null {
  const fields = record.split(FIELD_SEPARATOR);
  if (fields.length !== 4) return null;

  const [tag, iterationsText, saltB64, hashB64] = fields;
  if (tag !== ALGORITHM_TAG) return null;
  if (!iterationsText || !saltB64 || !hashB64) return null;

  const iterations = parseIterations(iterationsText);
  if (iterations === null) return null;

  const salt = decodeBase64Strict(saltB64);
  if (!salt) return null;

  const hash = decodeBase64Strict(hashB64);
  if (!hash) {
    wipe(salt);
    return null;
  }

  return { iterations, salt, hash };
}
