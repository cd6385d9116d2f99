/**
 * src/shared/security/pbkdf2/constant-time.ts
 *
 * Fixed-time equality for key material. The length check may short-circuit:
 * hash length comes from the record and is not secret.
 */

import { timingSafeEqual } from 'node:crypto';

export function fixedTimeEquals(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
