/**
 * src/shared/security/pbkdf2/pbkdf2.constants.ts
 *
 * WHY:
 * - One place for the record tag and the default cost parameters.
 * - Defaults are frozen; callers override them explicitly (config / arguments).
 */

export const ALGORITHM_TAG = 'pbkdf2_sha256';
export const RECORD_PREFIX = `${ALGORITHM_TAG}$`;
export const FIELD_SEPARATOR = '$';

export const DIGEST = 'sha256';

// crypto.pbkdf2 rejects iteration counts above int32 max.
export const MAX_ITERATIONS = 2_147_483_647;
export const MAX_ITERATION_DIGITS = 10;

export type HashingParams = {
  iterations: number;
  saltBytes: number;
  hashBytes: number;
};

export const DEFAULT_HASHING_PARAMS: Readonly<HashingParams> = Object.freeze({
  iterations: 300_000,
  saltBytes: 16,
  hashBytes: 32,
});
