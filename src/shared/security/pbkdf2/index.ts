/**
 * src/shared/security/pbkdf2/index.ts
 *
 * WHY:
 * - Public surface of the PBKDF2 record engine.
 * - Callers import from here, never from the individual files.
 */

export {
  ALGORITHM_TAG,
  DEFAULT_HASHING_PARAMS,
  MAX_ITERATIONS,
  type HashingParams,
} from './pbkdf2.constants';
export { InvalidArgumentError, OperationFailedError } from './pbkdf2.errors';
export { formatRecord, parseRecord, type ParsedRecord } from './pbkdf2-record';
export {
  hashSecret,
  hashSecretSync,
  verifySecret,
  verifySecretSync,
  resolveHashingParams,
  type FillRandom,
  type VerifyLimits,
} from './pbkdf2-hasher';
export { Pbkdf2PasswordHasher, type Pbkdf2PasswordHasherOptions } from './pbkdf2-password-hasher';
