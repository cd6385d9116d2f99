/**
 * src/shared/security/pbkdf2/pbkdf2-hasher.ts
 *
 * WHY:
 * - Hash-and-verify engine for PBKDF2-HMAC-SHA256 records.
 * - Sync variants run the KDF on the calling thread (scripts, tests).
 * - Async variants run it on the libuv pool via crypto.pbkdf2, which is what
 *   request handlers should use (default cost is tens of ms of CPU per call).
 *
 * RULES:
 * - hash*: throws InvalidArgumentError / OperationFailedError, nothing else.
 * - verify*: total. Malformed record, wrong secret, a record over the caller's
 *   VerifyLimits and primitive faults all give `false`.
 * - Every buffer holding secret bytes or key material is wiped in a scope guard.
 * - Never log here.
 */

import { pbkdf2, pbkdf2Sync, randomFillSync } from 'node:crypto';
import { promisify } from 'node:util';

import {
  DEFAULT_HASHING_PARAMS,
  DIGEST,
  MAX_ITERATIONS,
  RECORD_PREFIX,
  type HashingParams,
} from './pbkdf2.constants';
import { InvalidArgumentError, OperationFailedError } from './pbkdf2.errors';
import { formatRecord, parseRecord } from './pbkdf2-record';
import { fixedTimeEquals } from './constant-time';
import { encodeSecret, wipe, withWiped, withWipedAsync } from './secure-buffer';

const pbkdf2Async = promisify(pbkdf2);

export type FillRandom = (buf: Buffer) => void;

export type HashOptions = {
  /** Source of salt bytes. Defaults to crypto.randomFillSync. */
  fillRandom?: FillRandom;
};

/**
 * Work ceilings for records that come from untrusted callers.
 * A record above either limit verifies `false` without running the KDF.
 */
export type VerifyLimits = {
  maxIterations?: number;
  maxHashBytes?: number;
};

const defaultFillRandom: FillRandom = (buf) => {
  randomFillSync(buf);
};

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

function assertPositiveInt(name: keyof HashingParams, value: number, max?: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidArgumentError(name, `${name} must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw new InvalidArgumentError(name, `${name} must not exceed ${max}`);
  }
}

/**
 * Merges overrides onto the defaults and validates the result.
 * Exported so adapters can validate bound defaults eagerly.
 */
export function resolveHashingParams(
  overrides: Partial<HashingParams> = {},
  base: Readonly<HashingParams> = DEFAULT_HASHING_PARAMS,
): HashingParams {
  const params: HashingParams = {
    iterations: overrides.iterations ?? base.iterations,
    saltBytes: overrides.saltBytes ?? base.saltBytes,
    hashBytes: overrides.hashBytes ?? base.hashBytes,
  };

  assertPositiveInt('iterations', params.iterations, MAX_ITERATIONS);
  assertPositiveInt('saltBytes', params.saltBytes);
  assertPositiveInt('hashBytes', params.hashBytes);

  return params;
}

function assertSecret(secret: unknown): asserts secret is string {
  if (isBlank(secret)) {
    throw new InvalidArgumentError('secret', 'secret must not be empty or whitespace');
  }
}

function toOperationFailed(step: string, err: unknown): OperationFailedError {
  const detail = err instanceof Error ? err.message : String(err);
  return new OperationFailedError(`${step} failed: ${detail}`, { cause: err });
}

// Allocation (oversized saltBytes) and the random source can both fault.
function newSalt(size: number, fillRandom: FillRandom): Buffer {
  let salt: Buffer;
  try {
    salt = Buffer.alloc(size);
  } catch (err) {
    throw toOperationFailed('salt allocation', err);
  }

  try {
    fillRandom(salt);
  } catch (err) {
    wipe(salt);
    throw toOperationFailed('salt generation', err);
  }
  return salt;
}

function exceedsLimits(iterations: number, hashBytes: number, limits: VerifyLimits): boolean {
  if (limits.maxIterations !== undefined && iterations > limits.maxIterations) return true;
  if (limits.maxHashBytes !== undefined && hashBytes > limits.maxHashBytes) return true;
  return false;
}

// ─────────────────────────────────────────────────────────────────────────────
// Hash
// ─────────────────────────────────────────────────────────────────────────────

export function hashSecretSync(
  secret: string,
  overrides?: Partial<HashingParams>,
  options: HashOptions = {},
): string {
  assertSecret(secret);
  const { iterations, saltBytes, hashBytes } = resolveHashingParams(overrides);

  const salt = newSalt(saltBytes, options.fillRandom ?? defaultFillRandom);
  const secretBytes = encodeSecret(secret);

  return withWiped([secretBytes, salt], () => {
    let key: Buffer;
    try {
      key = pbkdf2Sync(secretBytes, salt, iterations, hashBytes, DIGEST);
    } catch (err) {
      throw toOperationFailed('pbkdf2 derivation', err);
    }

    return withWiped([key], () => formatRecord(iterations, salt, key));
  });
}

export async function hashSecret(
  secret: string,
  overrides?: Partial<HashingParams>,
  options: HashOptions = {},
): Promise<string> {
  assertSecret(secret);
  const { iterations, saltBytes, hashBytes } = resolveHashingParams(overrides);

  const salt = newSalt(saltBytes, options.fillRandom ?? defaultFillRandom);
  const secretBytes = encodeSecret(secret);

  return withWipedAsync([secretBytes, salt], async () => {
    let key: Buffer;
    try {
      key = await pbkdf2Async(secretBytes, salt, iterations, hashBytes, DIGEST);
    } catch (err) {
      throw toOperationFailed('pbkdf2 derivation', err);
    }

    return withWiped([key], () => formatRecord(iterations, salt, key));
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Verify
// ─────────────────────────────────────────────────────────────────────────────

export function verifySecretSync(
  secret: string,
  record: string,
  limits: VerifyLimits = {},
): boolean {
  if (isBlank(secret) || isBlank(record)) return false;
  if (!record.startsWith(RECORD_PREFIX)) return false;

  const parsed = parseRecord(record);
  if (!parsed) return false;

  const { iterations, salt, hash: expected } = parsed;
  if (exceedsLimits(iterations, expected.length, limits)) {
    wipe(salt, expected);
    return false;
  }

  const secretBytes = encodeSecret(secret);

  return withWiped([secretBytes, salt, expected], () => {
    let candidate: Buffer;
    try {
      candidate = pbkdf2Sync(secretBytes, salt, iterations, expected.length, DIGEST);
    } catch {
      return false;
    }

    return withWiped([candidate], () => fixedTimeEquals(candidate, expected));
  });
}

export async function verifySecret(
  secret: string,
  record: string,
  limits: VerifyLimits = {},
): Promise<boolean> {
  if (isBlank(secret) || isBlank(record)) return false;
  if (!record.startsWith(RECORD_PREFIX)) return false;

  const parsed = parseRecord(record);
  if (!parsed) return false;

  const { iterations, salt, hash: expected } = parsed;
  if (exceedsLimits(iterations, expected.length, limits)) {
    wipe(salt, expected);
    return false;
  }

  const secretBytes = encodeSecret(secret);

  return withWipedAsync([secretBytes, salt, expected], async () => {
    let candidate: Buffer;
    try {
      candidate = await pbkdf2Async(secretBytes, salt, iterations, expected.length, DIGEST);
    } catch {
      return false;
    }

    return withWiped([candidate], () => fixedTimeEquals(candidate, expected));
  });
}
