/**
 * src/modules/hashing/hashing.service.ts
 *
 * WHY:
 * - Orchestrates hash/verify requests on top of the PBKDF2 hasher.
 * - Owns the per-request work caps (caller policy, not engine policy).
 *   POST /hashes rejects iterations above the cap with a 400.
 *   POST /hashes/verify answers `match: false` for a record above the cap,
 *   without deriving, so a hostile record cannot pin the worker pool.
 *
 * RULES:
 * - Never log the secret or the record. Iterations and timings are fine.
 * - verify() never throws for a bad record; the hasher already collapses it to false.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Pbkdf2PasswordHasher } from '../../shared/security/pbkdf2';
import { HashingErrors } from './hashing.errors';
import { MAX_REQUEST_BYTES } from './hashing.schemas';

export type HashSecretParams = {
  secret: string;
  iterations?: number;
  saltBytes?: number;
  hashBytes?: number;
  requestId: string;
};

export type HashSecretResult = {
  record: string;
};

export type VerifySecretParams = {
  secret: string;
  record: string;
  requestId: string;
};

export type VerifySecretResult = {
  match: boolean;
};

export class HashingService {
  constructor(
    private readonly deps: {
      passwordHasher: Pbkdf2PasswordHasher;
      logger: Logger;
      maxRequestIterations: number;
    },
  ) {}

  async hash(params: HashSecretParams): Promise<HashSecretResult> {
    const { iterations, saltBytes, hashBytes } = params;

    if (iterations !== undefined && iterations > this.deps.maxRequestIterations) {
      throw HashingErrors.iterationsAboveLimit(this.deps.maxRequestIterations);
    }

    const startedAt = performance.now();
    const record = await this.deps.passwordHasher.hash(params.secret, {
      iterations,
      saltBytes,
      hashBytes,
    });

    this.deps.logger.info('hashing.hash.done', {
      flow: 'hashing.hash',
      requestId: params.requestId,
      iterations: iterations ?? this.deps.passwordHasher.defaults.iterations,
      durationMs: Math.round(performance.now() - startedAt),
    });

    return { record };
  }

  async verify(params: VerifySecretParams): Promise<VerifySecretResult> {
    const startedAt = performance.now();
    const match = await this.deps.passwordHasher.verify(params.secret, params.record, {
      maxIterations: this.deps.maxRequestIterations,
      maxHashBytes: MAX_REQUEST_BYTES,
    });

    this.deps.logger.info('hashing.verify.done', {
      flow: 'hashing.verify',
      requestId: params.requestId,
      match,
      durationMs: Math.round(performance.now() - startedAt),
    });

    return { match };
  }
}
