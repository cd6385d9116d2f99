/**
 * src/shared/security/pbkdf2/pbkdf2-password-hasher.ts
 *
 * WHY:
 * - Puts the PBKDF2 engine behind PasswordHasher so the rest of the app stays clean.
 * - Cost parameters are bound once (from config) instead of living in process-wide state.
 *
 * HOW TO USE:
 * - const hasher = new Pbkdf2PasswordHasher({ iterations: 300_000 })
 * - const record = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', record)
 *
 * NOTE:
 * - verify() always uses the cost stored in the record, so records hashed with an
 *   older iteration count keep verifying after the default changes.
 */

import type { PasswordHasher } from '../password-hasher';
import type { HashingParams } from './pbkdf2.constants';
import {
  hashSecret,
  resolveHashingParams,
  verifySecret,
  type FillRandom,
  type VerifyLimits,
} from './pbkdf2-hasher';

export type Pbkdf2PasswordHasherOptions = Partial<HashingParams> & {
  fillRandom?: FillRandom;
};

export class Pbkdf2PasswordHasher implements PasswordHasher {
  private readonly params: Readonly<HashingParams>;
  private readonly fillRandom?: FillRandom;

  constructor(opts: Pbkdf2PasswordHasherOptions = {}) {
    const { fillRandom, ...overrides } = opts;
    this.params = Object.freeze(resolveHashingParams(overrides));
    this.fillRandom = fillRandom;
  }

  get defaults(): Readonly<HashingParams> {
    return this.params;
  }

  async hash(plain: string, overrides?: Partial<HashingParams>): Promise<string> {
    const params = resolveHashingParams(overrides, this.params);
    return hashSecret(plain, params, { fillRandom: this.fillRandom });
  }

  async verify(plain: string, hash: string, limits?: VerifyLimits): Promise<boolean> {
    return verifySecret(plain, hash, limits);
  }
}
