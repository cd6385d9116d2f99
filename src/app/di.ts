/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Keeps modules testable (tests can inject a cheaper hasher).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves.
 */

import type { AppConfig } from './config';

import { Pbkdf2PasswordHasher } from '../shared/security/pbkdf2';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createHashingModule } from '../modules/hashing/hashing.module';
import type { HashingModule } from '../modules/hashing/hashing.module';

export type AppDeps = {
  logger: Logger;
  passwordHasher: Pbkdf2PasswordHasher;

  // modules
  hashing: HashingModule;
};

export function buildDeps(config: AppConfig, overrides: Partial<Pick<AppDeps, 'passwordHasher'>> = {}): AppDeps {
  const passwordHasher =
    overrides.passwordHasher ??
    new Pbkdf2PasswordHasher({
      iterations: config.hashing.iterations,
      saltBytes: config.hashing.saltBytes,
      hashBytes: config.hashing.hashBytes,
    });

  const hashing = createHashingModule({
    passwordHasher,
    logger,
    maxRequestIterations: config.hashing.maxRequestIterations,
  });

  return {
    logger,
    passwordHasher,
    hashing,
  };
}
