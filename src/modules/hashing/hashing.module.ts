/**
 * src/modules/hashing/hashing.module.ts
 *
 * WHY:
 * - Encapsulates Hashing module wiring.
 * - DI creates the hasher; the module composes service + controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Pbkdf2PasswordHasher } from '../../shared/security/pbkdf2';

import { HashingController } from './hashing.controller';
import { HashingService } from './hashing.service';
import { registerHashingRoutes } from './hashing.routes';

export type HashingModule = ReturnType<typeof createHashingModule>;

export function createHashingModule(deps: {
  passwordHasher: Pbkdf2PasswordHasher;
  logger: Logger;
  maxRequestIterations: number;
}) {
  const hashingService = new HashingService({
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    maxRequestIterations: deps.maxRequestIterations,
  });

  const controller = new HashingController(hashingService);

  return {
    hashingService,
    registerRoutes(app: FastifyInstance) {
      registerHashingRoutes(app, controller);
    },
  };
}
