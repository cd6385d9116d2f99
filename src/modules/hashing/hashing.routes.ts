/**
 * src/modules/hashing/hashing.routes.ts
 *
 * WHY:
 * - Declares Hashing module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * SECURITY:
 * - Secrets and records only in POST body (never URL/query).
 */

import type { FastifyInstance } from 'fastify';
import type { HashingController } from './hashing.controller';

export function registerHashingRoutes(app: FastifyInstance, controller: HashingController) {
  app.post('/hashes', controller.hash.bind(controller));
  app.post('/hashes/verify', controller.verify.bind(controller));
}
