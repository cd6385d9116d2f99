/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 */

import Fastify from 'fastify';

import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerErrorHandler } from '../shared/http/error-handler';

// Secrets are short; 64 KiB leaves room for long passphrases without inviting huge bodies.
const BODY_LIMIT_BYTES = 64 * 1024;

export function buildServer() {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: BODY_LIMIT_BYTES,
  });

  registerRequestContext(app);
  registerErrorHandler(app);

  // Basic request logging (method + url only; bodies carry secrets)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.debug('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
    });
    done();
  });

  return app;
}
