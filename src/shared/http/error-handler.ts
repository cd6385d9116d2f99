/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError or the engine errors.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces, causes) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - InvalidArgumentError → 400 (caller passed a blank secret / bad parameter).
 * - OperationFailedError → 500 (KDF primitive fault).
 * - Fastify body errors (bad JSON, too large) → their own 4xx status.
 * - Unexpected errors → 500 with generic message.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 * - Log with withRequestContext(req) so requestId is on every line.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply, FastifyError } from 'fastify';
import { AppError } from './errors';
import { InvalidArgumentError, OperationFailedError } from '../security/pbkdf2';
import { redactMeta } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function isClientFastifyError(err: FastifyError): boolean {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Engine precondition failures
    if (err instanceof InvalidArgumentError) {
      log.warn('invalid_argument', { flow: 'http.error', argument: err.argument });

      return reply.status(400).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 3) KDF primitive faults
    if (err instanceof OperationFailedError) {
      const internal = AppError.internal('Hashing failed');
      log.error('operation_failed', {
        flow: 'http.error',
        message: err.message,
        stack: err.stack,
      });

      return reply.status(internal.status).send(buildResponse(internal.code, internal.message));
    }

    // 4) Fastify's own client errors (malformed JSON, body too large, ...)
    if (isClientFastifyError(err)) {
      log.warn('request_error', { flow: 'http.error', code: err.code, status: err.statusCode });

      return reply
        .status(err.statusCode ?? 400)
        .send(buildResponse('VALIDATION_ERROR', 'Invalid request'));
    }

    // 5) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    const err = AppError.notFound('Route not found');
    withRequestContext(req).warn('not_found', { flow: 'http.error' });

    return reply.status(err.status).send(buildResponse(err.code, err.message));
  });
}
