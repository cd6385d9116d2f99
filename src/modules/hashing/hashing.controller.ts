/**
 * src/modules/hashing/hashing.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and returns response.
 *
 * RULES:
 * - No hashing logic here.
 * - Validate with Zod and throw AppError.
 * - Zod issues are passed as meta only by path/code, never with the received values.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodIssue } from 'zod';
import { hashRequestSchema, verifyRequestSchema } from './hashing.schemas';
import { HashingErrors } from './hashing.errors';
import type { HashingService } from './hashing.service';

function summarizeIssues(issues: ZodIssue[]) {
  return issues.map((issue) => ({ path: issue.path.join('.'), code: issue.code }));
}

export class HashingController {
  constructor(private readonly hashingService: HashingService) {}

  async hash(req: FastifyRequest, reply: FastifyReply) {
    const parsed = hashRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw HashingErrors.invalidBody({ issues: summarizeIssues(parsed.error.issues) });
    }

    const result = await this.hashingService.hash({
      ...parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(result);
  }

  async verify(req: FastifyRequest, reply: FastifyReply) {
    const parsed = verifyRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      throw HashingErrors.invalidBody({ issues: summarizeIssues(parsed.error.issues) });
    }

    const result = await this.hashingService.verify({
      secret: parsed.data.secret,
      record: parsed.data.record,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }
}
