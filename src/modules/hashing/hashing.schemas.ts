/**
 * src/modules/hashing/hashing.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Hashing module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Shape/type checks only. Blank-secret rejection belongs to the engine
 *   (InvalidArgumentError), so the rule lives in exactly one place.
 * - Verify accepts any strings: a malformed record is a `match: false`, not a 400.
 */

import { z } from 'zod';

/** Largest salt/hash a request may ask for, and the largest hash a verified record may carry. */
export const MAX_REQUEST_BYTES = 1024;

const byteLength = z.number().int().positive().max(MAX_REQUEST_BYTES);

export const hashRequestSchema = z.object({
  secret: z.string(),
  iterations: z.number().int().positive().optional(),
  saltBytes: byteLength.optional(),
  hashBytes: byteLength.optional(),
});

export type HashRequestInput = z.infer<typeof hashRequestSchema>;

export const verifyRequestSchema = z.object({
  secret: z.string(),
  record: z.string(),
});

export type VerifyRequestInput = z.infer<typeof verifyRequestSchema>;
