/**
 * src/modules/hashing/hashing.errors.ts
 *
 * Hashing module error factories. Never include secrets or records in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const HashingErrors = {
  invalidBody(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta);
  },

  /** Client asked for more iterations than this deployment allows per request. */
  iterationsAboveLimit(max: number) {
    return AppError.validationError(`iterations must not exceed ${max}`, { max });
  },
} as const;
