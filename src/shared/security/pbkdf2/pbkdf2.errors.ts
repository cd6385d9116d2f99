/**
 * src/shared/security/pbkdf2/pbkdf2.errors.ts
 *
 * WHY:
 * - The engine has exactly two failure modes on the hash path.
 * - Verification never throws; a failed check is just `false`.
 *
 * RULES:
 * - Never put the secret (or any part of it) in a message or property.
 */

export class InvalidArgumentError extends Error {
  constructor(
    public readonly argument: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The KDF primitive could not produce output (e.g. requested length out of range).
 * Retrying with the same inputs cannot succeed.
 */
export class OperationFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OperationFailedError';
  }
}
