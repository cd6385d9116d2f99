/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services depend on this interface, not on the KDF directly.
 *
 * HOW TO USE:
 * - const record = await hasher.hash(secret)
 * - const ok = await hasher.verify(secret, record)
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
