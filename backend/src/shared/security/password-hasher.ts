/**
 * backend/src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Services depend on an interface (DIP), not on a hashing algorithm.
 * - The composition root decides which implementation is wired in.
 */

export interface PasswordHasher {
  hash(plain: string): string;
}
