/**
 * backend/src/shared/security/placeholder-password-hasher.ts
 *
 * WHY:
 * - Users live in memory only and nothing authenticates against the stored digest,
 *   so the digest is an opaque marker, not a real hash.
 *
 * SECURITY:
 * - NOT a password hash. Swap for a real PasswordHasher in di.ts before any
 *   login flow reads the digest.
 */

import type { PasswordHasher } from './password-hasher';

export class PlaceholderPasswordHasher implements PasswordHasher {
  hash(plain: string): string {
    return `hashed_${plain}`;
  }
}
