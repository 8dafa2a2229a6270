/**
 * backend/src/modules/users/dal/identity-store.ts
 *
 * WHY:
 * - The IdentityStore is the only shared mutable state in the service.
 * - Services depend on this capability, not on a concrete store, so a persistent
 *   implementation can replace the in-memory one without touching callers.
 *
 * CONTRACT:
 * - Every returned record is an independent copy. Mutating it never changes the store.
 * - create() checks email uniqueness and inserts as ONE exclusive step:
 *   two concurrent creates with the same email never both succeed.
 * - Readers may run concurrently with each other, never with a writer.
 * - list() on an out-of-range page returns no records and the true total.
 *
 * RULES:
 * - No AppError here (service maps outcomes to errors).
 * - No update/delete: users are immutable once created.
 */

import type { UserId, UserRecord } from '../user.types';

export type CreateUserRecordResult =
  | { status: 'CREATED'; record: UserRecord }
  | { status: 'EMAIL_TAKEN' };

export type UserRecordPage = {
  records: UserRecord[];
  total: number;
};

export interface IdentityStore {
  create(email: string, passwordHash: string): Promise<CreateUserRecordResult>;
  findById(id: UserId): Promise<UserRecord | undefined>;
  findByEmail(email: string): Promise<UserRecord | undefined>;
  existsByEmail(email: string): Promise<boolean>;

  /**
   * Offset pagination over insertion order.
   * page and limit are 1-based positive integers (callers clamp first).
   */
  list(page: number, limit: number): Promise<UserRecordPage>;

  /** Readiness probe: resolves true once a read section could be entered. */
  ping(): Promise<boolean>;
}
