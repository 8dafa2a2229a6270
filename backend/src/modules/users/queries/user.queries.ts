/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape store records into the UserResponse wire type.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 * - passwordHash never appears in a UserResponse.
 */

import type { IdentityStore } from '../dal/identity-store';
import type { UserId, UserRecord, UserResponse } from '../user.types';

export function toUserResponse(record: UserRecord): UserResponse {
  return {
    id: record.id,
    email: record.email,
    created_at: record.createdAt.toISOString(),
    updated_at: record.updatedAt.toISOString(),
  };
}

export async function getUserById(
  store: IdentityStore,
  userId: UserId,
): Promise<UserResponse | undefined> {
  const record = await store.findById(userId);
  if (!record) return undefined;
  return toUserResponse(record);
}

export async function getUserPage(
  store: IdentityStore,
  params: { page: number; limit: number },
): Promise<{ users: UserResponse[]; total: number }> {
  const { records, total } = await store.list(params.page, params.limit);
  return { users: records.map(toUserResponse), total };
}
