/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - One email = one user (exact match, enforced by the IdentityStore).
 *
 * RULES:
 * - UserRecord never leaves the module with its passwordHash: HTTP gets UserResponse.
 * - UserResponse is the wire shape (snake_case timestamps, ISO strings).
 */

export type UserId = string;

export type UserRecord = {
  id: UserId;
  email: string;
  passwordHash: string;

  createdAt: Date;
  updatedAt: Date;
};

export type UserResponse = {
  id: UserId;
  email: string;
  created_at: string;
  updated_at: string;
};

export type ListUsersResult = {
  users: UserResponse[];
  page: number;
  limit: number;
  total: number;
};
