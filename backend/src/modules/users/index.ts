/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export { InMemIdentityStore } from './dal/inmem-identity-store';
export type { IdentityStore } from './dal/identity-store';
export type { UserService } from './user.service';
export type { UserRecord, UserResponse } from './user.types';
