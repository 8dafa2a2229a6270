/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user creation and reads over the IdentityStore.
 * - Translates store outcomes into the module's error taxonomy (UserErrors).
 *
 * RULES:
 * - Input shape/format is validated by the controller (Zod) before we get here.
 *   This service only raises "already exists", "not found", "not implemented"
 *   and internal errors.
 * - Store faults are wrapped exactly once into an internal error. No retries.
 * - Never log raw passwords or digests.
 * - Update/delete are placeholders: they confirm the user exists, then refuse.
 *   They never touch the store.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import { AppError } from '../../shared/http/errors';

import type { IdentityStore } from './dal/identity-store';
import { getUserById, getUserPage, toUserResponse } from './queries/user.queries';
import { resolveListPagination } from './policies/list-pagination.policy';
import { UserErrors } from './user.errors';
import type { ListUsersResult, UserId, UserResponse } from './user.types';

export type CreateUserParams = {
  email: string;
  password: string;
  correlationId: string;
};

export type ListUsersParams = {
  page?: number;
  limit?: number;
};

export class UserService {
  constructor(
    private readonly deps: {
      store: IdentityStore;
      passwordHasher: PasswordHasher;
      logger: Logger;
    },
  ) {}

  async createUser(params: CreateUserParams): Promise<UserResponse> {
    const passwordHash = this.deps.passwordHasher.hash(params.password);

    const result = await this.guard('Failed to create user', () =>
      this.deps.store.create(params.email, passwordHash),
    );

    if (result.status === 'EMAIL_TAKEN') {
      this.deps.logger.info('users.create.email_taken', {
        flow: 'users.create',
        correlationId: params.correlationId,
      });
      throw UserErrors.emailAlreadyExists();
    }

    this.deps.logger.info('users.create.success', {
      flow: 'users.create',
      correlationId: params.correlationId,
      userId: result.record.id,
    });

    return toUserResponse(result.record);
  }

  async getUserById(userId: UserId): Promise<UserResponse | undefined> {
    return this.guard('Failed to retrieve user', () => getUserById(this.deps.store, userId));
  }

  async listUsers(params: ListUsersParams): Promise<ListUsersResult> {
    const { page, limit } = resolveListPagination(params);

    const { users, total } = await this.guard('Failed to list users', () =>
      getUserPage(this.deps.store, { page, limit }),
    );

    return { users, page, limit, total };
  }

  async updateUser(userId: UserId): Promise<never> {
    const existing = await this.guard('Failed to update user', () =>
      getUserById(this.deps.store, userId),
    );

    if (!existing) throw UserErrors.userNotFound({ userId });
    throw UserErrors.updateNotImplemented({ userId });
  }

  async deleteUser(userId: UserId): Promise<never> {
    const existing = await this.guard('Failed to delete user', () =>
      getUserById(this.deps.store, userId),
    );

    if (!existing) throw UserErrors.userNotFound({ userId });
    throw UserErrors.deleteNotImplemented({ userId });
  }

  private async guard<T>(message: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err: unknown) {
      if (err instanceof AppError) throw err;
      throw UserErrors.storeFailure(message, err);
    }
  }
}
