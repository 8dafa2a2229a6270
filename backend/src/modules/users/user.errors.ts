/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or digests in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  emailAlreadyExists(meta?: AppErrorMeta) {
    return AppError.badRequest('User with this email already exists', meta);
  },

  updateNotImplemented(meta?: AppErrorMeta) {
    return AppError.badRequest('Update functionality not implemented yet', meta);
  },

  deleteNotImplemented(meta?: AppErrorMeta) {
    return AppError.badRequest('Delete functionality not implemented yet', meta);
  },

  storeFailure(message: string, cause: unknown, meta?: AppErrorMeta) {
    return AppError.internal(message, { cause, meta });
  },
} as const;
