/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent (see envelope.ts).
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. users/user.errors.ts).
 * - `details` is client-facing (validation messages). `meta` is for logs only.
 */

export const APP_ERROR_CODES = ['NOT_FOUND', 'BAD_REQUEST', 'VALIDATION_ERROR', 'INTERNAL_ERROR'] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;
export type AppErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly details?: AppErrorDetails;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    details?: AppErrorDetails;
    meta?: AppErrorMeta;
    cause?: unknown;
  }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.details = opts.details;
    this.meta = opts.meta;
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static badRequest(message = 'Bad request', meta?: AppErrorMeta) {
    return new AppError({ code: 'BAD_REQUEST', status: 400, message, meta });
  }

  static validationError(
    message = 'Request validation failed',
    details?: AppErrorDetails,
    meta?: AppErrorMeta,
  ) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, details, meta });
  }

  static internal(message = 'Internal error', opts: { cause?: unknown; meta?: AppErrorMeta } = {}) {
    return new AppError({
      code: 'INTERNAL_ERROR',
      status: 500,
      message,
      cause: opts.cause,
      meta: opts.meta,
    });
  }
}
