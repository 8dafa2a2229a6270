/**
 * backend/src/shared/http/envelope.ts
 *
 * WHY:
 * - Every response (success or failure) uses the same JSON wrapper:
 *   { success, data?, error?: { code, message, details? }, meta? }
 * - Clients branch on `success`, never on HTTP status alone.
 *
 * RULES:
 * - Controllers build success bodies here; only error-handler.ts builds failures.
 * - `total_pages` is snake_case on the wire.
 */

import type { AppErrorCode, AppErrorDetails } from './errors';

export type PaginationMeta = {
  page: number;
  limit: number;
  total: number;
  total_pages: number;
};

export type SuccessEnvelope<T> = {
  success: true;
  data: T;
  meta?: PaginationMeta;
};

export type ErrorEnvelope = {
  success: false;
  error: {
    code: AppErrorCode;
    message: string;
    details?: AppErrorDetails;
  };
};

export function ok<T>(data: T): SuccessEnvelope<T> {
  return { success: true, data };
}

export function okWithMeta<T>(data: T, meta: PaginationMeta): SuccessEnvelope<T> {
  return { success: true, data, meta };
}

export function fail(code: AppErrorCode, message: string, details?: AppErrorDetails): ErrorEnvelope {
  return details === undefined
    ? { success: false, error: { code, message } }
    : { success: false, error: { code, message, details } };
}

export function paginationMeta(page: number, limit: number, total: number): PaginationMeta {
  return {
    page,
    limit,
    total,
    total_pages: Math.ceil(total / limit),
  };
}
