/**
 * backend/src/modules/users/policies/list-pagination.policy.ts
 *
 * WHY:
 * - Listing must never ask the store for a page < 1 or an unbounded limit.
 *
 * RULES (LOCKED):
 * - page: default 1, floor 1.
 * - limit: default 10, clamped to [1, 100].
 * - Pure function. No I/O.
 */

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 100;

export function resolveListPagination(input: { page?: number; limit?: number }): {
  page: number;
  limit: number;
} {
  const page = Math.max(input.page ?? DEFAULT_PAGE, 1);
  const limit = Math.min(Math.max(input.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);

  return { page, limit };
}
