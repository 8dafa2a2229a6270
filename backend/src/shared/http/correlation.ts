/**
 * backend/src/shared/http/correlation.ts
 *
 * WHY:
 * - Upstream proxies and callers already stamp requests with trace ids under
 *   various header names. Reusing theirs lets one id follow a request across hops.
 *
 * RULES:
 * - Priority order is LOCKED: the first recognized header present wins, no
 *   matter in which order the client sent them.
 * - No header → fresh random UUID.
 */

import { randomUUID } from 'node:crypto';
import { headerValue, type HeaderMap } from './headers';

export const CORRELATION_HEADERS = [
  'x-correlation-id',
  'x-request-id',
  'x-trace-id',
  'request-id',
  'correlation-id',
] as const;

export function resolveCorrelationId(
  headers: HeaderMap,
  generate: () => string = randomUUID,
): string {
  for (const name of CORRELATION_HEADERS) {
    const value = headerValue(headers, name);
    if (value !== null) return value;
  }

  return generate();
}
