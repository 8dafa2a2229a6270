/**
 * backend/src/shared/http/headers.ts
 *
 * Small readers over Node's parsed header map (lower-cased names,
 * string | string[] | undefined values).
 */

import type { IncomingHttpHeaders } from 'node:http';

export type HeaderMap = IncomingHttpHeaders;

/** First value of a header, or null when absent/empty. */
export function headerValue(headers: HeaderMap, name: string): string | null {
  const raw = headers[name.toLowerCase()];
  const value = Array.isArray(raw) ? raw[0] : raw;

  if (typeof value !== 'string' || value.length === 0) return null;
  return value;
}

/** Sum of name + value lengths over every header line. */
export function headerBytes(headers: HeaderMap): number {
  let total = 0;

  for (const [name, raw] of Object.entries(headers)) {
    if (raw === undefined) continue;

    const values = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      total += name.length + value.length;
    }
  }

  return total;
}
