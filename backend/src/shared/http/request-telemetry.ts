/**
 * backend/src/shared/http/request-telemetry.ts
 *
 * WHY:
 * - One structured "received" entry and one "finished" entry per request, both
 *   carrying the correlationId, make any request reconstructable from logs.
 * - Slow and oversized responses are flagged at log time, not by a dashboard later.
 *
 * HOW IT WORKS:
 * - describeRequest() / describeResponse() are pure: they turn request/response
 *   facts into log entries. Unit tests exercise them directly.
 * - registerRequestTelemetry() wires them into onRequest / onResponse hooks and
 *   writes the entries through the request span (see request-context.ts).
 *
 * RULES:
 * - Observation only. Never change status, headers or body.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { LogMeta, Logger } from '../logger/logger';
import { headerValue, type HeaderMap } from './headers';
import { redactMeta } from './error-handler';
import { withRequestContext } from '../logger/with-context';

export type TelemetryThresholds = {
  slowRequestWarnMs: number;
  slowRequestInfoMs: number;
  largeResponseBytes: number;
};

export const DEFAULT_TELEMETRY_THRESHOLDS: TelemetryThresholds = {
  slowRequestWarnMs: 1000,
  slowRequestInfoMs: 500,
  largeResponseBytes: 1_000_000,
};

export type StatusClass = 'success' | 'redirect' | 'client_error' | 'server_error' | 'unknown';

export type TelemetryEvent = {
  correlationId: string;
  method: string;
  uri: string;
  statusCode: number;
  durationMs: number;
  statusClass: StatusClass;
  flags: {
    slow: boolean;
    slowerThanExpected: boolean;
    largeResponse: boolean;
  };
};

export type TelemetryEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  msg: string;
  meta: LogMeta;
};

export function classifyStatus(statusCode: number): StatusClass {
  if (statusCode >= 200 && statusCode <= 299) return 'success';
  if (statusCode >= 300 && statusCode <= 399) return 'redirect';
  if (statusCode >= 400 && statusCode <= 499) return 'client_error';
  if (statusCode >= 500 && statusCode <= 599) return 'server_error';
  return 'unknown';
}

function parseContentLength(raw: string | number | null): number | null {
  if (raw === null) return null;
  const n = typeof raw === 'number' ? raw : Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : null;
}

export function describeRequest(input: {
  correlationId: string;
  method: string;
  uri: string;
  headers: HeaderMap;
}): TelemetryEntry[] {
  const entries: TelemetryEntry[] = [
    {
      level: 'info',
      msg: 'http.request.received',
      meta: {
        correlationId: input.correlationId,
        method: input.method,
        uri: input.uri,
        userAgent: headerValue(input.headers, 'user-agent'),
        contentType: headerValue(input.headers, 'content-type'),
        contentLength: headerValue(input.headers, 'content-length'),
      },
    },
  ];

  const queryStart = input.uri.indexOf('?');
  if (queryStart !== -1 && queryStart < input.uri.length - 1) {
    entries.push({
      level: 'debug',
      msg: 'http.request.query',
      meta: { correlationId: input.correlationId, query: input.uri.slice(queryStart + 1) },
    });
  }

  return entries;
}

export function describeResponse(
  input: {
    correlationId: string;
    method: string;
    uri: string;
    statusCode: number;
    durationMs: number;
    contentType: string | null;
    contentLength: string | number | null;
  },
  thresholds: TelemetryThresholds = DEFAULT_TELEMETRY_THRESHOLDS,
): { event: TelemetryEvent; entries: TelemetryEntry[] } {
  // Whole milliseconds, truncated.
  const durationMs = Math.floor(input.durationMs);
  const statusClass = classifyStatus(input.statusCode);
  const contentLength = parseContentLength(input.contentLength);

  const slow = durationMs > thresholds.slowRequestWarnMs;
  const slowerThanExpected = !slow && durationMs > thresholds.slowRequestInfoMs;
  const largeResponse = contentLength !== null && contentLength > thresholds.largeResponseBytes;

  const event: TelemetryEvent = {
    correlationId: input.correlationId,
    method: input.method,
    uri: input.uri,
    statusCode: input.statusCode,
    durationMs,
    statusClass,
    flags: { slow, slowerThanExpected, largeResponse },
  };

  const base = {
    correlationId: input.correlationId,
    statusCode: input.statusCode,
    durationMs,
    statusClass,
    flags: event.flags,
  };

  const entries: TelemetryEntry[] = [];

  switch (statusClass) {
    case 'success':
      entries.push({
        level: 'info',
        msg: 'http.request.completed',
        meta: { ...base, contentType: input.contentType, contentLength },
      });
      break;
    case 'redirect':
      entries.push({
        level: 'info',
        msg: 'http.request.redirected',
        meta: { ...base, contentType: input.contentType },
      });
      break;
    case 'client_error':
      entries.push({
        level: 'warn',
        msg: 'http.request.client_error',
        meta: { ...base, contentType: input.contentType },
      });
      break;
    case 'server_error':
      entries.push({
        level: 'error',
        msg: 'http.request.server_error',
        meta: { ...base, contentType: input.contentType },
      });
      break;
    case 'unknown':
      entries.push({ level: 'warn', msg: 'http.request.unknown_status', meta: base });
      break;
  }

  if (slow) {
    entries.push({
      level: 'warn',
      msg: 'http.request.slow',
      meta: { correlationId: input.correlationId, durationMs, thresholdMs: thresholds.slowRequestWarnMs },
    });
  } else if (slowerThanExpected) {
    entries.push({
      level: 'info',
      msg: 'http.request.slower_than_expected',
      meta: { correlationId: input.correlationId, durationMs, thresholdMs: thresholds.slowRequestInfoMs },
    });
  }

  if (largeResponse) {
    entries.push({
      level: 'info',
      msg: 'http.response.large',
      meta: { correlationId: input.correlationId, contentLength },
    });
  }

  return { event, entries };
}

export function emitEntries(log: Logger, entries: readonly TelemetryEntry[]): void {
  for (const entry of entries) {
    log[entry.level](entry.msg, entry.meta);
  }
}

const BODY_DEBUG_LIMIT_BYTES = 10_000;

/**
 * Handler-level body logging. Full (redacted) body at debug when small and
 * debug is on; otherwise only its size at info.
 */
export function logRequestBody(log: Logger, endpoint: string, body: unknown): void {
  const serialized = JSON.stringify(body === undefined ? null : redactMeta(body));
  const bodySize = Buffer.byteLength(serialized);

  if (log.isDebugEnabled() && bodySize < BODY_DEBUG_LIMIT_BYTES) {
    log.debug('http.request.body', { endpoint, bodySize, body: serialized });
    return;
  }

  if (bodySize >= BODY_DEBUG_LIMIT_BYTES) {
    log.info('http.request.body_too_large', { endpoint, bodySize });
    return;
  }

  log.info('http.request.body_received', { endpoint, bodySize });
}

function replyHeader(reply: FastifyReply, name: string): string | number | null {
  const value = reply.getHeader(name);
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (Array.isArray(value)) return value[0] ?? null;
  return null;
}

export function registerRequestTelemetry(
  app: FastifyInstance,
  opts: { thresholds: TelemetryThresholds },
) {
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    emitEntries(
      withRequestContext(req),
      describeRequest({
        correlationId: req.requestContext.correlationId,
        method: req.method,
        uri: req.url,
        headers: req.headers,
      }),
    );

    done();
  });

  app.addHook('onResponse', (req: FastifyRequest, reply: FastifyReply, done) => {
    const contentType = replyHeader(reply, 'content-type');

    const { entries } = describeResponse(
      {
        correlationId: req.requestContext.correlationId,
        method: req.method,
        uri: req.url,
        statusCode: reply.statusCode,
        durationMs: reply.elapsedTime,
        contentType: contentType === null ? null : String(contentType),
        contentLength: replyHeader(reply, 'content-length'),
      },
      opts.thresholds,
    );

    emitEntries(withRequestContext(req), entries);

    done();
  });
}
