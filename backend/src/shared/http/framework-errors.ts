/**
 * backend/src/shared/http/framework-errors.ts
 *
 * WHY:
 * - Fastify rejects some requests (malformed percent-encoding in the URL)
 *   before routing, so no onRequest/onResponse hook ever sees them.
 * - Those requests still get a correlationId, a threat scan, telemetry and
 *   the error envelope.
 *
 * HOW TO USE:
 * - Passed as `frameworkErrors` when the Fastify instance is created
 *   (see app/server.ts). Returns what to send; the caller sends it.
 */

import type { Logger } from '../logger/logger';
import { scanRequest, reportThreatSignals, type ThreatDenylist } from '../security/threat-signals';
import { fail, type ErrorEnvelope } from './envelope';
import { clientErrorStatus } from './error-handler';
import type { HeaderMap } from './headers';
import { buildRequestContext } from './request-context';
import {
  describeRequest,
  describeResponse,
  emitEntries,
  type TelemetryThresholds,
} from './request-telemetry';

export type FrameworkErrorOptions = {
  logger: Logger;
  thresholds: TelemetryThresholds;
  denylist: ThreatDenylist;
};

export function handleFrameworkError(
  err: Error,
  req: { method: string; url: string; headers: HeaderMap },
  opts: FrameworkErrorOptions,
): { statusCode: number; body: ErrorEnvelope } {
  const startedAt = Date.now();
  const { correlationId, log } = buildRequestContext(opts.logger, req);

  reportThreatSignals(log, scanRequest({ method: req.method, uri: req.url, headers: req.headers }, opts.denylist));
  emitEntries(log, describeRequest({ correlationId, method: req.method, uri: req.url, headers: req.headers }));

  const status = clientErrorStatus(err);
  const statusCode = status ?? 500;
  const body =
    status === null
      ? fail('INTERNAL_ERROR', 'Internal server error')
      : fail('BAD_REQUEST', err.message);

  log.warn('framework_error', {
    flow: 'http.error',
    status: statusCode,
    message: err.message,
  });

  const { entries } = describeResponse(
    {
      correlationId,
      method: req.method,
      uri: req.url,
      statusCode,
      durationMs: Date.now() - startedAt,
      contentType: 'application/json; charset=utf-8',
      contentLength: null,
    },
    opts.thresholds,
  );
  emitEntries(log, entries);

  return { statusCode, body };
}
