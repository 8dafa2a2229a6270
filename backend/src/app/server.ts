/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (LOCKED):
 * 1) request context  - correlationId + request span (everything below reads it)
 * 2) threat scanner   - detection-only warnings
 * 3) telemetry        - received / completed entries, slow + large flags
 *
 * Requests Fastify rejects before routing (bad URL encoding) skip every hook;
 * frameworkErrors gives them the same span, scan, telemetry and envelope.
 */

import Fastify, { type FastifyReply } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerThreatScanner } from '../shared/security/threat-signals';
import { registerRequestTelemetry } from '../shared/http/request-telemetry';
import { registerErrorHandler } from '../shared/http/error-handler';
import { handleFrameworkError } from '../shared/http/framework-errors';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own winston logger, passed in through deps
    frameworkErrors: (err, req, reply: FastifyReply) => {
      const { statusCode, body } = handleFrameworkError(err, req, {
        logger: opts.deps.logger,
        thresholds: opts.config.telemetry,
        denylist: opts.config.threats,
      });

      reply.status(statusCode).send(body);
    },
  });

  registerRequestContext(app, { logger: opts.deps.logger });
  registerThreatScanner(app, { denylist: opts.config.threats });
  registerRequestTelemetry(app, { thresholds: opts.config.telemetry });

  registerErrorHandler(app);

  return app;
}
