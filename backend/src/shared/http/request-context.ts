/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - Every request needs a correlationId for logs and cross-service tracing.
 * - Every request gets its own span: a child logger tagged with
 *   correlationId + method + uri, so nothing downstream repeats those fields.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app, { logger }).
 *   It MUST be the first onRequest hook; telemetry and the threat scanner read it.
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Logger } from '../logger/logger';
import { resolveCorrelationId } from './correlation';
import type { HeaderMap } from './headers';

export type RequestContext = {
  correlationId: string;
  log: Logger;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function buildRequestContext(
  logger: Logger,
  req: { method: string; url: string; headers: HeaderMap },
): RequestContext {
  const correlationId = resolveCorrelationId(req.headers);

  return {
    correlationId,
    log: logger.child({
      correlationId,
      method: req.method,
      uri: req.url,
    }),
  };
}

export function registerRequestContext(app: FastifyInstance, opts: { logger: Logger }) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // We'll assign the real value on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = buildRequestContext(opts.logger, req);

    done();
  });
}
