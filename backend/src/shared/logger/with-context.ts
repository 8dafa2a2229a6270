/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every log line written while serving a request must carry its correlationId.
 * - We don't want every handler repeating the same fields manually.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 * - The returned logger is the request span created by registerRequestContext():
 *   correlationId, method and uri are already attached.
 */

import type { FastifyRequest } from 'fastify';
import type { Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  return req.requestContext.log;
}
