/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError or our envelope.
 * - Internal details (meta, causes, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → .status + envelope with .code/.message/.details.
 * - Fastify client errors (malformed JSON, unsupported media type) → 400 BAD_REQUEST.
 * - Unexpected errors → 500 with generic message.
 * - Unknown routes → 404 NOT_FOUND envelope.
 * - Log every error through the request span so correlationId is attached.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { fail } from './envelope';
import { withRequestContext } from '../logger/with-context';

const SENSITIVE_META_KEYS = new Set([
  'password',
  'passwordHash',
  'token',
  'accessToken',
  'refreshToken',
  'secret',
  'authorization',
  'cookie',
]);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object' || Array.isArray(meta)) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err) || typeof err.statusCode !== 'number') return null;
  return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : null;
}

function describeCause(cause: unknown): Record<string, unknown> | undefined {
  if (cause instanceof Error) return { message: cause.message, stack: cause.stack };
  if (cause === undefined) return undefined;
  return { value: String(cause) };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const fields = {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
        cause: describeCause(err.cause),
      };

      if (err.status >= 500) {
        log.error('app_error', fields);
      } else {
        log.warn('app_error', fields);
      }

      return reply.status(err.status).send(fail(err.code, err.message, err.details));
    }

    // 2) Framework-level client errors (body parsing, content type)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', {
        flow: 'http.error',
        status,
        message: err.message,
      });

      return reply.status(status).send(fail('BAD_REQUEST', err.message));
    }

    // 3) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(fail('INTERNAL_ERROR', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send(fail('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}
