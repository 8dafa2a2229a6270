/**
 * backend/src/modules/health/health.controller.ts
 *
 * WHY:
 * - Liveness: the process answers.
 * - Readiness: the IdentityStore can be entered (its only dependency).
 *
 * RULES:
 * - Probes never touch user data beyond the store ping.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { ok } from '../../shared/http/envelope';
import { withRequestContext } from '../../shared/logger/with-context';
import type { IdentityStore } from '../users';

import type { HealthResponse, LiveResponse, ReadyResponse } from './health.types';

export class HealthController {
  constructor(
    private readonly deps: {
      store: IdentityStore;
      serviceName: string;
      now?: () => Date;
    },
  ) {}

  private timestamp(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }

  async health(_req: FastifyRequest, reply: FastifyReply) {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: this.timestamp(),
      service: this.deps.serviceName,
    };

    return reply.status(200).send(ok(body));
  }

  async ready(req: FastifyRequest, reply: FastifyReply) {
    let reachable: boolean;
    try {
      reachable = await this.deps.store.ping();
    } catch (err: unknown) {
      withRequestContext(req).error('health.store_unreachable', {
        flow: 'health.ready',
        message: err instanceof Error ? err.message : String(err),
      });
      reachable = false;
    }

    if (!reachable) {
      throw AppError.internal('Identity store is not reachable');
    }

    const body: ReadyResponse = {
      status: 'ready',
      timestamp: this.timestamp(),
      checks: [{ name: 'identity_store', status: 'healthy' }],
    };

    return reply.status(200).send(ok(body));
  }

  async live(_req: FastifyRequest, reply: FastifyReply) {
    const body: LiveResponse = {
      status: 'alive',
      timestamp: this.timestamp(),
    };

    return reply.status(200).send(ok(body));
  }
}
