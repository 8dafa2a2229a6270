/**
 * backend/src/modules/health/health.module.ts
 *
 * WHY:
 * - Encapsulates probe wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { IdentityStore } from '../users';

import { HealthController } from './health.controller';
import { registerHealthRoutes } from './health.routes';

export type HealthModule = ReturnType<typeof createHealthModule>;

export function createHealthModule(deps: { store: IdentityStore; serviceName: string }) {
  const controller = new HealthController(deps);

  return {
    registerRoutes(app: FastifyInstance) {
      registerHealthRoutes(app, controller);
    },
  };
}
