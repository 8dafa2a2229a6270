/**
 * backend/src/modules/health/health.routes.ts
 *
 * RULES:
 * - Probe paths are part of the platform contract; do not rename.
 */

import type { FastifyInstance } from 'fastify';
import type { HealthController } from './health.controller';

export function registerHealthRoutes(app: FastifyInstance, controller: HealthController) {
  app.get('/api/health', controller.health.bind(controller));
  app.get('/api/ready', controller.ready.bind(controller));
  app.get('/api/live', controller.live.bind(controller));
}
