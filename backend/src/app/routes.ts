/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all module routes.
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { deps: AppDeps }) {
  opts.deps.health.registerRoutes(app);
  opts.deps.users.registerRoutes(app);
}
