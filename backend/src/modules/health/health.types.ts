/**
 * backend/src/modules/health/health.types.ts
 *
 * Wire shapes for the platform probes (wrapped in the response envelope).
 */

export type HealthStatus = 'healthy';

export type HealthResponse = {
  status: HealthStatus;
  timestamp: string;
  service: string;
};

export type HealthCheck = {
  name: string;
  status: HealthStatus;
};

export type ReadyResponse = {
  status: 'ready';
  timestamp: string;
  checks: HealthCheck[];
};

export type LiveResponse = {
  status: 'alive';
  timestamp: string;
};
