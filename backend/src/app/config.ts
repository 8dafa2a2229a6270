/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 * - Denylist overrides are comma-separated lists; an unset variable keeps the defaults.
 */

import 'dotenv/config';
import { z } from 'zod';

import type { LogLevel } from '../shared/logger/logger';
import {
  DEFAULT_THREAT_DENYLIST,
  type ThreatDenylist,
} from '../shared/security/threat-signals';
import {
  DEFAULT_TELEMETRY_THRESHOLDS,
  type TelemetryThresholds,
} from '../shared/http/request-telemetry';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const PatternListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0),
  )
  .refine((list) => list.length > 0, 'must contain at least one pattern')
  .optional();

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('user-directory-backend'),

  // Request telemetry
  SLOW_REQUEST_WARN_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TELEMETRY_THRESHOLDS.slowRequestWarnMs),
  SLOW_REQUEST_INFO_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TELEMETRY_THRESHOLDS.slowRequestInfoMs),
  LARGE_RESPONSE_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_TELEMETRY_THRESHOLDS.largeResponseBytes),

  // Threat signals (detection only)
  MAX_HEADER_BYTES: z.coerce.number().int().positive().default(DEFAULT_THREAT_DENYLIST.maxHeaderBytes),
  THREAT_USER_AGENT_PATTERNS: PatternListSchema,
  THREAT_URI_PATTERNS: PatternListSchema,
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  host: string;
  port: number;

  logLevel: LogLevel;
  serviceName: string;

  telemetry: TelemetryThresholds;
  threats: ThreatDenylist;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    host: parsed.HOST,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    telemetry: {
      slowRequestWarnMs: parsed.SLOW_REQUEST_WARN_MS,
      slowRequestInfoMs: parsed.SLOW_REQUEST_INFO_MS,
      largeResponseBytes: parsed.LARGE_RESPONSE_BYTES,
    },

    threats: {
      userAgentPatterns: parsed.THREAT_USER_AGENT_PATTERNS ?? DEFAULT_THREAT_DENYLIST.userAgentPatterns,
      uriPatterns: parsed.THREAT_URI_PATTERNS ?? DEFAULT_THREAT_DENYLIST.uriPatterns,
      maxHeaderBytes: parsed.MAX_HEADER_BYTES,
    },
  };
}
