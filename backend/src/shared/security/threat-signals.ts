/**
 * backend/src/shared/security/threat-signals.ts
 *
 * WHY:
 * - Scanners, injection probes and header-stuffing leave recognizable traces.
 *   Logging them next to the correlationId gives ops something to alert on.
 *
 * RULES (LOCKED):
 * - Detection only. Nothing here rejects, delays or modifies a request.
 * - Matching is case-insensitive substring matching against a denylist.
 * - The denylist is configuration (see app/config.ts), not a hardcoded policy.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { headerBytes, headerValue, type HeaderMap } from '../http/headers';
import type { Logger } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

export type ThreatDenylist = {
  userAgentPatterns: readonly string[];
  uriPatterns: readonly string[];
  maxHeaderBytes: number;
};

export const DEFAULT_USER_AGENT_PATTERNS = [
  'sqlmap',
  'nikto',
  'nmap',
  'masscan',
  'zap',
  'burp',
  'scanner',
  'crawler',
  'bot',
  'spider',
] as const;

export const DEFAULT_URI_PATTERNS = [
  '..',
  '%2e%2e',
  '/etc/passwd',
  '/proc/self',
  '<script',
  'javascript:',
  'eval(',
  'alert(',
  'union select',
  'drop table',
  'insert into',
] as const;

export const DEFAULT_THREAT_DENYLIST: ThreatDenylist = {
  userAgentPatterns: DEFAULT_USER_AGENT_PATTERNS,
  uriPatterns: DEFAULT_URI_PATTERNS,
  maxHeaderBytes: 8192,
};

export const CLIENT_IP_HEADERS = [
  'x-forwarded-for',
  'x-real-ip',
  'cf-connecting-ip',
  'x-client-ip',
  'x-forwarded',
] as const;

export type ThreatSignal =
  | { kind: 'suspicious_user_agent'; pattern: string; userAgent: string }
  | { kind: 'suspicious_uri'; pattern: string; uri: string; method: string }
  | { kind: 'oversized_headers'; headerBytes: number; limitBytes: number };

export function matchPatterns(value: string, patterns: readonly string[]): string[] {
  const haystack = value.toLowerCase();
  return patterns.filter((pattern) => haystack.includes(pattern.toLowerCase()));
}

export function scanRequest(
  input: { method: string; uri: string; headers: HeaderMap },
  denylist: ThreatDenylist = DEFAULT_THREAT_DENYLIST,
): ThreatSignal[] {
  const signals: ThreatSignal[] = [];

  const userAgent = headerValue(input.headers, 'user-agent');
  if (userAgent !== null) {
    for (const pattern of matchPatterns(userAgent, denylist.userAgentPatterns)) {
      signals.push({ kind: 'suspicious_user_agent', pattern, userAgent });
    }
  }

  for (const pattern of matchPatterns(input.uri, denylist.uriPatterns)) {
    signals.push({ kind: 'suspicious_uri', pattern, uri: input.uri, method: input.method });
  }

  const bytes = headerBytes(input.headers);
  if (bytes > denylist.maxHeaderBytes) {
    signals.push({ kind: 'oversized_headers', headerBytes: bytes, limitBytes: denylist.maxHeaderBytes });
  }

  return signals;
}

/**
 * Best-effort client address from proxy headers: first header present wins,
 * first comma-separated entry of its value.
 */
export function resolveClientIp(headers: HeaderMap): string | null {
  for (const name of CLIENT_IP_HEADERS) {
    const value = headerValue(headers, name);
    if (value === null) continue;

    const first = value.split(',')[0]?.trim();
    if (first) return first;
  }

  return null;
}

export function reportThreatSignals(log: Logger, signals: readonly ThreatSignal[]): void {
  for (const signal of signals) {
    switch (signal.kind) {
      case 'suspicious_user_agent':
        log.warn('security.suspicious_user_agent', {
          flow: 'security.scan',
          userAgent: signal.userAgent,
          pattern: signal.pattern,
        });
        break;
      case 'suspicious_uri':
        log.warn('security.suspicious_uri', {
          flow: 'security.scan',
          uri: signal.uri,
          method: signal.method,
          pattern: signal.pattern,
        });
        break;
      case 'oversized_headers':
        log.warn('security.oversized_headers', {
          flow: 'security.scan',
          headerBytes: signal.headerBytes,
          limitBytes: signal.limitBytes,
        });
        break;
    }
  }
}

export function registerThreatScanner(app: FastifyInstance, opts: { denylist: ThreatDenylist }) {
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    reportThreatSignals(
      withRequestContext(req),
      scanRequest({ method: req.method, uri: req.url, headers: req.headers }, opts.denylist),
    );

    done();
  });

  app.addHook('onResponse', (req: FastifyRequest, reply: FastifyReply, done) => {
    if (reply.statusCode === 401) {
      withRequestContext(req).warn('security.auth_failed', {
        flow: 'security.scan',
        method: req.method,
        uri: req.url,
        userAgent: headerValue(req.headers, 'user-agent'),
        ip: resolveClientIp(req.headers) ?? req.ip,
      });
    }

    done();
  });
}
