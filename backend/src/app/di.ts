/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates shared state ONCE (the IdentityStore, the logger) and hands it down.
 * - Keeps modules testable (tests inject a memory logger or a seeded store).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import { createLogger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { PlaceholderPasswordHasher } from '../shared/security/placeholder-password-hasher';

import { InMemIdentityStore } from '../modules/users';
import type { IdentityStore } from '../modules/users';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createHealthModule } from '../modules/health/health.module';
import type { HealthModule } from '../modules/health/health.module';

export type AppDeps = {
  logger: Logger;
  passwordHasher: PasswordHasher;
  store: IdentityStore;

  // modules
  users: UserModule;
  health: HealthModule;
};

export type DepsOverrides = Partial<Pick<AppDeps, 'logger' | 'passwordHasher' | 'store'>>;

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const logger =
    overrides.logger ??
    createLogger({
      level: config.logLevel,
      serviceName: config.serviceName,
      nodeEnv: config.nodeEnv,
    });

  const passwordHasher = overrides.passwordHasher ?? new PlaceholderPasswordHasher();

  // In-memory only: records live until the process exits.
  const store = overrides.store ?? new InMemIdentityStore();

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ store, passwordHasher, logger });
  const health = createHealthModule({ store, serviceName: config.serviceName });

  return {
    logger,
    passwordHasher,
    store,
    users,
    health,
  };
}
