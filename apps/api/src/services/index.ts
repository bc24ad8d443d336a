/**
 * Service Registry
 *
 * Dependency injection setup for the auth flows
 * Creates service instances with their dependencies
 */

import { authEvents, createPasswordHasher } from '@gatehouse/auth';
import { AuthFlowService, PgAccountRepository } from '@gatehouse/core';
import { createPool, toQueryable } from '@gatehouse/database';
import { toFlowSettings, type AppConfig } from '../config.js';

export function createServices(config: AppConfig) {
  const pool = createPool(config.databaseUrl);
  const accountRepository = new PgAccountRepository(toQueryable(pool));
  const passwordHasher = createPasswordHasher(config.scrypt);

  const authFlowService = new AuthFlowService({
    accounts: accountRepository,
    hasher: passwordHasher,
    events: authEvents,
    settings: toFlowSettings(config),
  });

  return { pool, accountRepository, passwordHasher, authFlowService };
}
