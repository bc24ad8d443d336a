#!/usr/bin/env tsx
/**
 * Apply account store migrations against DATABASE_URL
 *
 * Usage:
 *   DATABASE_URL=postgres://... npm run db:migrate
 */

import { logger } from '@gatehouse/observability';
import { closePool, getPool, migrate, toQueryable } from './index.js';

async function main() {
  const applied = await migrate(toQueryable(getPool()));
  logger.info({ count: applied.length }, 'Migrations complete');
}

main()
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  })
  .finally(closePool);
