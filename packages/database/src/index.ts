import pg from 'pg';

export type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

/**
 * Minimal query surface shared by Pool, PoolClient and test doubles
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * Narrow a pg pool to the query surface repositories depend on
 */
export function toQueryable(pool: pg.Pool): Queryable {
  return {
    query: (text, values) => pool.query(text, values),
  };
}

export { migrate } from './migrate.js';
export { isUniqueViolation, PG_UNIQUE_VIOLATION } from './errors.js';

// Global singleton instance for use across the application
declare global {
  // eslint-disable-next-line no-var
  var gatehousePool: pg.Pool | undefined;
}

export function createPool(connectionString = process.env.DATABASE_URL): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL must be set to connect to the account store');
  }
  return new pg.Pool({ connectionString, max: 10 });
}

/**
 * Lazily created pool so importing this module never opens a connection
 */
export function getPool(): pg.Pool {
  if (!globalThis.gatehousePool) {
    globalThis.gatehousePool = createPool();
  }
  return globalThis.gatehousePool;
}

export async function closePool(): Promise<void> {
  const pool = globalThis.gatehousePool;
  globalThis.gatehousePool = undefined;
  if (pool) {
    await pool.end();
  }
}
