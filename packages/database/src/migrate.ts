import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { logger } from '@gatehouse/observability';
import type { Queryable } from './index.js';

const SQL_DIR = fileURLToPath(new URL('../sql/', import.meta.url));

/**
 * Apply every SQL file in sql/ in lexical order.
 * Files are written to be idempotent (IF NOT EXISTS), so re-running is safe.
 */
export async function migrate(db: Queryable, directory: string = SQL_DIR): Promise<string[]> {
  const files = (await readdir(directory)).filter((file) => file.endsWith('.sql')).sort();

  for (const file of files) {
    const sql = await readFile(join(directory, file), 'utf8');
    await db.query(sql);
    logger.info({ migration: file }, 'Applied migration');
  }

  return files;
}
