/**
 * Account Repository
 *
 * PostgreSQL implementation of the account store contract.
 * Parameterized SQL only; no business logic.
 */

import { z } from 'zod';
import { isUniqueViolation, type Queryable } from '@gatehouse/database';
import { logger as defaultLogger, type Logger } from '@gatehouse/observability';
import { err, ok, type Result } from '../result.js';
import type { Account, AccountStore, AccountStoreFailure, NewAccount } from './account-types.js';

const ACCOUNT_COLUMNS = 'id, name, email, phone, username, password_hash, title, status, role';

const AccountRowSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    email: z.string(),
    phone: z.string(),
    username: z.string(),
    password_hash: z.string(),
    title: z.string(),
    status: z.number().int(),
    role: z.number().int(),
  })
  .transform(
    (row): Account => ({
      id: row.id,
      name: row.name,
      email: row.email,
      phone: row.phone,
      username: row.username,
      passwordHash: row.password_hash,
      title: row.title,
      status: row.status,
      role: row.role,
    })
  );

export class PgAccountRepository implements AccountStore {
  constructor(
    private db: Queryable,
    private logger: Logger = defaultLogger
  ) {}

  /**
   * Find account by username (case-sensitive)
   */
  async findByUsername(username: string): Promise<Account | null> {
    const result = await this.db.query(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE username = $1 LIMIT 1`,
      [username]
    );

    const [row] = result.rows;
    return row === undefined ? null : AccountRowSchema.parse(row);
  }

  /**
   * Insert a new account; the UNIQUE constraint on username decides duplicates
   */
  async create(data: NewAccount): Promise<Result<Account, AccountStoreFailure>> {
    try {
      const result = await this.db.query(
        `INSERT INTO accounts (name, email, phone, username, password_hash, title, status, role)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${ACCOUNT_COLUMNS}`,
        [
          data.name,
          data.email,
          data.phone,
          data.username,
          data.passwordHash,
          data.title,
          data.status,
          data.role,
        ]
      );

      const [row] = result.rows;
      if (row === undefined) {
        return err({ kind: 'unavailable', cause: new Error('INSERT returned no row') });
      }
      return ok(AccountRowSchema.parse(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err({ kind: 'duplicate', username: data.username });
      }
      this.logger.error({ err: error, username: data.username }, 'Failed to create account');
      return err({ kind: 'unavailable', cause: error });
    }
  }
}
