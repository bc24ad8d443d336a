/**
 * Account Domain Types
 */

import type { SessionIdentity } from '@gatehouse/auth';
import type { Result } from '../result.js';

/**
 * Stored account. Everything except the password digest is safe to embed in
 * a session token.
 */
export interface Account extends SessionIdentity {
  passwordHash: string;
}

export type NewAccount = Omit<Account, 'id'>;

// Defaults applied to every account created through signup
export const DEFAULT_ACCOUNT_TITLE = 'Software Engineer';
export const ACCOUNT_STATUS_NEW = 0;
export const ACCOUNT_ROLE_BASE = 0;

export type AccountStoreFailure =
  | { kind: 'duplicate'; username: string }
  | { kind: 'unavailable'; cause: unknown };

/**
 * Narrow read/write contract the auth flows need from the account store.
 *
 * The store owns username uniqueness: `create` must report `duplicate` when
 * its own constraint rejects the write, even if a prior lookup found nothing.
 */
export interface AccountStore {
  /** Case-sensitive exact match; null when no account uses the username. */
  findByUsername(username: string): Promise<Account | null>;
  /** Never throws; failures come back as values. */
  create(data: NewAccount): Promise<Result<Account, AccountStoreFailure>>;
}
