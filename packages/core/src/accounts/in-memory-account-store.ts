import { randomUUID } from 'node:crypto';
import { err, ok, type Result } from '../result.js';
import type { Account, AccountStore, AccountStoreFailure, NewAccount } from './account-types.js';

/**
 * Map-backed account store for local development and tests.
 * Enforces username uniqueness the same way the database constraint does.
 */
export class InMemoryAccountStore implements AccountStore {
  private accounts = new Map<string, Account>();

  async findByUsername(username: string): Promise<Account | null> {
    const account = this.accounts.get(username);
    return account ? { ...account } : null;
  }

  async create(data: NewAccount): Promise<Result<Account, AccountStoreFailure>> {
    if (this.accounts.has(data.username)) {
      return err({ kind: 'duplicate', username: data.username });
    }

    const account: Account = { ...data, id: randomUUID() };
    this.accounts.set(account.username, account);
    return ok({ ...account });
  }

  get size(): number {
    return this.accounts.size;
  }
}
