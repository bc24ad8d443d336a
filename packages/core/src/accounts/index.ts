/**
 * Accounts Domain
 *
 * Exports for the account store contract and its implementations
 */

export { PgAccountRepository } from './account-repository.js';
export { InMemoryAccountStore } from './in-memory-account-store.js';
export {
  DEFAULT_ACCOUNT_TITLE,
  ACCOUNT_STATUS_NEW,
  ACCOUNT_ROLE_BASE,
} from './account-types.js';
export type { Account, NewAccount, AccountStore, AccountStoreFailure } from './account-types.js';
export {
  AccountError,
  ValidationFailedError,
  DuplicateUsernameError,
  InvalidCredentialsError,
  AccountCreationError,
} from './account-errors.js';
