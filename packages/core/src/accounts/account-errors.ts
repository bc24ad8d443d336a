/**
 * Account Domain Errors
 *
 * Business rule violations surfaced by the auth flows. Each carries the
 * user-facing message; they are returned as values, not thrown.
 */

import type { FieldErrors } from '../validation/index.js';

export class AccountError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AccountError';
  }
}

export class ValidationFailedError extends AccountError {
  constructor(public readonly fieldErrors: FieldErrors) {
    super('Submitted fields are invalid.');
    this.name = 'ValidationFailedError';
  }
}

export class DuplicateUsernameError extends AccountError {
  constructor(public readonly username: string) {
    super('Username already exists.');
    this.name = 'DuplicateUsernameError';
  }
}

/**
 * Same message for unknown usernames and wrong passwords
 */
export class InvalidCredentialsError extends AccountError {
  constructor(public readonly reason: 'user_not_found' | 'invalid_password') {
    super('Invalid credentials.');
    this.name = 'InvalidCredentialsError';
  }
}

export class AccountCreationError extends AccountError {
  constructor(public readonly failure: 'duplicate' | 'unavailable') {
    super('Unexpected error.');
    this.name = 'AccountCreationError';
  }
}
