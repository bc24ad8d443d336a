/**
 * @gatehouse/core - Domain logic for the authentication boundary
 *
 * Validation, the account store contract, and the signup/login/logout
 * flows. The HTTP layer in apps/api only adapts requests to these flows.
 */

export * from './result.js';
export * from './validation/index.js';
export * from './accounts/index.js';
export * from './auth-flows/index.js';
