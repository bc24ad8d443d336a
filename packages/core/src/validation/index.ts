/**
 * Validation Domain
 *
 * Structural checks on submitted credential fields
 */

export { validate } from './validator.js';
export type { FieldErrors, ValidationOutcome } from './validator.js';
export { FIELD_RULES, SIGNUP_FIELDS, LOGIN_FIELDS, isCredentialField } from './rules.js';
export type { CredentialField, SignupField, LoginField } from './rules.js';
