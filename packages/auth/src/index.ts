/**
 * @gatehouse/auth
 *
 * Authentication primitives
 * - Password hashing/verification (scrypt)
 * - Session token issuance/verification (HS256 JWT)
 * - Session cookie descriptors
 * - Auth events and constants
 *
 * The signup/login/logout flows live in @gatehouse/core.
 */

// Password utilities
export {
  verifyPassword,
  createPasswordHasher,
  assertScryptParams,
  DEFAULT_SCRYPT_PARAMS,
} from './password.js';
export type { PasswordHasher, ScryptParams } from './password.js';

// Session tokens
export { issueSessionToken, verifySessionToken } from './session-token.js';
export type { IssuedSessionToken } from './session-token.js';
export { SessionIdentitySchema, SessionClaimsSchema, parseSessionClaims } from './session-schema.js';
export type { SessionIdentity, SessionClaims } from './session-schema.js';

// Cookies
export { renderSessionCookie, clearSessionCookie, sameSiteFor, cookieDomain } from './cookie.js';
export type { CookieAttributes, CookieDescriptor, SameSitePolicy } from './cookie.js';

// Events
export { authEvents, AuthEventEmitter } from './events.js';
export type { AuthEvent, AuthEventInput, AuthEventHandler, AuthEventSink, AuthEventType } from './events.js';

// Constants
export {
  SESSION_MAX_AGE_SECONDS,
  COOKIE_NAME,
  COOKIE_PATH,
  JWT_ALGORITHM,
  CLOCK_SKEW_TOLERANCE_SECONDS,
  SCRYPT_COST,
  SCRYPT_BLOCK_SIZE,
  SCRYPT_PARALLELISM,
} from './constants.js';
