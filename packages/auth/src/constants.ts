/**
 * Authentication constants
 * Single source of truth for session and hashing configuration
 */

// Session configuration
export const SESSION_MAX_AGE_SECONDS = 24 * 60 * 60; // 24 hours

// Cookie configuration
export const COOKIE_NAME = 'auth';
export const COOKIE_PATH = '/';

// JWT configuration
export const JWT_ALGORITHM = 'HS256';

// Clock skew tolerance for token validation
export const CLOCK_SKEW_TOLERANCE_SECONDS = 60;

// scrypt parameters (cost, block size, parallelism)
export const SCRYPT_COST = 32768;
export const SCRYPT_BLOCK_SIZE = 8;
export const SCRYPT_PARALLELISM = 1;
export const SCRYPT_KEY_LENGTH = 64;
export const SCRYPT_SALT_BYTES = 16;

// Upper bounds accepted when reading parameters back out of a stored digest
export const SCRYPT_MAX_COST = 1 << 20;
export const SCRYPT_MAX_BLOCK_SIZE = 32;
export const SCRYPT_MAX_PARALLELISM = 16;
export const SCRYPT_MAX_KEY_LENGTH = 256;
