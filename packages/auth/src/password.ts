/**
 * Password hashing and verification utilities
 * Uses Node's built-in scrypt (memory-hard, runs on the libuv thread pool)
 *
 * Digest format: scrypt$<N>$<r>$<p>$<salt base64>$<key base64>
 */
import { randomBytes, scrypt as scryptCallback, timingSafeEqual, type ScryptOptions } from 'node:crypto';
import {
  SCRYPT_BLOCK_SIZE,
  SCRYPT_COST,
  SCRYPT_KEY_LENGTH,
  SCRYPT_MAX_BLOCK_SIZE,
  SCRYPT_MAX_COST,
  SCRYPT_MAX_KEY_LENGTH,
  SCRYPT_MAX_PARALLELISM,
  SCRYPT_PARALLELISM,
  SCRYPT_SALT_BYTES,
} from './constants.js';

export interface ScryptParams {
  cost: number;
  blockSize: number;
  parallelism: number;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, digest: string): Promise<boolean>;
}

export const DEFAULT_SCRYPT_PARAMS: ScryptParams = {
  cost: SCRYPT_COST,
  blockSize: SCRYPT_BLOCK_SIZE,
  parallelism: SCRYPT_PARALLELISM,
};

function scrypt(
  password: string,
  salt: Buffer,
  keyLength: number,
  params: ScryptParams
): Promise<Buffer> {
  const options: ScryptOptions = {
    N: params.cost,
    r: params.blockSize,
    p: params.parallelism,
    // scrypt needs 128 * N * r bytes; leave headroom over Node's 32 MiB default
    maxmem: 256 * params.cost * params.blockSize,
  };

  return new Promise((resolve, reject) => {
    scryptCallback(password, salt, keyLength, options, (error, derivedKey) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(derivedKey);
    });
  });
}

function isPowerOfTwo(value: number): boolean {
  return value > 1 && (value & (value - 1)) === 0;
}

function isValidScryptParams(params: ScryptParams): boolean {
  return (
    Number.isInteger(params.cost) &&
    isPowerOfTwo(params.cost) &&
    params.cost <= SCRYPT_MAX_COST &&
    Number.isInteger(params.blockSize) &&
    params.blockSize >= 1 &&
    params.blockSize <= SCRYPT_MAX_BLOCK_SIZE &&
    Number.isInteger(params.parallelism) &&
    params.parallelism >= 1 &&
    params.parallelism <= SCRYPT_MAX_PARALLELISM
  );
}

/**
 * Throws when parameters are unusable so a misconfigured deployment fails at startup
 */
export function assertScryptParams(params: ScryptParams): void {
  if (!isValidScryptParams(params)) {
    throw new Error(
      `Invalid scrypt parameters (cost=${params.cost}, blockSize=${params.blockSize}, parallelism=${params.parallelism}): ` +
        `cost must be a power of two up to ${SCRYPT_MAX_COST}, block size 1-${SCRYPT_MAX_BLOCK_SIZE}, parallelism 1-${SCRYPT_MAX_PARALLELISM}`
    );
  }
}

function parseParam(raw: string): number | null {
  if (!/^[0-9]{1,8}$/.test(raw)) {
    return null;
  }
  return Number.parseInt(raw, 10);
}

function parseDigest(digest: string): { params: ScryptParams; salt: Buffer; key: Buffer } | null {
  const parts = digest.split('$');
  if (parts.length !== 6 || parts[0] !== 'scrypt') {
    return null;
  }

  const [, costStr = '', blockSizeStr = '', parallelismStr = '', saltB64, keyB64] = parts;
  const cost = parseParam(costStr);
  const blockSize = parseParam(blockSizeStr);
  const parallelism = parseParam(parallelismStr);
  if (cost === null || blockSize === null || parallelism === null || !saltB64 || !keyB64) {
    return null;
  }

  const params = { cost, blockSize, parallelism };
  if (!isValidScryptParams(params)) {
    return null;
  }

  const salt = Buffer.from(saltB64, 'base64');
  const key = Buffer.from(keyB64, 'base64');
  if (salt.length === 0 || key.length === 0 || key.length > SCRYPT_MAX_KEY_LENGTH) {
    return null;
  }

  return { params, salt, key };
}

/**
 * Build a hasher bound to one set of scrypt parameters
 * Verification always uses the parameters embedded in the stored digest
 */
export function createPasswordHasher(params: ScryptParams = DEFAULT_SCRYPT_PARAMS): PasswordHasher {
  assertScryptParams(params);

  return {
    async hash(password: string): Promise<string> {
      const salt = randomBytes(SCRYPT_SALT_BYTES);
      const derivedKey = await scrypt(password, salt, SCRYPT_KEY_LENGTH, params);
      return [
        'scrypt',
        params.cost,
        params.blockSize,
        params.parallelism,
        salt.toString('base64'),
        derivedKey.toString('base64'),
      ].join('$');
    },

    verify: verifyPassword,
  };
}

/**
 * Verify a password against a scrypt digest
 * Uses constant-time comparison; malformed digests verify as false
 */
export async function verifyPassword(password: string, digest: string): Promise<boolean> {
  const parsed = parseDigest(digest);
  if (!parsed) {
    return false;
  }

  let derivedKey: Buffer;
  try {
    derivedKey = await scrypt(password, parsed.salt, parsed.key.length, parsed.params);
  } catch {
    return false;
  }

  return timingSafeEqual(parsed.key, derivedKey);
}
