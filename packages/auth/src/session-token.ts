import { SignJWT, jwtVerify } from 'jose';
import { CLOCK_SKEW_TOLERANCE_SECONDS, JWT_ALGORITHM, SESSION_MAX_AGE_SECONDS } from './constants.js';
import { parseSessionClaims, type SessionClaims, type SessionIdentity } from './session-schema.js';

const encoder = new TextEncoder();

function secretKey(secret: string): Uint8Array {
  if (!secret) {
    throw new Error('Session signing secret must not be empty');
  }
  return encoder.encode(secret);
}

export interface IssuedSessionToken {
  token: string;
  claims: SessionClaims;
}

/**
 * Sign a session token for a verified identity.
 *
 * The token is an HS256 JWT whose payload is the identity plus `iat` and
 * `exp`. Downstream services verify it with the same shared secret, so the
 * algorithm is pinned on both sides.
 */
export async function issueSessionToken(
  identity: SessionIdentity,
  secret: string,
  ttlSeconds: number = SESSION_MAX_AGE_SECONDS,
  now: Date = new Date()
): Promise<IssuedSessionToken> {
  const issuedAt = Math.floor(now.getTime() / 1000);
  const exp = issuedAt + ttlSeconds;

  const token = await new SignJWT({ ...identity })
    .setProtectedHeader({ alg: JWT_ALGORITHM, typ: 'JWT' })
    .setIssuedAt(issuedAt)
    .setExpirationTime(exp)
    .sign(secretKey(secret));

  return {
    token,
    claims: { ...identity, iat: issuedAt, exp },
  };
}

/**
 * Verify a session token and return its claims.
 * Returns null for bad signatures, other algorithms, expired tokens and
 * payloads that do not carry a full identity.
 */
export async function verifySessionToken(
  token: string,
  secret: string,
  now: Date = new Date()
): Promise<SessionClaims | null> {
  try {
    const { payload } = await jwtVerify(token, secretKey(secret), {
      algorithms: [JWT_ALGORITHM],
      clockTolerance: CLOCK_SKEW_TOLERANCE_SECONDS,
      currentDate: now,
    });
    return parseSessionClaims(payload);
  } catch {
    return null;
  }
}
