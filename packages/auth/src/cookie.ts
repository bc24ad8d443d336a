import { COOKIE_PATH, SESSION_MAX_AGE_SECONDS } from './constants.js';

export type SameSitePolicy = 'Strict' | 'Lax';

export interface CookieAttributes {
  path: string;
  domain: string;
  httpOnly: true;
  secure: boolean;
  sameSite: SameSitePolicy;
  maxAge: number;
  expires?: Date;
}

/**
 * Transport-level description of a cookie. `signed` asks the HTTP layer to
 * wrap the value in its own HMAC signature on top of the token's signature.
 */
export interface CookieDescriptor {
  name: string;
  value: string;
  signed: boolean;
  attributes: CookieAttributes;
}

/**
 * Strictest SameSite policy the scheme allows: Strict over https, Lax on
 * plain http deployments.
 */
export function sameSiteFor(secure: boolean): SameSitePolicy {
  return secure ? 'Strict' : 'Lax';
}

/**
 * Cookie domain shared across subdomains (leading dot)
 */
export function cookieDomain(domain: string): string {
  const trimmed = domain.trim().replace(/^\.+/, '');
  return `.${trimmed}`;
}

function baseAttributes(secure: boolean, domain: string): Omit<CookieAttributes, 'maxAge'> {
  return {
    path: COOKIE_PATH,
    domain: cookieDomain(domain),
    httpOnly: true,
    secure,
    sameSite: sameSiteFor(secure),
  };
}

export function renderSessionCookie(
  name: string,
  token: string,
  secure: boolean,
  domain: string,
  maxAgeSeconds: number = SESSION_MAX_AGE_SECONDS
): CookieDescriptor {
  return {
    name,
    value: token,
    signed: true,
    attributes: {
      ...baseAttributes(secure, domain),
      maxAge: maxAgeSeconds,
    },
  };
}

/**
 * Immediately-expiring cookie with the same path/domain/secure/sameSite as
 * the session cookie; browsers only delete a cookie when these match.
 */
export function clearSessionCookie(name: string, secure: boolean, domain: string): CookieDescriptor {
  return {
    name,
    value: '',
    signed: false,
    attributes: {
      ...baseAttributes(secure, domain),
      maxAge: 0,
      expires: new Date(0),
    },
  };
}
