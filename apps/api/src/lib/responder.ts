/**
 * Applies a flow result to the Hono context: renders a page, or writes the
 * result's cookies and redirects.
 */

import type { Context } from 'hono';
import { setCookie, setSignedCookie } from 'hono/cookie';
import type { CookieOptions } from 'hono/utils/cookie';
import type { CookieDescriptor } from '@gatehouse/auth';
import type { FlowResult, RenderResult } from '@gatehouse/core';
import { loginPage, signupPage, type ServiceUrls } from '../views/index.js';

export interface ResponderOptions {
  cookieSecret: string;
  urls: ServiceUrls;
}

function toCookieOptions(cookie: CookieDescriptor): CookieOptions {
  const { attributes } = cookie;
  return {
    path: attributes.path,
    domain: attributes.domain,
    httpOnly: attributes.httpOnly,
    secure: attributes.secure,
    sameSite: attributes.sameSite,
    maxAge: attributes.maxAge,
    ...(attributes.expires ? { expires: attributes.expires } : {}),
  };
}

export function renderView(c: Context, result: RenderResult, urls: ServiceUrls) {
  const props = { title: result.title, notify: result.notify, urls };
  const page = result.view === 'signup' ? signupPage(props) : loginPage(props);
  return c.html(page);
}

export async function respond(c: Context, result: FlowResult, options: ResponderOptions) {
  if (result.kind === 'render') {
    return renderView(c, result, options.urls);
  }

  for (const cookie of result.cookies) {
    if (cookie.signed) {
      await setSignedCookie(c, cookie.name, cookie.value, options.cookieSecret, toCookieOptions(cookie));
    } else {
      setCookie(c, cookie.name, cookie.value, toCookieOptions(cookie));
    }
  }

  return c.redirect(result.location, 302);
}
