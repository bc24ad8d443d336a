/**
 * HTTP test helpers for route tests
 * Builds the Hono app over in-memory dependencies and handles form bodies
 * and cookies.
 */

import { AuthEventEmitter, createPasswordHasher, type AuthEvent } from '@gatehouse/auth';
import { AuthFlowService, InMemoryAccountStore } from '@gatehouse/core';
import { createLogger } from '@gatehouse/observability';
import type { Env, Hono } from 'hono';
import { createApp } from '../app.js';
import { toFlowSettings, type AppConfig } from '../config.js';

export const TEST_APP_SECRET = 'test-secret-that-is-long-enough-for-hs256';
export const TEST_COOKIE_SECRET = 'test-cookie-secret-long-enough-for-hmac';

export const testConfig: AppConfig = {
  appName: 'Gatehouse',
  appSecret: TEST_APP_SECRET,
  cookieSecret: TEST_COOKIE_SECRET,
  scheme: 'https',
  domain: 'example.test',
  authServiceUrl: 'https://auth.example.test',
  accountServiceUrl: 'https://account.example.test',
  chatServiceUrl: 'https://chat.example.test',
  cdnUrl: 'https://cdn.example.test',
  databaseUrl: 'postgres://localhost:5432/gatehouse_test',
  port: 8000,
  logLevel: 'silent',
  scrypt: { cost: 1024, blockSize: 8, parallelism: 1 },
};

/**
 * Build the app over an in-memory account store and capture emitted events
 */
export function createTestApp(overrides: Partial<AppConfig> = {}) {
  const config: AppConfig = { ...testConfig, ...overrides };
  const accounts = new InMemoryAccountStore();
  const events = new AuthEventEmitter();
  const emitted: AuthEvent[] = [];
  events.on((event) => {
    emitted.push(event);
  });
  const logger = createLogger({ level: 'silent' });

  const flows = new AuthFlowService({
    accounts,
    hasher: createPasswordHasher(config.scrypt),
    events,
    settings: toFlowSettings(config),
    logger,
  });

  const app = createApp({ flows, config, logger });
  return { app, accounts, emitted, config };
}

/**
 * Request options for test helpers
 */
export interface RequestOptions {
  form?: Record<string, string>;
  headers?: Record<string, string>;
  cookies?: Record<string, string>;
}

/**
 * Make an HTTP request to the Hono app, form-encoding the body
 */
export async function makeRequest<E extends Env>(
  app: Hono<E>,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { form, headers = {}, cookies = {} } = options;

  const cookieHeader = Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');

  const init: RequestInit = {
    method: method.toUpperCase(),
    headers: {
      ...(form ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
      ...(cookieHeader ? { Cookie: cookieHeader } : {}),
      ...headers,
    },
  };

  if (form) {
    init.body = new URLSearchParams(form).toString();
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}

/**
 * Find the Set-Cookie header written for a cookie name
 */
export function findSetCookie(response: Response, name: string): string | null {
  return response.headers.getSetCookie().find((header) => header.startsWith(`${name}=`)) ?? null;
}

/**
 * Extract a cookie value from response headers
 */
export function extractCookie(response: Response, name: string): string | null {
  const header = findSetCookie(response, name);
  if (!header) {
    return null;
  }
  const pair = header.split(';')[0] ?? '';
  return pair.slice(name.length + 1);
}

/**
 * Cookie attributes after the name=value pair, as written
 */
export function cookieAttributes(header: string): string[] {
  return header.split('; ').slice(1);
}
