/**
 * Environment configuration
 *
 * Values come from process.env (optionally seeded from a .env file) and are
 * validated once at startup. Invalid configuration fails fast with one line
 * per offending variable.
 */

import { z } from 'zod';
import {
  assertScryptParams,
  COOKIE_NAME,
  DEFAULT_SCRYPT_PARAMS,
  SESSION_MAX_AGE_SECONDS,
  type ScryptParams,
} from '@gatehouse/auth';
import type { AuthFlowSettings } from '@gatehouse/core';

const urlSchema = z.string().url();

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('Gatehouse'),
  APP_SECRET: z.string().min(32, 'must be at least 32 characters'),
  COOKIE_SECRET: z.string().min(32, 'must be at least 32 characters').optional(),
  APP_SCHEME: z.enum(['http', 'https']).default('https'),
  APP_DOMAIN: z.string().min(1),
  AUTH_SERVICE_URL: urlSchema,
  ACCOUNT_SERVICE_URL: urlSchema,
  CHAT_SERVICE_URL: urlSchema,
  CDN_URL: urlSchema,
  DATABASE_URL: z.string().min(1),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SCRYPT_COST: z.coerce.number().int().default(DEFAULT_SCRYPT_PARAMS.cost),
  SCRYPT_BLOCK_SIZE: z.coerce.number().int().default(DEFAULT_SCRYPT_PARAMS.blockSize),
  SCRYPT_PARALLELISM: z.coerce.number().int().default(DEFAULT_SCRYPT_PARAMS.parallelism),
}).superRefine((values, ctx) => {
  try {
    assertScryptParams({
      cost: values.SCRYPT_COST,
      blockSize: values.SCRYPT_BLOCK_SIZE,
      parallelism: values.SCRYPT_PARALLELISM,
    });
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['SCRYPT_COST'],
      message: error instanceof Error ? error.message : 'invalid scrypt parameters',
    });
  }
});

export interface AppConfig {
  appName: string;
  appSecret: string;
  cookieSecret: string;
  scheme: 'http' | 'https';
  domain: string;
  authServiceUrl: string;
  accountServiceUrl: string;
  chatServiceUrl: string;
  cdnUrl: string;
  databaseUrl: string;
  port: number;
  logLevel: string;
  scrypt: ScryptParams;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Treat empty strings like unset so defaults apply
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;

  return {
    appName: values.APP_NAME,
    appSecret: values.APP_SECRET,
    cookieSecret: values.COOKIE_SECRET ?? values.APP_SECRET,
    scheme: values.APP_SCHEME,
    domain: values.APP_DOMAIN,
    authServiceUrl: values.AUTH_SERVICE_URL,
    accountServiceUrl: values.ACCOUNT_SERVICE_URL,
    chatServiceUrl: values.CHAT_SERVICE_URL,
    cdnUrl: values.CDN_URL,
    databaseUrl: values.DATABASE_URL,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    scrypt: {
      cost: values.SCRYPT_COST,
      blockSize: values.SCRYPT_BLOCK_SIZE,
      parallelism: values.SCRYPT_PARALLELISM,
    },
  };
}

export function toFlowSettings(config: AppConfig): AuthFlowSettings {
  return {
    appName: config.appName,
    appSecret: config.appSecret,
    secureCookies: config.scheme === 'https',
    cookieDomain: config.domain,
    accountServiceUrl: config.accountServiceUrl,
    cookieName: COOKIE_NAME,
    sessionTtlSeconds: SESSION_MAX_AGE_SECONDS,
  };
}
