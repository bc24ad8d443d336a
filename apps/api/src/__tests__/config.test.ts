import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, toFlowSettings } from '../config.js';

const baseEnv = {
  APP_SECRET: 'test-secret-that-is-long-enough-for-hs256',
  APP_DOMAIN: 'example.test',
  AUTH_SERVICE_URL: 'https://auth.example.test',
  ACCOUNT_SERVICE_URL: 'https://account.example.test',
  CHAT_SERVICE_URL: 'https://chat.example.test',
  CDN_URL: 'https://cdn.example.test',
  DATABASE_URL: 'postgres://localhost:5432/gatehouse_test',
};

function configIssues(env: Record<string, string | undefined>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config).toMatchObject({
      appName: 'Gatehouse',
      scheme: 'https',
      port: 8000,
      logLevel: 'info',
      cookieSecret: baseEnv.APP_SECRET,
      databaseUrl: 'postgres://localhost:5432/gatehouse_test',
      scrypt: { cost: 32768, blockSize: 8, parallelism: 1 },
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ ...baseEnv, PORT: '9001', SCRYPT_COST: '16384', APP_SCHEME: 'http' });

    expect(config.port).toBe(9001);
    expect(config.scrypt.cost).toBe(16384);
    expect(config.scheme).toBe('http');
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ ...baseEnv, COOKIE_SECRET: '', PORT: '' });

    expect(config.cookieSecret).toBe(baseEnv.APP_SECRET);
    expect(config.port).toBe(8000);
  });

  it('should list every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ ...baseEnv, APP_SECRET: 'short', APP_SCHEME: 'ftp', CDN_URL: undefined });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe('APP_SECRET: must be at least 32 characters');
    expect(issues.some((issue) => issue.startsWith('APP_SCHEME:'))).toBe(true);
    expect(issues.some((issue) => issue.startsWith('CDN_URL:'))).toBe(true);
  });
});

describe('loadConfig startup checks', () => {
  it('should require a database url', () => {
    expect(configIssues({ ...baseEnv, DATABASE_URL: undefined })).toEqual(['DATABASE_URL: Required']);
  });

  it('should reject scrypt parameters the hasher cannot use', () => {
    const issues = configIssues({ ...baseEnv, SCRYPT_COST: '1000' });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^SCRYPT_COST: Invalid scrypt parameters \(cost=1000, blockSize=8, parallelism=1\)/);
  });

  it('should accept a valid lower cost', () => {
    expect(configIssues({ ...baseEnv, SCRYPT_COST: '16384' })).toEqual([]);
  });
});

describe('toFlowSettings', () => {
  it('should derive secure cookies from the scheme', () => {
    expect(toFlowSettings(loadConfig(baseEnv))).toEqual({
      appName: 'Gatehouse',
      appSecret: baseEnv.APP_SECRET,
      secureCookies: true,
      cookieDomain: 'example.test',
      accountServiceUrl: 'https://account.example.test',
      cookieName: 'auth',
      sessionTtlSeconds: 86400,
    });

    expect(toFlowSettings(loadConfig({ ...baseEnv, APP_SCHEME: 'http' })).secureCookies).toBe(false);
  });
});
