import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_TARGET_URL, loadConfig, redactConfig, validateConfig } from '../config';
import { makeConfig } from './fakes/fake-session';

const ENV_KEYS = [
  'LSF_USERNAME',
  'LSF_PASSWORD',
  'LSF_TOTP_SECRET',
  'LSF_TARGET_URL',
  'LSF_PORTAL_DOMAIN',
  'LSF_SSO_DOMAIN',
  'LSF_TERM',
  'HEADLESS',
  'SLOW_MO',
  'OUTPUT_DIR',
  'DEBUG_DIR',
  'LOG_LEVEL',
  'GLOBAL_TIMEOUT',
  'POLL_INTERVAL',
  'HTTP_FALLBACK',
];

const NO_ENV_FILE = path.join(__dirname, 'missing.env');

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
  });

  it('applies defaults when nothing is set', () => {
    const config = loadConfig({ path: NO_ENV_FILE });

    expect(config.targetUrl).toBe(DEFAULT_TARGET_URL);
    expect(config.portalDomain).toBe('lsf.tu-dortmund.de');
    expect(config.ssoDomain).toBe('sso.itmc');
    expect(config.term).toBe('Wintersemester 2025/26');
    expect(config.credentials).toEqual({ username: '', password: '', totpSecret: undefined });
    expect(config.headless).toBe(true);
    expect(config.globalTimeout).toBe(30000);
    expect(config.pollInterval).toBe(250);
    expect(config.httpFallback).toBe(true);
    expect(config.logLevel).toBe('info');
  });

  it('reads credentials and overrides from the environment', () => {
    process.env.LSF_USERNAME = ' test-user ';
    process.env.LSF_PASSWORD = 'test-secret';
    process.env.LSF_TOTP_SECRET = 'test-totp-secret';
    process.env.LSF_TERM = 'Sommersemester 2026';
    process.env.HEADLESS = 'no';
    process.env.GLOBAL_TIMEOUT = '5000';
    process.env.HTTP_FALLBACK = 'off';
    process.env.LOG_LEVEL = 'DEBUG';

    const config = loadConfig({ path: NO_ENV_FILE });

    expect(config.credentials).toEqual({
      username: 'test-user',
      password: 'test-secret',
      totpSecret: 'test-totp-secret',
    });
    expect(config.term).toBe('Sommersemester 2026');
    expect(config.headless).toBe(false);
    expect(config.globalTimeout).toBe(5000);
    expect(config.httpFallback).toBe(false);
    expect(config.logLevel).toBe('debug');
  });

  it('keeps defaults for unparseable values', () => {
    process.env.SLOW_MO = 'fast';
    process.env.HEADLESS = 'maybe';
    process.env.LOG_LEVEL = 'verbose';

    const config = loadConfig({ path: NO_ENV_FILE });

    expect(config.slowMo).toBe(0);
    expect(config.headless).toBe(true);
    expect(config.logLevel).toBe('info');
  });
});

describe('validateConfig', () => {
  it('accepts a complete configuration', () => {
    expect(validateConfig(makeConfig())).toEqual([]);
  });

  it('lists missing credentials and bad numbers', () => {
    const config = makeConfig({
      credentials: { username: '', password: '' },
      globalTimeout: 0,
      pollInterval: -1,
    });

    expect(validateConfig(config).map((error) => error.field)).toEqual([
      'LSF_USERNAME',
      'LSF_PASSWORD',
      'GLOBAL_TIMEOUT',
      'POLL_INTERVAL',
    ]);
  });

  it('rejects a target URL outside the portal domain', () => {
    const config = makeConfig({ targetUrl: 'https://example.org/lectures' });

    expect(validateConfig(config).map((error) => error.field)).toEqual(['LSF_TARGET_URL']);
  });
});

describe('redactConfig', () => {
  it('masks the password and TOTP secret', () => {
    const config = makeConfig({
      credentials: { username: 'test-user', password: 'test-secret', totpSecret: 'test-totp-secret' },
    });

    expect(redactConfig(config).credentials).toEqual({
      username: 'test-user',
      password: '***',
      totpSecret: '***',
    });
  });
});
