import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { AppConfig, LogLevel } from './types';

export interface LoadConfigOptions {
  path?: string;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}

export const DEFAULT_TARGET_URL =
  'https://www.lsf.tu-dortmund.de/qisserver/rds?state=wscheck&wscheck=leistungen&navigationPosition=functions%2CmyLecturesWScheck&breadcrumb=myLectures&topitem=functions&subitem=myLecturesWScheck';
const DEFAULT_PORTAL_DOMAIN = 'lsf.tu-dortmund.de';
const DEFAULT_SSO_DOMAIN = 'sso.itmc';
const DEFAULT_TERM = 'Wintersemester 2025/26';
const DEFAULT_HEADLESS = true;
const DEFAULT_SLOW_MO = 0;
const DEFAULT_OUTPUT_DIR = './output';
const DEFAULT_DEBUG_DIR = './artifacts';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_GLOBAL_TIMEOUT = 30000;
const DEFAULT_POLL_INTERVAL = 250;
const DEFAULT_HTTP_FALLBACK = true;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  dotenvConfig({ path: options.path });

  const env = process.env;
  const totpSecret = env.LSF_TOTP_SECRET?.trim();

  return {
    targetUrl: env.LSF_TARGET_URL?.trim() || DEFAULT_TARGET_URL,
    portalDomain: env.LSF_PORTAL_DOMAIN?.trim() || DEFAULT_PORTAL_DOMAIN,
    ssoDomain: env.LSF_SSO_DOMAIN?.trim() || DEFAULT_SSO_DOMAIN,
    term: env.LSF_TERM?.trim() || DEFAULT_TERM,
    credentials: {
      username: env.LSF_USERNAME?.trim() || '',
      password: env.LSF_PASSWORD?.trim() || '',
      totpSecret: totpSecret || undefined,
    },
    headless: parseBoolean(env.HEADLESS, DEFAULT_HEADLESS),
    slowMo: parseNumber(env.SLOW_MO, DEFAULT_SLOW_MO),
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_LOG_LEVEL),
    globalTimeout: parseNumber(env.GLOBAL_TIMEOUT, DEFAULT_GLOBAL_TIMEOUT),
    pollInterval: parseNumber(env.POLL_INTERVAL, DEFAULT_POLL_INTERVAL),
    httpFallback: parseBoolean(env.HTTP_FALLBACK, DEFAULT_HTTP_FALLBACK),
    sessionStatePath: path.resolve('./state/session.json'),
    debugDir: path.resolve(env.DEBUG_DIR?.trim() || DEFAULT_DEBUG_DIR),
  };
}

export function validateConfig(config: AppConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!config.credentials.username) {
    errors.push({
      field: 'LSF_USERNAME',
      message: 'Missing username (LSF_USERNAME).',
    });
  }

  if (!config.credentials.password) {
    errors.push({
      field: 'LSF_PASSWORD',
      message: 'Missing password (LSF_PASSWORD).',
    });
  }

  if (!config.targetUrl.includes(config.portalDomain)) {
    errors.push({
      field: 'LSF_TARGET_URL',
      message: `LSF_TARGET_URL must point at the portal domain (${config.portalDomain}).`,
    });
  }

  if (!Number.isFinite(config.slowMo) || config.slowMo < 0) {
    errors.push({
      field: 'SLOW_MO',
      message: 'SLOW_MO must be a non-negative number.',
    });
  }

  if (!Number.isFinite(config.globalTimeout) || config.globalTimeout <= 0) {
    errors.push({
      field: 'GLOBAL_TIMEOUT',
      message: 'GLOBAL_TIMEOUT must be a positive number.',
    });
  }

  if (!Number.isFinite(config.pollInterval) || config.pollInterval <= 0) {
    errors.push({
      field: 'POLL_INTERVAL',
      message: 'POLL_INTERVAL must be a positive number.',
    });
  }

  if (!LOG_LEVELS.includes(config.logLevel)) {
    errors.push({
      field: 'LOG_LEVEL',
      message: `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}.`,
    });
  }

  return errors;
}

export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    credentials: {
      username: config.credentials.username,
      password: config.credentials.password ? '***' : '',
      totpSecret: config.credentials.totpSecret ? '***' : undefined,
    },
  };
}
