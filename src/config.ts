import path from 'path';
import { config as dotenvConfig } from 'dotenv';
import { ConfigValidationError } from './errors';
import { AppConfig, LogLevel } from './types';

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

const DEFAULT_BOOKING_CONFIG = './form_data.json';
const DEFAULT_HEADLESS = false;
const DEFAULT_SLOW_MO = 0;
const DEFAULT_OUTPUT_DIR = './output';
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_GLOBAL_TIMEOUT = 30000;
const DEFAULT_FETCH_TIMEOUT = 10000;
const DEFAULT_CONFIRMATION_HOLD_MS = 10000;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
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

export function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  if (!options.env) {
    dotenvConfig({ path: options.path });
  }

  const bookingConfig = env.BOOKING_CONFIG?.trim() || DEFAULT_BOOKING_CONFIG;

  return {
    bookingConfigPath: path.resolve(bookingConfig),
    headless: parseBoolean(env.HEADLESS, DEFAULT_HEADLESS),
    slowMo: parseNumber(env.SLOW_MO, DEFAULT_SLOW_MO),
    outputDir: env.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    logLevel: parseLogLevel(env.LOG_LEVEL, DEFAULT_LOG_LEVEL),
    globalTimeout: parseNumber(env.GLOBAL_TIMEOUT, DEFAULT_GLOBAL_TIMEOUT),
    fetchTimeout: parseNumber(env.FETCH_TIMEOUT, DEFAULT_FETCH_TIMEOUT),
    confirmationHoldMs: parseNumber(env.CONFIRMATION_HOLD_MS, DEFAULT_CONFIRMATION_HOLD_MS),
  };
}

export function validateConfig(config: AppConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!config.bookingConfigPath) {
    errors.push({
      field: 'BOOKING_CONFIG',
      message: 'Missing booking config path (BOOKING_CONFIG).',
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

  if (!Number.isFinite(config.fetchTimeout) || config.fetchTimeout <= 0) {
    errors.push({
      field: 'FETCH_TIMEOUT',
      message: 'FETCH_TIMEOUT must be a positive number.',
    });
  }

  if (!Number.isFinite(config.confirmationHoldMs) || config.confirmationHoldMs < 0) {
    errors.push({
      field: 'CONFIRMATION_HOLD_MS',
      message: 'CONFIRMATION_HOLD_MS must be a non-negative number.',
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
