import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadConfig, parseBoolean, parseNumber, validateConfig } from '../src/config';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({ env: {} })).toEqual({
      bookingConfigPath: path.resolve('./form_data.json'),
      headless: false,
      slowMo: 0,
      outputDir: './output',
      logLevel: 'info',
      globalTimeout: 30000,
      fetchTimeout: 10000,
      confirmationHoldMs: 10000,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      env: {
        BOOKING_CONFIG: 'config/tennis.json',
        HEADLESS: 'yes',
        SLOW_MO: '250',
        LOG_LEVEL: 'DEBUG',
        FETCH_TIMEOUT: '5000',
        CONFIRMATION_HOLD_MS: '0',
      },
    });

    expect(config.bookingConfigPath).toBe(path.resolve('config/tennis.json'));
    expect(config.headless).toBe(true);
    expect(config.slowMo).toBe(250);
    expect(config.logLevel).toBe('debug');
    expect(config.fetchTimeout).toBe(5000);
    expect(config.confirmationHoldMs).toBe(0);
  });

  it('falls back on an unknown log level', () => {
    expect(loadConfig({ env: { LOG_LEVEL: 'verbose' } }).logLevel).toBe('info');
  });
});

describe('parseBoolean', () => {
  it('reads common spellings', () => {
    expect(parseBoolean('on', false)).toBe(true);
    expect(parseBoolean(' No ', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
    expect(parseBoolean(undefined, false)).toBe(false);
  });
});

describe('parseNumber', () => {
  it('falls back on blank or invalid input', () => {
    expect(parseNumber('', 7)).toBe(7);
    expect(parseNumber('abc', 7)).toBe(7);
    expect(parseNumber('12', 7)).toBe(12);
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(loadConfig({ env: {} }))).toEqual([]);
  });

  it('rejects non-positive timeouts', () => {
    const config = loadConfig({ env: { GLOBAL_TIMEOUT: '0', FETCH_TIMEOUT: '-1', SLOW_MO: '-5' } });

    expect(validateConfig(config).map((error) => error.field)).toEqual([
      'SLOW_MO',
      'GLOBAL_TIMEOUT',
      'FETCH_TIMEOUT',
    ]);
  });
});
