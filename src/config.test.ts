/**
 * Configuration Tests
 *
 * Verifies environment parsing, defaults and production validation.
 */

import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig, ConfigValidationError, isProduction } from './config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      server: { port: 3000, host: '0.0.0.0', nodeEnv: 'development' },
      database: { path: 'spaced-review.db' },
      logging: { requests: true },
    });
  });

  it('reads every supported variable', () => {
    const config = loadConfig({
      PORT: '8080',
      HOST: '127.0.0.1',
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
      LOG_REQUESTS: 'no',
    });

    expect(config).toEqual({
      server: { port: 8080, host: '127.0.0.1', nodeEnv: 'test' },
      database: { path: ':memory:' },
      logging: { requests: false },
    });
  });

  it('names the variable behind an invalid value', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught instanceof ConfigValidationError && caught.invalidVars[0].name).toBe('PORT');
  });

  it('rejects an unknown NODE_ENV', () => {
    expect(() => loadConfig({ NODE_ENV: 'staging' })).toThrow(ConfigValidationError);
  });
});

describe('validateConfig', () => {
  it('rejects an in-memory database in production', () => {
    const config = loadConfig({ NODE_ENV: 'production', DATABASE_PATH: ':memory:' });

    expect(isProduction(config)).toBe(true);
    expect(() => validateConfig(config)).toThrow('DATABASE_PATH');
  });

  it('accepts an in-memory database outside production', () => {
    const config = loadConfig({ NODE_ENV: 'development', DATABASE_PATH: ':memory:' });

    expect(() => validateConfig(config)).not.toThrow();
  });
});
