import dotenv from 'dotenv';
import { describe, expect, it, vi } from 'vitest';

import { ConfigError } from '../../errors';
import { getEnv, parseEnv } from '../env';

vi.mock('dotenv', () => ({ default: { config: vi.fn() } }));

describe('parseEnv()', () => {
  it('fills in defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      LOG_FORMAT: 'pretty',
    });
  });

  it('reads explicit values', () => {
    expect(parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'debug', LOG_FORMAT: 'json' })).toEqual({
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
    });
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      parseEnv({ LOG_LEVEL: 'verbose', LOG_FORMAT: 'xml' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^LOG_LEVEL: /);
    expect(issues[1]).toMatch(/^LOG_FORMAT: /);
  });
});

describe('getEnv()', () => {
  it('does not load .env under test and caches the parsed result', () => {
    const first = getEnv();

    expect(dotenv.config).not.toHaveBeenCalled();
    expect(first.NODE_ENV).toBe('test');
    expect(getEnv()).toBe(first);
  });
});
