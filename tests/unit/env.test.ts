import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '@/core/errors';
import { getEnvConfig, loadEnvConfig, resetEnvConfig } from '@/core/env';

describe('environment config', () => {
  beforeEach(() => {
    vi.stubEnv('FX_API_BASE_URL', '');
    vi.stubEnv('FX_API_KEY', '');
    vi.stubEnv('FX_DB_PATH', '');
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('NODE_ENV', 'test');
    resetEnvConfig();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvConfig();
  });

  it('falls back to defaults for unset variables', () => {
    expect(loadEnvConfig()).toEqual({
      apiBaseUrl: 'https://api.exchangeratesapi.io',
      apiKey: null,
      dbPath: 'data/fx_rates.db',
      logLevel: 'info',
      nodeEnv: 'test',
    });
  });

  it('reads and trims provided values', () => {
    vi.stubEnv('FX_API_BASE_URL', 'https://rates.test/v1/');
    vi.stubEnv('FX_API_KEY', '  test-key  ');
    vi.stubEnv('FX_DB_PATH', '/tmp/fx.db');
    vi.stubEnv('LOG_LEVEL', 'debug');

    expect(loadEnvConfig()).toMatchObject({
      apiBaseUrl: 'https://rates.test/v1',
      apiKey: 'test-key',
      dbPath: '/tmp/fx.db',
      logLevel: 'debug',
    });
  });

  it('ignores unknown log levels', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');
    expect(loadEnvConfig().logLevel).toBe('info');
  });

  it('rejects base URLs that are not http(s)', () => {
    vi.stubEnv('FX_API_BASE_URL', 'ftp://rates.test');
    expect(() => loadEnvConfig()).toThrow(ConfigError);

    vi.stubEnv('FX_API_BASE_URL', 'not a url');
    expect(() => loadEnvConfig()).toThrow('FX_API_BASE_URL is not a valid URL: not a url');
  });

  it('caches until reset', () => {
    const first = getEnvConfig();
    vi.stubEnv('FX_DB_PATH', 'other.db');

    expect(getEnvConfig()).toBe(first);
    resetEnvConfig();
    expect(getEnvConfig().dbPath).toBe('other.db');
  });
});
