import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, getConfig, loadConfig, normalizeConfig, resetConfig } from '@/core/config';
import { ConfigError } from '@/core/errors';

describe('normalizeConfig', () => {
  it('applies defaults to an empty object', () => {
    expect(normalizeConfig({}, '/project')).toEqual({ ...DEFAULT_CONFIG, projectRoot: '/project' });
  });

  it('maps snake_case keys and cleans currency codes', () => {
    const config = normalizeConfig(
      {
        table_name: 'rates_eur',
        default_base: 'EUR',
        default_start: '2023-01-02',
        default_currencies: ['usd', ' GBP ', 'USD'],
        poll_interval_seconds: 60,
        chart: { width: 800, max_ticks: 5 },
      },
      '/project'
    );

    expect(config).toMatchObject({
      tableName: 'rates_eur',
      defaultBase: 'EUR',
      defaultStart: '2023-01-02',
      defaultCurrencies: ['USD', 'GBP'],
      pollIntervalSeconds: 60,
      chart: { width: 800, height: 450, maxTicks: 5, outputDir: join('data', 'charts') },
    });
  });

  it.each([
    [{ table_name: 'drop table' }, "Config value 'table_name' is invalid"],
    [{ default_base: 'usd' }, "Config value 'default_base' is invalid"],
    [{ default_start: '2023-02-30' }, "Config value 'default_start' is invalid"],
    [{ default_currencies: 'USD' }, "Config value 'default_currencies' must be an array"],
    [{ default_currencies: ['USD', 'DOLLAR'] }, "Config value 'default_currencies' has invalid code"],
    [{ poll_interval_seconds: 0 }, "Config value 'poll_interval_seconds' must be a positive number"],
    [{ chart: { height: '450' } }, "Config value 'height' must be a positive number"],
  ])('rejects %j', (raw, message) => {
    expect(() => normalizeConfig(raw, '/project')).toThrow(message);
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'fx-config-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('uses defaults when the file is absent', () => {
    expect(loadConfig(root)).toEqual({ ...DEFAULT_CONFIG, projectRoot: root });
  });

  it('reads config/fx_cache.json under the project root', () => {
    mkdirSync(join(root, 'config'));
    writeFileSync(join(root, 'config', 'fx_cache.json'), JSON.stringify({ default_base: 'CAD' }));

    expect(loadConfig(root).defaultBase).toBe('CAD');
  });

  it('raises ConfigError for malformed JSON', () => {
    mkdirSync(join(root, 'config'));
    writeFileSync(join(root, 'config', 'fx_cache.json'), '{ "default_base": ');

    expect(() => loadConfig(root)).toThrow(ConfigError);
  });

  it('parses the shipped config file', () => {
    const config = loadConfig(process.cwd());
    expect(config.tableName).toBe('exchange_rates');
    expect(config.defaultCurrencies).toEqual(['USD', 'CAD']);
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('caches the loaded config until reset', () => {
    resetConfig();
    const first = getConfig();

    expect(getConfig()).toBe(first);
    resetConfig();

    const reloaded = getConfig();
    expect(reloaded).not.toBe(first);
    expect(reloaded).toEqual(first);
  });
});
