/**
 * Application configuration loaded from config/fx_cache.json
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError } from './errors';
import { isIsoDate } from './time';

export interface ChartConfig {
  width: number;
  height: number;
  maxTicks: number;
  outputDir: string;
}

export interface AppConfig {
  tableName: string;
  defaultBase: string;
  defaultStart: string;
  defaultCurrencies: string[];
  pollIntervalSeconds: number;
  requestTimeoutMs: number;
  requestIntervalMs: number;
  chart: ChartConfig;
  projectRoot: string;
}

const CONFIG_FILE = join('config', 'fx_cache.json');
const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;
const CURRENCY_CODE = /^[A-Z]{3}$/;

export const DEFAULT_CONFIG: Omit<AppConfig, 'projectRoot'> = {
  tableName: 'exchange_rates',
  defaultBase: 'USD',
  defaultStart: '2019-05-01',
  defaultCurrencies: ['USD', 'CAD'],
  pollIntervalSeconds: 300,
  requestTimeoutMs: 8000,
  requestIntervalMs: 250,
  chart: {
    width: 1200,
    height: 450,
    maxTicks: 8,
    outputDir: join('data', 'charts'),
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}

function readPositiveNumber(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Config value '${key}' must be a positive number`);
  }
  return value;
}

function readString(
  source: Record<string, unknown>,
  key: string,
  fallback: string,
  accept: (value: string) => boolean
): string {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || !accept(value.trim())) {
    throw new ConfigError(`Config value '${key}' is invalid: ${JSON.stringify(value)}`);
  }
  return value.trim();
}

function readCurrencies(source: Record<string, unknown>, fallback: string[]): string[] {
  const value = source.default_currencies;
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigError("Config value 'default_currencies' must be an array");
  }

  const seen = new Set<string>();
  for (const entry of value) {
    const code = typeof entry === 'string' ? entry.trim().toUpperCase() : '';
    if (!CURRENCY_CODE.test(code)) {
      throw new ConfigError(`Config value 'default_currencies' has invalid code ${JSON.stringify(entry)}`);
    }
    seen.add(code);
  }
  return [...seen];
}

export function normalizeConfig(raw: unknown, projectRoot: string): AppConfig {
  const parsed = asRecord(raw);
  const chart = asRecord(parsed.chart);

  return {
    tableName: readString(parsed, 'table_name', DEFAULT_CONFIG.tableName, (v) => TABLE_NAME.test(v)),
    defaultBase: readString(parsed, 'default_base', DEFAULT_CONFIG.defaultBase, (v) =>
      CURRENCY_CODE.test(v)
    ),
    defaultStart: readString(parsed, 'default_start', DEFAULT_CONFIG.defaultStart, isIsoDate),
    defaultCurrencies: readCurrencies(parsed, DEFAULT_CONFIG.defaultCurrencies),
    pollIntervalSeconds: readPositiveNumber(
      parsed,
      'poll_interval_seconds',
      DEFAULT_CONFIG.pollIntervalSeconds
    ),
    requestTimeoutMs: readPositiveNumber(parsed, 'request_timeout_ms', DEFAULT_CONFIG.requestTimeoutMs),
    requestIntervalMs: readPositiveNumber(
      parsed,
      'request_interval_ms',
      DEFAULT_CONFIG.requestIntervalMs
    ),
    chart: {
      width: readPositiveNumber(chart, 'width', DEFAULT_CONFIG.chart.width),
      height: readPositiveNumber(chart, 'height', DEFAULT_CONFIG.chart.height),
      maxTicks: readPositiveNumber(chart, 'max_ticks', DEFAULT_CONFIG.chart.maxTicks),
      outputDir: readString(chart, 'output_dir', DEFAULT_CONFIG.chart.outputDir, (v) => v.length > 0),
    },
    projectRoot,
  };
}

export function loadConfig(projectRoot: string = process.cwd()): AppConfig {
  const configPath = join(projectRoot, CONFIG_FILE);
  if (!existsSync(configPath)) {
    return normalizeConfig({}, projectRoot);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read ${configPath}: ${reason}`);
  }
  return normalizeConfig(raw, projectRoot);
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
