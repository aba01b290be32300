/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import { ConfigError } from './errors';

export interface EnvConfig {
  apiBaseUrl: string;
  apiKey: string | null;
  dbPath: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  nodeEnv: 'development' | 'production' | 'test';
}

const DEFAULT_API_BASE_URL = 'https://api.exchangeratesapi.io';
const DEFAULT_DB_PATH = 'data/fx_rates.db';

const LOG_LEVELS: ReadonlyArray<EnvConfig['logLevel']> = ['debug', 'info', 'warn', 'error'];
const NODE_ENVS: ReadonlyArray<EnvConfig['nodeEnv']> = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pick<T extends string>(allowed: ReadonlyArray<T>, raw: string, fallback: T): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

function normalizeBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigError(`FX_API_BASE_URL is not a valid URL: ${raw}`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`FX_API_BASE_URL must use http or https: ${raw}`);
  }
  return url.toString().replace(/\/+$/, '');
}

export function loadEnvConfig(): EnvConfig {
  return {
    apiBaseUrl: normalizeBaseUrl(getEnvVar('FX_API_BASE_URL') ?? DEFAULT_API_BASE_URL),
    apiKey: getEnvVar('FX_API_KEY') ?? null,
    dbPath: getEnvVar('FX_DB_PATH') ?? DEFAULT_DB_PATH,
    logLevel: pick(LOG_LEVELS, getEnvVar('LOG_LEVEL') ?? 'info', 'info'),
    nodeEnv: pick(NODE_ENVS, getEnvVar('NODE_ENV') ?? 'development', 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
