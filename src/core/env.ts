/**
 * Environment variable handling with validation.
 * Numeric settings that do not parse fall back to their defaults.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface EnvConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  historyConcurrency: number;
  maxRetries: number;
  retryBackoffMs: number;
  logLevel: LogLevel;
  nodeEnv: 'development' | 'production' | 'test';
}

export const DEFAULT_API_BASE_URL = 'https://open.er-api.com/v6';
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
export const DEFAULT_HISTORY_CONCURRENCY = 4;
export const MAX_HISTORY_CONCURRENCY = 8;
export const MAX_RETRIES_LIMIT = 5;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function getIntVar(name: string, fallback: number, min: number, max: number): number {
  const raw = getEnvVar(name);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function isOneOf<T extends string>(values: readonly T[], raw: string): raw is T {
  return (values as readonly string[]).includes(raw);
}

export function loadEnvConfig(): EnvConfig {
  const apiBaseUrl = (getEnvVar('FX_API_BASE_URL') || DEFAULT_API_BASE_URL).replace(/\/+$/, '');

  const logLevelRaw = getEnvVar('LOG_LEVEL') || 'info';
  const logLevel = isOneOf(LOG_LEVELS, logLevelRaw) ? logLevelRaw : 'info';

  const nodeEnvRaw = process.env.NODE_ENV || 'development';
  const nodeEnv = isOneOf(NODE_ENVS, nodeEnvRaw) ? nodeEnvRaw : 'development';

  return {
    apiBaseUrl,
    requestTimeoutMs: getIntVar(
      'FX_REQUEST_TIMEOUT_MS',
      DEFAULT_REQUEST_TIMEOUT_MS,
      1,
      Number.MAX_SAFE_INTEGER
    ),
    historyConcurrency: getIntVar(
      'FX_HISTORY_CONCURRENCY',
      DEFAULT_HISTORY_CONCURRENCY,
      1,
      MAX_HISTORY_CONCURRENCY
    ),
    maxRetries: getIntVar('FX_MAX_RETRIES', 0, 0, MAX_RETRIES_LIMIT),
    retryBackoffMs: getIntVar('FX_RETRY_BACKOFF_MS', 500, 0, 60_000),
    logLevel,
    nodeEnv,
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
