/**
 * Config module - runtime settings read from the environment
 */

import { ConfigError, InvalidOptionError } from './errors.js';
import { LogLevel, parseLogLevel } from './logger.js';

export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_CONCURRENCY = 5;

export function assertConcurrency(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new InvalidOptionError(`Concurrency must be a positive integer, got ${concurrency}`);
  }
}

export interface AppConfig {
  apiBaseUrl: string;
  concurrency: number;
  timeoutMs: number;
  /** Longest rate-limit reset the client will sleep through before giving up */
  maxRateLimitWaitMs: number;
  logLevel: LogLevel;
}

export function parsePositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback;
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid config: ${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseApiUrl(value: string | undefined): string {
  if (value === undefined || value.trim() === '') return DEFAULT_API_URL;
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    throw new ConfigError(`Invalid config: GITHUB_API_URL must be an absolute URL, got "${value}"`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`Invalid config: GITHUB_API_URL must use http or https, got "${value}"`);
  }
  return url.toString().replace(/\/$/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = parseLogLevel(env.LOG_LEVEL);
  if (env.LOG_LEVEL && logLevel === undefined) {
    throw new ConfigError(
      `Invalid config: LOG_LEVEL must be one of debug, info, warn, error, silent, got "${env.LOG_LEVEL}"`
    );
  }

  return {
    apiBaseUrl: parseApiUrl(env.GITHUB_API_URL),
    concurrency: parsePositiveInt(env.GITHUB_DL_CONCURRENCY, DEFAULT_CONCURRENCY, 'GITHUB_DL_CONCURRENCY'),
    timeoutMs: parsePositiveInt(env.GITHUB_DL_TIMEOUT_MS, 30_000, 'GITHUB_DL_TIMEOUT_MS'),
    maxRateLimitWaitMs: parsePositiveInt(env.GITHUB_DL_MAX_RATE_LIMIT_WAIT_MS, 15 * 60_000, 'GITHUB_DL_MAX_RATE_LIMIT_WAIT_MS'),
    logLevel: logLevel ?? LogLevel.INFO,
  };
}
