/**
 * Runtime configuration, read from environment variables.
 * Every setting is optional; bad values fail fast with a ValidationError.
 */

import type { LogLevel } from './providers/ILogProvider.js';
import { ValidationError } from './errors.js';

export interface CatalogConfig {
  /** Heuristic edges scoring below this are discarded. */
  heuristicThreshold: number;
  /** Per-container adapter timeout. */
  crawlTimeoutMs: number;
  /** Data rows sampled from each CSV/Excel file. */
  fileSampleRows: number;
  sampleValueLength: number;
  logLevel: LogLevel;
  logToConsole: boolean;
}

export const DEFAULT_CONFIG: CatalogConfig = {
  heuristicThreshold: 0.4,
  crawlTimeoutMs: 30_000,
  fileSampleRows: 5,
  sampleValueLength: 100,
  logLevel: 'info',
  logToConsole: true,
};

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function loadConfig(env: Record<string, string | undefined> = process.env): CatalogConfig {
  return {
    heuristicThreshold: readNumber(
      env,
      'CATALOG_HEURISTIC_THRESHOLD',
      DEFAULT_CONFIG.heuristicThreshold,
      { min: 0, max: 1 }
    ),
    crawlTimeoutMs: readNumber(env, 'CATALOG_CRAWL_TIMEOUT_MS', DEFAULT_CONFIG.crawlTimeoutMs, {
      min: 1,
      integer: true,
    }),
    fileSampleRows: readNumber(env, 'CATALOG_FILE_SAMPLE_ROWS', DEFAULT_CONFIG.fileSampleRows, {
      min: 1,
      integer: true,
    }),
    sampleValueLength: readNumber(
      env,
      'CATALOG_SAMPLE_VALUE_LENGTH',
      DEFAULT_CONFIG.sampleValueLength,
      { min: 1, integer: true }
    ),
    logLevel: readLogLevel(env),
    logToConsole: readBoolean(env, 'LOG_TO_CONSOLE', DEFAULT_CONFIG.logToConsole),
  };
}

function readNumber(
  env: Record<string, string | undefined>,
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean }
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number`, { value: raw });
  }
  if (bounds.integer && !Number.isInteger(value)) {
    throw new ValidationError(`${name} must be an integer`, { value: raw });
  }
  if (bounds.min !== undefined && value < bounds.min) {
    throw new ValidationError(`${name} must be at least ${bounds.min}`, { value: raw });
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new ValidationError(`${name} must be at most ${bounds.max}`, { value: raw });
  }
  return value;
}

function readBoolean(
  env: Record<string, string | undefined>,
  name: string,
  fallback: boolean
): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new ValidationError(`${name} must be a boolean`, { value: raw });
}

function readLogLevel(env: Record<string, string | undefined>): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return DEFAULT_CONFIG.logLevel;

  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ValidationError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`, {
      value: raw,
    });
  }
  return level;
}
