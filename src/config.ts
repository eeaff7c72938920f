import os from 'os';
import { createUnpakError, UnpakErrorCode } from './errors.ts';
import { isLogLevel, type LogLevel } from './lib/logger.ts';

export interface UnpakConfig {
  /** Chunks decoded concurrently per entry, 0 decodes lazily */
  parallelism: number;
  /** Raise libuv's thread pool when `parallelism` exceeds the available processing units */
  raiseThreadPool: boolean;
  logLevel: LogLevel;
}

/** Values given on the command line; unset values fall back to the environment */
export interface ConfigValues {
  threads?: string;
  raiseThreadPool?: boolean;
  logLevel?: string;
}

export type Environment = Record<string, string | undefined>;

// libuv refuses larger pools
export const MAX_THREADPOOL_SIZE = 1024;

function clamp(value: number, { min, max }: { min: number; max?: number }): number {
  if (value < min) return min;
  if (typeof max === 'number' && value > max) return max;
  return value;
}

function parseThreads(raw: string, source: string): number {
  if (!/^-?\d+$/.test(raw.trim())) throw createUnpakError(`${source}: expected an integer, got ${JSON.stringify(raw)}`, UnpakErrorCode.USAGE);
  return clamp(Number(raw.trim()), { min: 0 });
}

function parseBoolean(raw: string | undefined): boolean {
  return raw !== undefined && ['1', 'true', 'yes', 'on'].indexOf(raw.trim().toLowerCase()) >= 0;
}

export function availableParallelism(): number {
  return os.availableParallelism();
}

/**
 * Command line values over UNPAK_* environment variables over defaults.
 * Throws UNPAK_USAGE for values that do not parse.
 */
export function resolveConfig(values: ConfigValues = {}, env: Environment = process.env): UnpakConfig {
  let parallelism = availableParallelism();
  if (values.threads !== undefined) parallelism = parseThreads(values.threads, '--threads');
  else if (env.UNPAK_THREADS !== undefined && env.UNPAK_THREADS !== '') parallelism = parseThreads(env.UNPAK_THREADS, 'UNPAK_THREADS');

  const rawLevel = values.logLevel ?? env.UNPAK_LOG_LEVEL ?? 'warn';
  if (!isLogLevel(rawLevel)) throw createUnpakError(`log level must be one of debug, info, warn, error, got ${JSON.stringify(rawLevel)}`, UnpakErrorCode.USAGE);

  return {
    parallelism,
    raiseThreadPool: values.raiseThreadPool || parseBoolean(env.UNPAK_RAISE_THREADPOOL),
    logLevel: rawLevel,
  };
}

/**
 * Size libuv's thread pool (used by zlib and fs) for the configured parallelism. Only takes
 * effect before the pool's first use, and never overrides an explicit UV_THREADPOOL_SIZE.
 *
 * @returns the pool size that was set, or null when nothing changed
 */
export function applyThreadPool(config: UnpakConfig, env: Environment = process.env, processingUnits = availableParallelism()): number | null {
  if (!config.raiseThreadPool || config.parallelism <= processingUnits) return null;
  if (env.UV_THREADPOOL_SIZE !== undefined && env.UV_THREADPOOL_SIZE !== '') return null;

  const size = clamp(config.parallelism, { min: 1, max: MAX_THREADPOOL_SIZE });
  env.UV_THREADPOOL_SIZE = String(size);
  return size;
}
