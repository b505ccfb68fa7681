import path from 'path';
import { isLogLevel, LOG_LEVELS } from './logger';
import type { LogLevel } from './logger';

export interface AppConfig {
  /** Directory tree scanned for `.abc` files */
  base?: string;
  /** Cache blob, `<base>/tunecache` */
  cacheFile?: string;
  /** Ignore cached tunes with a higher id */
  debugMaxId?: number;
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  base?: string;
  logLevel?: string;
}

export const CACHE_FILE_NAME = 'tunecache';

const MAX_TUNE_ID = 0xffffffff;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Read configuration from environment variables (`BASE`, `DEBUG_MAX_ID`,
 * `LOG_LEVEL`). Command line overrides win over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const base = overrides.base ?? nonEmpty(env.BASE);
  const config: AppConfig = {
    logLevel: parseLogLevel(overrides.logLevel ?? nonEmpty(env.LOG_LEVEL)),
  };

  if (base !== undefined) {
    config.base = path.resolve(base);
    config.cacheFile = path.join(config.base, CACHE_FILE_NAME);
  }

  const maxId = nonEmpty(env.DEBUG_MAX_ID);
  if (maxId !== undefined) {
    config.debugMaxId = parseTuneId(maxId, 'DEBUG_MAX_ID');
  }

  return config;
}

/** The base directory, or a ConfigError naming the missing variable. */
export function requireBase(config: AppConfig): { base: string; cacheFile: string } {
  if (config.base === undefined || config.cacheFile === undefined) {
    throw new ConfigError('Base directory config not supplied. Set BASE or pass --base.', 'BASE');
  }
  return { base: config.base, cacheFile: config.cacheFile };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return 'info';
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`, 'LOG_LEVEL');
  }
  return level;
}

function parseTuneId(value: string, variable: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${variable} must be a non-negative integer, got "${value}"`, variable);
  }
  const id = Number(value);
  if (id > MAX_TUNE_ID) {
    throw new ConfigError(`${variable} must be at most ${MAX_TUNE_ID}, got "${value}"`, variable);
  }
  return id;
}
