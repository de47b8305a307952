import { LOG_LEVEL_ENV, LOG_LEVELS } from './constants';
import type { Loggable } from './interfaces';
import type { LogLevel } from './types';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isLoggable(value: unknown): value is Loggable {
  return typeof value === 'object' && value !== null && 'toLog' in value && typeof value.toLog === 'function';
}

export function resolveEnvLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const value = env[LOG_LEVEL_ENV];

  return isLogLevel(value) ? value : undefined;
}
