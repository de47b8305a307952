import type { LogLevel } from './types';

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export const LOG_LEVEL_ENV = 'ADORN_LOG_LEVEL';
