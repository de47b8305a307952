import type { Color, LogFormat, LogLevel, LogMessage, LogMetadataRecord } from './types';

export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  scope?: string;
  err?: Error | Loggable;
}

export interface Loggable {
  toLog(): LogMetadataRecord;
}

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info', or ADORN_LOG_LEVEL when it names a level
   */
  level?: LogLevel;
  /**
   * Log format.
   * @default pretty, json when NODE_ENV is production
   */
  format?: LogFormat;
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
}

export interface Transport {
  log(message: LogMessage): void;
}
