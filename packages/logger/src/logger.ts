import { isLoggable, resolveEnvLogLevel } from './helpers';
import { LOG_LEVELS } from './constants';
import type { LoggerOptions, Transport } from './interfaces';
import { LogScope } from './log-scope';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, LogLevel, LogMessage } from './types';

export class Logger {
  private static globalOptions: LoggerOptions = {
    level: resolveEnvLogLevel() ?? 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : undefined,
  };
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  private readonly context?: string;

  constructor(context?: string | Function | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions, transport?: Transport) {
    this.globalOptions = { ...this.globalOptions, ...options };
    if (transport) {
      this.transport = transport;
    } else if (this.transport instanceof ConsoleTransport) {
      this.transport = new ConsoleTransport(this.globalOptions);
    }
  }

  static isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = this.globalOptions.level ?? 'info';

    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]) {
    this.log('trace', msg, args);
  }

  debug(msg: string, ...args: LogArgument[]) {
    this.log('debug', msg, args);
  }

  info(msg: string, ...args: LogArgument[]) {
    this.log('info', msg, args);
  }

  warn(msg: string, ...args: LogArgument[]) {
    this.log('warn', msg, args);
  }

  error(msg: string, ...args: LogArgument[]) {
    this.log('error', msg, args);
  }

  fatal(msg: string, ...args: LogArgument[]) {
    this.log('fatal', msg, args);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, args: ReadonlyArray<LogArgument>) {
    if (!Logger.isLevelEnabled(level)) {
      return;
    }

    const logMessage: LogMessage = {
      level,
      msg,
      time: Date.now(),
      context: this.context,
      scope: LogScope.current(),
    };

    for (const arg of args) {
      if (arg instanceof Error) {
        logMessage.err = arg;
      } else if (isLoggable(arg)) {
        Object.assign(logMessage, arg.toLog());
      } else {
        Object.assign(logMessage, arg);
      }
    }

    Logger.transport.log(logMessage);
  }
}
