export * from './interfaces';
export * from './types';
export { Logger } from './logger';
export { LogScope } from './log-scope';
export { ConsoleTransport } from './transports/console';
export { isLogLevel, resolveEnvLogLevel } from './helpers';
