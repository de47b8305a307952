import { Logger, type LogMessage, type Transport } from '@adorn/logger';

import { decoratorRef, type DecoratorRefSource } from '../src/declaration';

export class MemoryTransport implements Transport {
  readonly messages: LogMessage[] = [];

  log(message: LogMessage): void {
    this.messages.push(message);
  }
}

export function useMemoryLogger(level: 'trace' | 'info' = 'info'): MemoryTransport {
  const transport = new MemoryTransport();
  Logger.configure({ level }, transport);

  return transport;
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('Expected the callback to throw');
}

/**
 * A decorator whose evaluation and application are both recorded in `log`.
 */
export function traced(log: string[], id: string): DecoratorRefSource {
  return decoratorRef(id, () => {
    log.push(`eval:${id}`);

    return () => {
      log.push(`apply:${id}`);
    };
  });
}

/**
 * A parameter decorator returning `transform`.
 */
export function transforming(id: string, transform: (value: unknown) => unknown): DecoratorRefSource {
  return decoratorRef(id, () => () => transform);
}
