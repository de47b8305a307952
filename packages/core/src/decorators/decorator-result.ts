import { InvalidDecoratorReturnValueError, isFunction } from '@adorn/common';

import type { DecoratorResult } from './types';

const NO_REPLACEMENT: DecoratorResult = Object.freeze({ kind: 'none' });

/**
 * Turns the raw return value of a decorator into a tagged result.
 * `undefined` means no replacement, a function is a replacement, anything else is rejected.
 */
export function interpretDecoratorResult(
  value: unknown,
  decoratorId: string,
  target: string,
  expected: string,
): DecoratorResult {
  if (value === undefined) {
    return NO_REPLACEMENT;
  }

  if (isFunction(value)) {
    return { kind: 'replacement', replacement: value };
  }

  throw new InvalidDecoratorReturnValueError(decoratorId, target, expected);
}
