import { DefinitionSealedError, InvalidAddInitializerTimingError, InvalidInitializerError } from '@adorn/common';
import { describe, expect, it } from 'vitest';

import { interpretDecoratorResult } from './decorator-result';
import { InitializerRegistry } from './initializer-registry';

describe('InitializerRegistry', () => {
  it('should accept initializers only while the gate is open', () => {
    const registry = new InitializerRegistry();
    const gate = registry.open('register', 'instance');
    const initializer = () => undefined;

    gate.addInitializer(initializer);
    gate.close();

    expect(registry.list('instance')).toEqual([initializer]);
    expect(() => gate.addInitializer(initializer)).toThrow(InvalidAddInitializerTimingError);
    expect(() => gate.addInitializer(initializer)).toThrow(
      'addInitializer of decorator "register" can only be called while the decorator is running',
    );
  });

  it('should reject values that are not functions', () => {
    const gate = new InitializerRegistry().open('register', 'static');

    expect(() => Reflect.apply(gate.addInitializer, undefined, [42])).toThrow(InvalidInitializerError);
  });

  it('should run initializers of one placement in registration order with the given receiver', () => {
    const registry = new InitializerRegistry();
    const calls: unknown[] = [];
    const receiver = { id: 1 };

    registry.register('static', function (this: unknown) {
      calls.push(['first', this]);
    });
    registry.register('static', function (this: unknown) {
      calls.push(['second', this]);
    });
    registry.register('class', () => calls.push('class'));

    registry.run('static', receiver);

    expect(calls).toEqual([
      ['first', receiver],
      ['second', receiver],
    ]);
  });

  it('should refuse registrations after sealing', () => {
    const registry = new InitializerRegistry();
    registry.seal();

    expect(registry.isSealed).toBe(true);
    expect(() => registry.register('class', () => undefined)).toThrow(DefinitionSealedError);
    expect(() => registry.register('class', () => undefined)).toThrow(
      'Initializers can no longer be added once the class is defined',
    );
  });
});

describe('interpretDecoratorResult', () => {
  it('should tag undefined as no replacement and functions as replacements', () => {
    const transform = (value: unknown) => value;

    expect(interpretDecoratorResult(undefined, 'a', 'parameter 0', 'a transform function')).toEqual({ kind: 'none' });
    expect(interpretDecoratorResult(transform, 'a', 'parameter 0', 'a transform function')).toEqual({
      kind: 'replacement',
      replacement: transform,
    });
  });

  it.each([null, 0, 'text', {}])('should reject %s', value => {
    expect(() => interpretDecoratorResult(value, 'bad', 'parameter 0', 'a transform function')).toThrow(
      'Decorator "bad" applied to parameter 0 must return undefined or a transform function',
    );
  });
});
