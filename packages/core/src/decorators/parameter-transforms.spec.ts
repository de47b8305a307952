import { DecoratorApplicationError, DefinitionSealedError } from '@adorn/common';
import { describe, expect, it } from 'vitest';

import { captureError } from '../../test/test-kit';
import type { ParameterNode } from '../declaration';

import { bindParameterTransforms, ParameterTransformTable, transformArguments } from './parameter-transforms';

function parameter(index: number, rest = false): ParameterNode {
  return { index, name: undefined, rest, decorators: [] };
}

const trim = (value: unknown) => String(value).trim();
const upper = (value: unknown) => String(value).toUpperCase();

describe('ParameterTransformTable', () => {
  it('should compose transforms in the order they were added', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(0), 'parameter 0', { decoratorId: 'trim', transform: trim });
    table.add(0, parameter(0), 'parameter 0', { decoratorId: 'upper', transform: upper });

    const composed = table.get(0, 0);

    expect(composed?.steps.map(step => step.decoratorId)).toEqual(['trim', 'upper']);
    expect(composed?.apply('  abc  ')).toBe('ABC');
  });

  it('should list a member transforms by parameter index and cache them', () => {
    const table = new ParameterTransformTable();
    table.add(2, parameter(1), 'parameter 1', { decoratorId: 'b', transform: upper });
    table.add(2, parameter(0), 'parameter 0', { decoratorId: 'a', transform: trim });

    const transforms = table.forMember(2);

    expect(transforms.map(transform => transform.index)).toEqual([0, 1]);
    expect(table.forMember(2)).toBe(transforms);
    expect(table.forMember(5)).toEqual([]);
  });

  it('should refuse new transforms once sealed', () => {
    const table = new ParameterTransformTable();
    table.seal();

    const add = () => table.add(0, parameter(0), 'parameter 0', { decoratorId: 'a', transform: trim });

    expect(add).toThrow(DefinitionSealedError);
    expect(add).toThrow('Parameter transforms can no longer be added once the class is defined');
  });

  it('should wrap a throwing transform with the decorator and target', () => {
    const table = new ParameterTransformTable();
    const cause = new RangeError('too long');
    table.add(0, parameter(0), 'parameter 0 of method save of class Repo', {
      decoratorId: 'maxLength',
      transform: () => {
        throw cause;
      },
    });

    const error = captureError(() => table.get(0, 0)?.apply('value'));

    expect(error).toBeInstanceOf(DecoratorApplicationError);
    expect(error).toMatchObject({
      message: 'Transform of decorator "maxLength" on parameter 0 of method save of class Repo threw',
      decoratorId: 'maxLength',
      cause,
    });
  });
});

describe('transformArguments', () => {
  it('should spread a rest transform back in place', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(0), 'parameter 0', { decoratorId: 'double', transform: value => Number(value) * 2 });
    table.add(0, parameter(1, true), 'parameter 1', {
      decoratorId: 'upperAll',
      transform: values => (Array.isArray(values) ? values.map(upper) : values),
    });

    expect(transformArguments(table.forMember(0), [2, 'a', 'b'])).toEqual([4, 'A', 'B']);
  });

  it('should transform arguments the caller left out', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(2), 'parameter 2', { decoratorId: 'fallback', transform: value => value ?? 'fallback' });

    const result = transformArguments(table.forMember(0), [1]);

    expect(result).toHaveLength(3);
    expect(result[2]).toBe('fallback');
  });

  it('should keep rest values after missing leading arguments', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(2, true), 'parameter 2', {
      decoratorId: 'defaults',
      transform: values => (Array.isArray(values) && values.length > 0 ? values : ['D']),
    });

    const result = transformArguments(table.forMember(0), []);

    expect(result).toHaveLength(3);
    expect(result[0]).toBeUndefined();
    expect(result[1]).toBeUndefined();
    expect(result[2]).toBe('D');
  });

  it('should reject a rest transform that does not return an array', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(0, true), 'parameter 0', { decoratorId: 'join', transform: values => String(values) });

    expect(() => transformArguments(table.forMember(0), ['a', 'b'])).toThrow(
      'Transform of decorator "join" on parameter 0 must return an array for a rest parameter',
    );
  });
});

describe('bindParameterTransforms', () => {
  it('should keep the name and receiver of the original function', () => {
    const table = new ParameterTransformTable();
    table.add(0, parameter(0), 'parameter 0', { decoratorId: 'trim', transform: trim });

    function greet(this: unknown, name: unknown) {
      return `${String(Reflect.get(Object(this), 'greeting'))} ${String(name)}`;
    }

    const bound = bindParameterTransforms(greet, table.forMember(0));

    expect(bound.name).toBe('greet');
    expect(bound.call({ greeting: 'hello' }, '  ada ')).toBe('hello ada');
  });

  it('should return the original function when nothing is transformed', () => {
    const fn = () => 1;

    expect(bindParameterTransforms(fn, [])).toBe(fn);
  });
});
