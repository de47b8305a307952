import { DecoratorApplicationError, DefinitionSealedError, type AnyFunction } from '@adorn/common';

import type { ParameterNode } from '../declaration';

import type { ParameterTransform } from './types';

export interface TransformStep {
  readonly decoratorId: string;
  readonly transform: ParameterTransform;
}

/**
 * The single effective transform of one parameter. Steps run in application order.
 */
export interface ComposedTransform {
  readonly index: number;
  readonly rest: boolean;
  readonly target: string;
  readonly steps: ReadonlyArray<TransformStep>;
  apply(value: unknown): unknown;
}

interface PendingParameter {
  readonly parameter: ParameterNode;
  readonly target: string;
  readonly steps: TransformStep[];
}

function compose(pending: PendingParameter): ComposedTransform {
  const { parameter, target } = pending;
  const steps = Object.freeze([...pending.steps]);

  return Object.freeze({
    index: parameter.index,
    rest: parameter.rest,
    target,
    steps,
    apply(value: unknown): unknown {
      let current = value;

      for (const step of steps) {
        try {
          current = step.transform(current);
        } catch (error) {
          throw new DecoratorApplicationError(step.decoratorId, target, 'threw', { cause: error });
        }

        if (parameter.rest && !Array.isArray(current)) {
          throw new DecoratorApplicationError(step.decoratorId, target, 'must return an array for a rest parameter');
        }
      }

      return current;
    },
  });
}

/**
 * Parameter transforms of one class, keyed by member index and parameter index.
 */
export class ParameterTransformTable {
  private readonly pending = new Map<number, Map<number, PendingParameter>>();
  private readonly composed = new Map<number, ReadonlyArray<ComposedTransform>>();
  private sealed = false;

  add(memberIndex: number, parameter: ParameterNode, target: string, step: TransformStep): void {
    if (this.sealed) {
      throw new DefinitionSealedError('Parameter transforms');
    }

    let parameters = this.pending.get(memberIndex);
    if (!parameters) {
      parameters = new Map();
      this.pending.set(memberIndex, parameters);
    }

    let entry = parameters.get(parameter.index);
    if (!entry) {
      entry = { parameter, target, steps: [] };
      parameters.set(parameter.index, entry);
    }

    entry.steps.push(step);
    this.composed.delete(memberIndex);
  }

  seal(): void {
    this.sealed = true;
  }

  /**
   * Composed transforms of a member, ordered by parameter index.
   */
  forMember(memberIndex: number): ReadonlyArray<ComposedTransform> {
    const cached = this.composed.get(memberIndex);
    if (cached) {
      return cached;
    }

    const entries = [...(this.pending.get(memberIndex)?.values() ?? [])];
    const transforms = Object.freeze(
      entries.sort((left, right) => left.parameter.index - right.parameter.index).map(compose),
    );

    this.composed.set(memberIndex, transforms);

    return transforms;
  }

  get(memberIndex: number, parameterIndex: number): ComposedTransform | undefined {
    return this.forMember(memberIndex).find(transform => transform.index === parameterIndex);
  }
}

/**
 * Replaces each decorated argument with the output of its composed transform. A rest transform
 * receives the remaining arguments as an array and its result is spread back in place.
 */
export function transformArguments(
  transforms: ReadonlyArray<ComposedTransform>,
  args: ReadonlyArray<unknown>,
): unknown[] {
  const result = [...args];

  for (const composed of transforms) {
    if (composed.rest) {
      // Missing leading arguments stay undefined so the rest values keep their position.
      if (result.length < composed.index) {
        result.length = composed.index;
      }

      const restValues = composed.apply(result.slice(composed.index));

      if (Array.isArray(restValues)) {
        result.splice(composed.index, result.length - composed.index, ...restValues);
      }
    } else {
      result[composed.index] = composed.apply(result[composed.index]);
    }
  }

  return result;
}

export function bindParameterTransforms(fn: AnyFunction, transforms: ReadonlyArray<ComposedTransform>): AnyFunction {
  if (transforms.length === 0) {
    return fn;
  }

  const bound = function (this: unknown, ...args: unknown[]): unknown {
    return fn.apply(this, transformArguments(transforms, args));
  };

  Object.defineProperty(bound, 'name', { value: fn.name, configurable: true });

  return bound;
}
