import type {
  ClassDecoratorContext,
  MemberDecoratorContext,
  NoReplacement,
  ParameterDecoratorContext,
  Replacement,
} from './interfaces';

export type FunctionDescriptorKind = 'class-constructor' | 'method' | 'setter';

export type MemberDecoratorKind = 'method' | 'setter';

export type DecoratorContext = ParameterDecoratorContext | MemberDecoratorContext | ClassDecoratorContext;

export type Initializer = (this: unknown) => void;

/**
 * Where an initializer registered through `addInitializer` runs: once per instance, once for
 * static members, or once after the class decorators.
 */
export type InitializerPlacement = 'instance' | 'static' | 'class';

/**
 * A parameter decorator returns nothing or a single argument transform.
 */
export type ParameterTransform = (value: unknown) => unknown;

export type DecoratorResult = NoReplacement | Replacement;
