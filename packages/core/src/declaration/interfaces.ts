import type { AnyFunction, MemberName } from '@adorn/common';

import type { DecoratorExpression, MemberKind } from './types';

/**
 * Decorator Ref
 * @description One decorator occurrence in source order. The expression is evaluated once per definition.
 */
export interface DecoratorRef {
  readonly id: string;
  readonly expression: DecoratorExpression;
}

export interface ParameterNode {
  readonly index: number;
  /**
   * Undefined when the parameter is a binding pattern.
   */
  readonly name: string | undefined;
  readonly rest: boolean;
  readonly decorators: ReadonlyArray<DecoratorRef>;
}

export interface MemberNode {
  readonly kind: MemberKind;
  readonly name: MemberName | undefined;
  readonly private: boolean;
  readonly decorators: ReadonlyArray<DecoratorRef>;
  readonly parameters: ReadonlyArray<ParameterNode>;
  /**
   * Used instead of looking the member up on the class. Private members always carry one.
   */
  readonly implementation: AnyFunction | undefined;
}

export interface ClassNode {
  readonly name: string | undefined;
  readonly decorators: ReadonlyArray<DecoratorRef>;
  readonly members: ReadonlyArray<MemberNode>;
}
