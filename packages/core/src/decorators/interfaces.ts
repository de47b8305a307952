import type { AnyFunction, MemberName } from '@adorn/common';

import type { FunctionDescriptorKind, Initializer, MemberDecoratorKind } from './types';

/**
 * Metadata Store
 * @description The mutable record shared by every decorator of one class. Frozen once the class is defined.
 */
export interface MetadataStore {
  [key: string | symbol]: unknown;
}

/**
 * Function Descriptor
 * @description Describes the constructor, method or setter that owns a decorated parameter
 */
export interface FunctionDescriptor {
  readonly kind: FunctionDescriptorKind;
  readonly name: MemberName | undefined;
  readonly static: boolean;
  readonly private: boolean;
}

interface BaseDecoratorContext {
  readonly metadata: MetadataStore;
  addInitializer(initializer: Initializer): void;
}

export interface ParameterDecoratorContext extends BaseDecoratorContext {
  readonly kind: 'parameter';
  /**
   * Undefined when the parameter is a binding pattern.
   */
  readonly name: string | undefined;
  readonly index: number;
  readonly rest: boolean;
  readonly function: FunctionDescriptor;
}

export interface MemberDecoratorContext extends BaseDecoratorContext {
  readonly kind: MemberDecoratorKind;
  readonly name: MemberName | undefined;
  readonly static: boolean;
  readonly private: boolean;
}

export interface ClassDecoratorContext extends BaseDecoratorContext {
  readonly kind: 'class';
  readonly name: string | undefined;
}

export interface NoReplacement {
  readonly kind: 'none';
}

export interface Replacement {
  readonly kind: 'replacement';
  readonly replacement: AnyFunction;
}
