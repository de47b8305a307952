import type { AnyFunction, Class } from '@adorn/common';
import type { LogLevel } from '@adorn/logger';

import type { MemberNode } from '../declaration';
import type { MetadataStore, ParameterTransformTable } from '../decorators';
import type { ApplicationPlan } from '../ordering';

export interface DecoratorEngineOptions {
  /**
   * Logger context of the engine.
   * @default 'DecoratorEngine'
   */
  name?: string;
  /**
   * Reconfigures the global log level when set.
   */
  logLevel?: LogLevel;
}

export interface MemberBinding {
  readonly memberIndex: number;
  readonly member: MemberNode;
  /**
   * The undecorated method or setter. Undefined for the constructor.
   */
  readonly original: AnyFunction | undefined;
  /**
   * Getter paired with a setter, kept when the setter is reinstalled.
   */
  readonly getter: AnyFunction | undefined;
}

export interface DecoratedMember {
  readonly memberIndex: number;
  readonly member: MemberNode;
  /**
   * Final function after parameter transforms and member decorators. Undefined for the constructor.
   */
  readonly implementation: AnyFunction | undefined;
  /**
   * False for private members and the constructor, which are reported here only.
   */
  readonly installed: boolean;
}

export interface ClassDefinition<T extends Class> {
  readonly name: string | undefined;
  readonly target: T;
  readonly plan: ApplicationPlan;
  readonly metadata: Readonly<MetadataStore>;
  readonly transforms: ParameterTransformTable;
  readonly members: ReadonlyArray<DecoratedMember>;
}
