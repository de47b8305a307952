import { isDerivedClass, type AnyFunction, type Class } from '@adorn/common';

import type { ClassNode } from '../declaration';
import {
  bindParameterTransforms,
  isStaticMember,
  transformArguments,
  type InitializerRegistry,
  type ParameterTransformTable,
} from '../decorators';

import type { DecoratedMember, MemberBinding } from './interfaces';

/**
 * Builds the decorated class as a fresh subclass of the target. The target itself is never
 * touched, so an aborted definition leaves nothing behind.
 */
export class ClassBuilder<T extends Class> {
  readonly decorated: T;
  private currentClass: T;
  private readonly implementations = new Map<number, AnyFunction>();
  private membersInstalled = false;

  constructor(
    private readonly target: T,
    private readonly tree: ClassNode,
    private readonly bindings: ReadonlyArray<MemberBinding>,
    private readonly transforms: ParameterTransformTable,
    private readonly initializers: InitializerRegistry,
  ) {
    this.decorated = this.createSubclass();
    this.currentClass = this.decorated;
  }

  get current(): T {
    return this.currentClass;
  }

  /**
   * Current function of a method or setter member, bound to its parameter transforms on first access.
   */
  implementationOf(memberIndex: number): AnyFunction | undefined {
    const existing = this.implementations.get(memberIndex);
    if (existing) {
      return existing;
    }

    const original = this.bindings[memberIndex]?.original;
    if (!original) {
      return undefined;
    }

    const bound = bindParameterTransforms(original, this.transforms.forMember(memberIndex));
    this.implementations.set(memberIndex, bound);

    return bound;
  }

  replaceImplementation(memberIndex: number, implementation: AnyFunction): void {
    this.implementations.set(memberIndex, implementation);
  }

  replaceClass(next: T): void {
    this.currentClass = next;
  }

  /**
   * Defines every public method and setter on the decorated subclass. Runs once, before the
   * first class decorator sees the class.
   */
  installMembers(): void {
    if (this.membersInstalled) {
      return;
    }

    this.membersInstalled = true;

    for (const binding of this.bindings) {
      const { member, memberIndex } = binding;
      const implementation = this.implementationOf(memberIndex);

      if (!implementation || member.private || member.name === undefined) {
        continue;
      }

      const owner: object = isStaticMember(member) ? this.decorated : this.decorated.prototype;

      if (member.kind === 'setter' || member.kind === 'static-setter') {
        Object.defineProperty(owner, member.name, {
          get: binding.getter,
          set: implementation,
          configurable: true,
          enumerable: false,
        });
      } else {
        Object.defineProperty(owner, member.name, {
          value: implementation,
          writable: true,
          configurable: true,
          enumerable: false,
        });
      }
    }
  }

  members(): ReadonlyArray<DecoratedMember> {
    return Object.freeze(
      this.bindings.map(({ member, memberIndex }) =>
        Object.freeze({
          memberIndex,
          member,
          implementation: this.implementationOf(memberIndex),
          installed: member.kind !== 'constructor' && !member.private,
        }),
      ),
    );
  }

  private createSubclass(): T {
    const base: Class = this.target;
    const constructorIndex = this.tree.members.findIndex(member => member.kind === 'constructor');
    const transforms = this.transforms;
    const initializers = this.initializers;

    const Decorated = class extends base {
      constructor(...args: unknown[]) {
        super(...(constructorIndex === -1 ? args : transformArguments(transforms.forMember(constructorIndex), args)));

        initializers.run('instance', this);
      }
    };

    Object.defineProperty(Decorated, 'name', { value: this.target.name, configurable: true });

    if (!isDerivedClass(Decorated, this.target)) {
      throw new TypeError(`Could not derive a subclass of ${this.target.name}`);
    }

    return Decorated;
  }
}
