import { isFunction, UnresolvedMemberError, type AnyFunction, type Class, type MemberName } from '@adorn/common';

import type { ClassNode, MemberNode } from '../declaration';
import { isStaticMember } from '../decorators';
import { describeMember } from '../ordering';

import type { MemberBinding } from './interfaces';

function findDescriptor(owner: object, key: MemberName): PropertyDescriptor | undefined {
  let current: object | null = owner;

  while (current !== null && current !== Object.prototype && current !== Function.prototype) {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) {
      return descriptor;
    }

    current = Object.getPrototypeOf(current);
  }

  return undefined;
}

function toFunction(value: unknown): AnyFunction | undefined {
  return isFunction(value) ? value : undefined;
}

function bindMember(target: Class, member: MemberNode, memberIndex: number, className: string): MemberBinding {
  if (member.kind === 'constructor') {
    return { memberIndex, member, original: undefined, getter: undefined };
  }

  const owner: object = isStaticMember(member) ? target : target.prototype;
  const descriptor = member.name === undefined || member.private ? undefined : findDescriptor(owner, member.name);
  const isSetter = member.kind === 'setter' || member.kind === 'static-setter';

  const original = member.implementation ?? toFunction(isSetter ? descriptor?.set : descriptor?.value);
  if (!original) {
    throw new UnresolvedMemberError(className, describeMember(member));
  }

  return {
    memberIndex,
    member,
    original,
    getter: isSetter ? toFunction(descriptor?.get) : undefined,
  };
}

/**
 * Looks up every member of the tree on the class before anything is evaluated.
 */
export function resolveMemberBindings(target: Class, tree: ClassNode, className: string): ReadonlyArray<MemberBinding> {
  return Object.freeze(tree.members.map((member, memberIndex) => bindMember(target, member, memberIndex, className)));
}
