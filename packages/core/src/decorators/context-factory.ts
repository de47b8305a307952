import type { MemberNode } from '../declaration';
import type { ParameterRef } from '../ordering';

import type {
  ClassDecoratorContext,
  FunctionDescriptor,
  MemberDecoratorContext,
  MetadataStore,
  ParameterDecoratorContext,
} from './interfaces';
import type { FunctionDescriptorKind, Initializer, InitializerPlacement, MemberDecoratorKind } from './types';

type AddInitializer = (initializer: Initializer) => void;

export function isStaticMember(member: MemberNode): boolean {
  return member.kind === 'static-method' || member.kind === 'static-setter';
}

export function functionKindOf(member: MemberNode): FunctionDescriptorKind {
  switch (member.kind) {
    case 'constructor':
      return 'class-constructor';
    case 'method':
    case 'static-method':
      return 'method';
    case 'setter':
    case 'static-setter':
      return 'setter';
  }
}

export function memberDecoratorKindOf(member: MemberNode): MemberDecoratorKind | undefined {
  const kind = functionKindOf(member);

  return kind === 'class-constructor' ? undefined : kind;
}

/**
 * Initializers added by decorators of static members run with the class, everything else on
 * the constructor or instance members runs per instance.
 */
export function initializerPlacementOf(member: MemberNode): InitializerPlacement {
  return isStaticMember(member) ? 'static' : 'instance';
}

export function createParameterContext(
  target: ParameterRef,
  metadata: MetadataStore,
  addInitializer: AddInitializer,
): ParameterDecoratorContext {
  const { member, parameter } = target;
  const owner: FunctionDescriptor = {
    kind: functionKindOf(member),
    name: member.name,
    static: isStaticMember(member),
    private: member.private,
  };
  const context: ParameterDecoratorContext = {
    kind: 'parameter',
    name: parameter.name,
    index: parameter.index,
    rest: parameter.rest,
    function: Object.freeze(owner),
    metadata,
    addInitializer,
  };

  return Object.freeze(context);
}

export function createMemberContext(
  kind: MemberDecoratorKind,
  member: MemberNode,
  metadata: MetadataStore,
  addInitializer: AddInitializer,
): MemberDecoratorContext {
  const context: MemberDecoratorContext = {
    kind,
    name: member.name,
    static: isStaticMember(member),
    private: member.private,
    metadata,
    addInitializer,
  };

  return Object.freeze(context);
}

export function createClassContext(
  name: string | undefined,
  metadata: MetadataStore,
  addInitializer: AddInitializer,
): ClassDecoratorContext {
  const context: ClassDecoratorContext = { kind: 'class', name, metadata, addInitializer };

  return Object.freeze(context);
}
