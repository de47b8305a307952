import type { ClassNode, DecoratorRef, MemberNode, ParameterNode } from '../declaration';

export interface ClassRef {
  readonly kind: 'class';
  readonly name: string | undefined;
}

export interface MemberRef {
  readonly kind: 'member';
  readonly memberIndex: number;
  readonly member: MemberNode;
}

export interface ParameterRef {
  readonly kind: 'parameter';
  readonly memberIndex: number;
  readonly member: MemberNode;
  readonly parameter: ParameterNode;
}

export type ApplicationTarget = ClassRef | MemberRef | ParameterRef;

export interface ApplicationStep {
  readonly target: ApplicationTarget;
  readonly decorator: DecoratorRef;
  /**
   * Position of the decorator in its own declared list. Application walks each list from the highest index down.
   */
  readonly directionIndex: number;
}

export interface ApplicationPlan {
  readonly tree: ClassNode;
  readonly evaluationOrder: ReadonlyArray<DecoratorRef>;
  readonly applicationOrder: ReadonlyArray<ApplicationStep>;
}
