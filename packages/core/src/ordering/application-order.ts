import type { ClassNode, DecoratorRef } from '../declaration';

import type { ApplicationStep, ApplicationTarget } from './interfaces';

function reversedSteps(decorators: ReadonlyArray<DecoratorRef>, target: ApplicationTarget): ApplicationStep[] {
  const steps: ApplicationStep[] = [];

  for (let directionIndex = decorators.length - 1; directionIndex >= 0; directionIndex--) {
    const decorator = decorators[directionIndex];
    if (decorator) {
      steps.push(Object.freeze({ target, decorator, directionIndex }));
    }
  }

  return steps;
}

/**
 * Orders decorator applications innermost first. Each parameter is fully applied (its decorators
 * last-listed first) before the next one, a member's own decorators follow its parameters, and
 * the class decorators come after every member.
 */
export function resolveApplicationOrder(classNode: ClassNode): ReadonlyArray<ApplicationStep> {
  const steps: ApplicationStep[] = [];

  classNode.members.forEach((member, memberIndex) => {
    for (const parameter of member.parameters) {
      const target = Object.freeze({ kind: 'parameter' as const, memberIndex, member, parameter });
      steps.push(...reversedSteps(parameter.decorators, target));
    }

    steps.push(...reversedSteps(member.decorators, Object.freeze({ kind: 'member' as const, memberIndex, member })));
  });

  steps.push(...reversedSteps(classNode.decorators, Object.freeze({ kind: 'class' as const, name: classNode.name })));

  return Object.freeze(steps);
}
