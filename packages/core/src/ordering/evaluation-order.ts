import type { ClassNode, DecoratorRef } from '../declaration';

/**
 * Flattens every decorator expression of a class in document order: class decorators, then for
 * each member its own decorators followed by the decorators of each of its parameters.
 */
export function resolveEvaluationOrder(classNode: ClassNode): ReadonlyArray<DecoratorRef> {
  const order: DecoratorRef[] = [...classNode.decorators];

  for (const member of classNode.members) {
    order.push(...member.decorators);

    for (const parameter of member.parameters) {
      order.push(...parameter.decorators);
    }
  }

  return Object.freeze(order);
}
