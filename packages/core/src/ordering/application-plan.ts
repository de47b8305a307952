import type { ClassNode } from '../declaration';

import { resolveApplicationOrder } from './application-order';
import { resolveEvaluationOrder } from './evaluation-order';
import type { ApplicationPlan } from './interfaces';

export function createApplicationPlan(tree: ClassNode): ApplicationPlan {
  return Object.freeze({
    tree,
    evaluationOrder: resolveEvaluationOrder(tree),
    applicationOrder: resolveApplicationOrder(tree),
  });
}
