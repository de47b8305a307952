import {
  AdornError,
  DecoratorEvaluationError,
  DecoratorInvocationError,
  InvalidDecoratorReturnValueError,
  InvalidDecoratorTargetError,
  isDerivedClass,
  isFunction,
  type AnyFunction,
  type Class,
} from '@adorn/common';
import { Logger, LogScope } from '@adorn/logger';

import { createDeclarationTree, type ClassNode, type ClassSource, type DecoratorRef } from '../declaration';
import {
  createClassContext,
  createMemberContext,
  createParameterContext,
  initializerPlacementOf,
  interpretDecoratorResult,
  InitializerRegistry,
  memberDecoratorKindOf,
  ParameterTransformTable,
  type DecoratorContext,
  type InitializerGate,
  type MetadataStore,
} from '../decorators';
import { MetadataStorage } from '../metadata';
import {
  createApplicationPlan,
  describeTarget,
  type ApplicationPlan,
  type ApplicationStep,
  type MemberRef,
  type ParameterRef,
} from '../ordering';

import { ClassBuilder } from './class-builder';
import type { ClassDefinition, DecoratorEngineOptions } from './interfaces';
import { resolveMemberBindings } from './member-binding';

interface DefinitionPass<T extends Class> {
  readonly className: string | undefined;
  readonly decorators: ReadonlyMap<DecoratorRef, AnyFunction>;
  readonly metadata: MetadataStore;
  readonly initializers: InitializerRegistry;
  readonly transforms: ParameterTransformTable;
  readonly builder: ClassBuilder<T>;
}

function describeValue(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

/**
 * Evaluates and applies the decorators of a declaration tree against a class.
 *
 * Every decorator expression is evaluated first, in document order. The resulting decorators
 * are then applied innermost first: parameters, then their member, then the class.
 */
export class DecoratorEngine {
  private static definitions = 0;

  private readonly logger: Logger;

  constructor(options: DecoratorEngineOptions = {}) {
    if (options.logLevel) {
      Logger.configure({ level: options.logLevel });
    }

    this.logger = new Logger(options.name ?? DecoratorEngine);
  }

  plan(tree: ClassNode): ApplicationPlan {
    return createApplicationPlan(tree);
  }

  decorate<T extends Class>(target: T, tree: ClassNode): ClassDefinition<T> {
    const className = tree.name ?? (target.name || undefined);
    const scopeId = `${className ?? '<anonymous>'}#${++DecoratorEngine.definitions}`;

    return LogScope.run(scopeId, () => {
      try {
        return this.define(target, tree, className);
      } catch (error) {
        this.logger.error(
          `Failed to decorate class ${className ?? '<anonymous>'}`,
          error instanceof Error ? error : { reason: String(error) },
        );

        throw error;
      }
    });
  }

  private define<T extends Class>(target: T, tree: ClassNode, className: string | undefined): ClassDefinition<T> {
    const plan = this.plan(tree);
    const bindings = resolveMemberBindings(target, tree, className ?? '<anonymous>');

    this.logger.debug(`Decorating class ${className ?? '<anonymous>'}`, {
      evaluations: plan.evaluationOrder.length,
      applications: plan.applicationOrder.length,
    });

    const decorators = this.evaluate(plan);
    const metadata = MetadataStorage.create(target);
    const initializers = new InitializerRegistry();
    const transforms = new ParameterTransformTable();
    const builder = new ClassBuilder(target, tree, bindings, transforms, initializers);
    const pass: DefinitionPass<T> = { className, decorators, metadata, initializers, transforms, builder };

    for (const step of plan.applicationOrder) {
      this.apply(pass, step);
    }

    builder.installMembers();
    initializers.seal();
    transforms.seal();
    Object.freeze(metadata);

    const finalClass = builder.current;
    MetadataStorage.register(builder.decorated, metadata);
    MetadataStorage.register(finalClass, metadata);

    initializers.run('static', finalClass);
    initializers.run('class', finalClass);

    this.logger.debug(`Decorated class ${className ?? '<anonymous>'}`, {
      instanceInitializers: initializers.list('instance').length,
      replaced: finalClass !== builder.decorated,
    });

    return Object.freeze({
      name: className,
      target: finalClass,
      plan,
      metadata,
      transforms,
      members: builder.members(),
    });
  }

  private evaluate(plan: ApplicationPlan): ReadonlyMap<DecoratorRef, AnyFunction> {
    const evaluated = new Map<DecoratorRef, AnyFunction>();

    for (const ref of plan.evaluationOrder) {
      let value: unknown;

      try {
        value = ref.expression();
      } catch (error) {
        throw new DecoratorEvaluationError(ref.id, 'threw while its expression was evaluated', { cause: error });
      }

      if (!isFunction(value)) {
        throw new DecoratorEvaluationError(ref.id, `evaluated to ${describeValue(value)} instead of a function`);
      }

      evaluated.set(ref, value);
      this.logger.trace(`Evaluated decorator ${ref.id}`);
    }

    return evaluated;
  }

  private apply<T extends Class>(pass: DefinitionPass<T>, step: ApplicationStep): void {
    const { target } = step;
    const label = describeTarget(target, pass.className);

    this.logger.trace(`Applying decorator ${step.decorator.id} to ${label}`, { directionIndex: step.directionIndex });

    switch (target.kind) {
      case 'parameter':
        this.applyToParameter(pass, step, target, label);
        break;
      case 'member':
        this.applyToMember(pass, step, target, label);
        break;
      case 'class':
        this.applyToClass(pass, step, label);
        break;
    }
  }

  private applyToParameter<T extends Class>(
    pass: DefinitionPass<T>,
    step: ApplicationStep,
    target: ParameterRef,
    label: string,
  ): void {
    const gate = pass.initializers.open(step.decorator.id, initializerPlacementOf(target.member));
    const context = createParameterContext(target, pass.metadata, gate.addInitializer);
    const returned = this.invoke(pass, step, undefined, context, gate, label);
    const result = interpretDecoratorResult(returned, step.decorator.id, label, 'a transform function');

    if (result.kind === 'replacement') {
      pass.transforms.add(target.memberIndex, target.parameter, label, {
        decoratorId: step.decorator.id,
        transform: result.replacement,
      });
    }
  }

  private applyToMember<T extends Class>(
    pass: DefinitionPass<T>,
    step: ApplicationStep,
    target: MemberRef,
    label: string,
  ): void {
    const kind = memberDecoratorKindOf(target.member);
    const current = pass.builder.implementationOf(target.memberIndex);

    if (!kind || !current) {
      throw new InvalidDecoratorTargetError(label, 'decorate the class instead');
    }

    const gate = pass.initializers.open(step.decorator.id, initializerPlacementOf(target.member));
    const context = createMemberContext(kind, target.member, pass.metadata, gate.addInitializer);
    const returned = this.invoke(pass, step, current, context, gate, label);
    const result = interpretDecoratorResult(returned, step.decorator.id, label, `a replacement ${kind}`);

    if (result.kind === 'replacement') {
      pass.builder.replaceImplementation(target.memberIndex, result.replacement);
    }
  }

  private applyToClass<T extends Class>(pass: DefinitionPass<T>, step: ApplicationStep, label: string): void {
    pass.builder.installMembers();

    const current = pass.builder.current;
    const gate = pass.initializers.open(step.decorator.id, 'class');
    const context = createClassContext(pass.className, pass.metadata, gate.addInitializer);
    const returned = this.invoke(pass, step, current, context, gate, label);

    if (returned === undefined) {
      return;
    }

    if (!isDerivedClass(returned, current)) {
      throw new InvalidDecoratorReturnValueError(step.decorator.id, label, 'a class derived from the decorated class');
    }

    pass.builder.replaceClass(returned);
  }

  private invoke<T extends Class>(
    pass: DefinitionPass<T>,
    step: ApplicationStep,
    value: unknown,
    context: DecoratorContext,
    gate: InitializerGate,
    label: string,
  ): unknown {
    const decorator = pass.decorators.get(step.decorator);
    if (!decorator) {
      throw new DecoratorEvaluationError(step.decorator.id, 'was applied without being evaluated');
    }

    try {
      return decorator(value, context);
    } catch (error) {
      if (error instanceof AdornError) {
        throw error;
      }

      throw new DecoratorInvocationError(step.decorator.id, label, { cause: error });
    } finally {
      gate.close();
    }
  }
}

/**
 * Builds the declaration tree of `source` and decorates `target` with it.
 */
export function decorateClass<T extends Class>(
  target: T,
  source: ClassSource,
  options?: DecoratorEngineOptions,
): ClassDefinition<T> {
  return new DecoratorEngine(options).decorate(target, createDeclarationTree(source));
}
