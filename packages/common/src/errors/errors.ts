import { ErrorCode } from '../enums';

import { AdornError } from './adorn.error';

export interface DeclarationIssue {
  path: string;
  message: string;
}

/**
 * Invalid Declaration Error
 * @description The declaration source does not describe a well-formed class or function
 */
export class InvalidDeclarationError extends AdornError {
  readonly issues: ReadonlyArray<DeclarationIssue>;

  constructor(issues: ReadonlyArray<DeclarationIssue>) {
    const summary = issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');

    super(ErrorCode.InvalidDeclaration, `Invalid declaration: ${summary}`);

    this.issues = issues;
  }
}

/**
 * Invalid Decorator Target Error
 * @description Decorators were listed on a declaration that cannot carry them
 */
export class InvalidDecoratorTargetError extends AdornError {
  readonly declaration: string;

  constructor(declaration: string, reason: string) {
    super(ErrorCode.InvalidDecoratorTarget, `Decorators are not allowed on ${declaration}: ${reason}`);

    this.declaration = declaration;
  }
}

/**
 * Unresolved Member Error
 * @description A member named by the declaration tree does not exist on the class
 */
export class UnresolvedMemberError extends AdornError {
  readonly member: string;

  constructor(className: string, member: string) {
    super(ErrorCode.UnresolvedMember, `Class ${className} does not define ${member}`);

    this.member = member;
  }
}

/**
 * Decorator Evaluation Error
 * @description A decorator expression threw or did not evaluate to a function
 */
export class DecoratorEvaluationError extends AdornError {
  readonly decoratorId: string;

  constructor(decoratorId: string, message: string, options?: ErrorOptions) {
    super(ErrorCode.DecoratorEvaluationFailure, `Decorator "${decoratorId}" ${message}`, options);

    this.decoratorId = decoratorId;
  }
}

/**
 * Decorator Invocation Error
 * @description A decorator threw while it was applied to its target
 */
export class DecoratorInvocationError extends AdornError {
  readonly decoratorId: string;

  constructor(decoratorId: string, target: string, options?: ErrorOptions) {
    super(ErrorCode.DecoratorInvocationFailure, `Decorator "${decoratorId}" threw while applied to ${target}`, options);

    this.decoratorId = decoratorId;
  }
}

/**
 * Invalid Decorator Return Value Error
 * @description A decorator returned something other than undefined or an accepted replacement
 */
export class InvalidDecoratorReturnValueError extends AdornError {
  readonly decoratorId: string;

  constructor(decoratorId: string, target: string, expected: string) {
    super(
      ErrorCode.InvalidDecoratorReturnValue,
      `Decorator "${decoratorId}" applied to ${target} must return undefined or ${expected}`,
    );

    this.decoratorId = decoratorId;
  }
}

/**
 * Invalid Add Initializer Timing Error
 * @description addInitializer was called after the decorator that received it had returned
 */
export class InvalidAddInitializerTimingError extends AdornError {
  readonly decoratorId: string;

  constructor(decoratorId: string) {
    super(
      ErrorCode.InvalidAddInitializerTiming,
      `addInitializer of decorator "${decoratorId}" can only be called while the decorator is running`,
    );

    this.decoratorId = decoratorId;
  }
}

/**
 * Invalid Initializer Error
 * @description addInitializer received a value that is not a function
 */
export class InvalidInitializerError extends AdornError {
  constructor(decoratorId: string) {
    super(ErrorCode.InvalidInitializer, `addInitializer of decorator "${decoratorId}" expects a function`);
  }
}

/**
 * Decorator Application Error
 * @description A parameter transform failed while the decorated member was invoked
 */
export class DecoratorApplicationError extends AdornError {
  readonly decoratorId: string;

  constructor(decoratorId: string, target: string, reason: string, options?: ErrorOptions) {
    super(ErrorCode.DecoratorApplicationFailure, `Transform of decorator "${decoratorId}" on ${target} ${reason}`, options);

    this.decoratorId = decoratorId;
  }
}

/**
 * Definition Sealed Error
 * @description Initializers or parameter transforms were added after the class definition completed
 */
export class DefinitionSealedError extends AdornError {
  constructor(subject: string) {
    super(ErrorCode.DefinitionSealed, `${subject} can no longer be added once the class is defined`);
  }
}
