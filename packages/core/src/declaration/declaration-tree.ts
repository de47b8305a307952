import {
  formatMemberName,
  InvalidDeclarationError,
  InvalidDecoratorTargetError,
  type DeclarationIssue,
} from '@adorn/common';

import type { ClassNode, DecoratorRef, MemberNode, ParameterNode } from './interfaces';
import {
  declarationSourceSchema,
  type ClassSource,
  type DeclarationSource,
  type DecoratorRefSource,
  type FunctionSource,
  type MemberSource,
  type ParameterSource,
} from './schema';
import type { DecoratorExpression } from './types';

/**
 * Shorthand for one decorator occurrence in a declaration source.
 */
export function decoratorRef(id: string, expression: DecoratorExpression): DecoratorRefSource {
  return { id, expression };
}

/**
 * Checks the shape of an untrusted declaration description.
 */
export function validateDeclarationSource(input: unknown): DeclarationSource {
  const parsed = declarationSourceSchema.safeParse(input);

  if (!parsed.success) {
    throw new InvalidDeclarationError(
      parsed.error.issues.map(issue => ({ path: issue.path.map(String).join('.'), message: issue.message })),
    );
  }

  return parsed.data;
}

/**
 * Validates a declaration source and builds its frozen declaration tree.
 *
 * Function sources never produce a tree: they are rejected with `InvalidDecoratorTargetError`
 * when any parameter is decorated, and yield `undefined` otherwise. Nothing is evaluated here.
 */
export function createDeclarationTree(source: ClassSource): ClassNode;
export function createDeclarationTree(source: DeclarationSource): ClassNode | undefined;
export function createDeclarationTree(source: DeclarationSource): ClassNode | undefined {
  const declaration = validateDeclarationSource(source);

  if (declaration.type === 'function') {
    assertUndecoratedFunction(declaration);

    return undefined;
  }

  assertWellFormedClass(declaration);

  return Object.freeze({
    name: declaration.name,
    decorators: freezeDecorators(declaration.decorators),
    members: Object.freeze((declaration.members ?? []).map(buildMember)),
  });
}

function assertUndecoratedFunction(source: FunctionSource): void {
  const issues = collectParameterIssues(source.parameters ?? [], 'parameters');
  if (issues.length > 0) {
    throw new InvalidDeclarationError(issues);
  }

  const decorated = (source.parameters ?? []).findIndex(parameter => (parameter.decorators ?? []).length > 0);
  if (decorated !== -1) {
    throw new InvalidDecoratorTargetError(
      `parameter ${decorated} of ${source.kind} ${source.name ?? '<anonymous>'}`,
      'only class constructors, methods and setters accept parameter decorators',
    );
  }
}

function assertWellFormedClass(source: ClassSource): void {
  const issues: DeclarationIssue[] = [];
  const members = source.members ?? [];

  if (members.filter(member => member.kind === 'constructor').length > 1) {
    issues.push({ path: 'members', message: 'A class declares at most one constructor' });
  }

  members.forEach((member, index) => {
    issues.push(...collectMemberIssues(member, `members.${index}`));
  });

  if (issues.length > 0) {
    throw new InvalidDeclarationError(issues);
  }

  const decoratedConstructor = members.find(
    member => member.kind === 'constructor' && (member.decorators ?? []).length > 0,
  );
  if (decoratedConstructor) {
    throw new InvalidDecoratorTargetError(
      `the constructor of class ${source.name ?? '<anonymous>'}`,
      'decorate the class instead',
    );
  }
}

function collectMemberIssues(member: MemberSource, path: string): DeclarationIssue[] {
  const issues: DeclarationIssue[] = [];
  const parameters = member.parameters ?? [];

  if (member.kind === 'constructor') {
    if (member.name !== undefined) {
      issues.push({ path: `${path}.name`, message: 'A constructor has no name' });
    }
    if (member.private) {
      issues.push({ path: `${path}.private`, message: 'A constructor cannot be private' });
    }
  } else if (member.name === undefined) {
    issues.push({ path: `${path}.name`, message: `A ${member.kind} member needs a name` });
  }

  if (member.kind === 'setter' || member.kind === 'static-setter') {
    if (parameters.length !== 1) {
      issues.push({ path: `${path}.parameters`, message: 'A setter takes exactly one parameter' });
    } else if (parameters[0]?.rest) {
      issues.push({ path: `${path}.parameters.0.rest`, message: 'A setter parameter cannot be a rest parameter' });
    }
  }

  if (member.private && !member.implementation) {
    issues.push({
      path: `${path}.implementation`,
      message: `Private member ${formatMemberName(member.name)} needs an explicit implementation`,
    });
  }

  issues.push(...collectParameterIssues(parameters, `${path}.parameters`));

  return issues;
}

function collectParameterIssues(parameters: ReadonlyArray<ParameterSource>, path: string): DeclarationIssue[] {
  const issues: DeclarationIssue[] = [];

  parameters.forEach((parameter, position) => {
    if (parameter.index !== undefined && parameter.index !== position) {
      issues.push({
        path: `${path}.${position}.index`,
        message: `Expected index ${position}, received ${parameter.index}`,
      });
    }

    if (parameter.rest && position !== parameters.length - 1) {
      issues.push({ path: `${path}.${position}.rest`, message: 'A rest parameter must be the last parameter' });
    }
  });

  return issues;
}

function buildMember(source: MemberSource): MemberNode {
  return Object.freeze({
    kind: source.kind,
    name: source.name,
    private: source.private ?? false,
    decorators: freezeDecorators(source.decorators),
    parameters: Object.freeze((source.parameters ?? []).map(buildParameter)),
    implementation: source.implementation,
  });
}

function buildParameter(source: ParameterSource, index: number): ParameterNode {
  return Object.freeze({
    index,
    name: source.name,
    rest: source.rest ?? false,
    decorators: freezeDecorators(source.decorators),
  });
}

function freezeDecorators(sources: ReadonlyArray<DecoratorRefSource> = []): ReadonlyArray<DecoratorRef> {
  return Object.freeze(sources.map(source => Object.freeze({ id: source.id, expression: source.expression })));
}
