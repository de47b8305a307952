import type { FUNCTION_KINDS, MEMBER_KINDS } from './constants';

export type MemberKind = (typeof MEMBER_KINDS)[number];

export type FunctionKind = (typeof FUNCTION_KINDS)[number];

export type DecoratorExpression = () => unknown;
