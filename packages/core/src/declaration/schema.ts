import { isFunction, type AnyFunction } from '@adorn/common';
import { z } from 'zod';

import { FUNCTION_KINDS, MEMBER_KINDS } from './constants';
import type { DecoratorExpression } from './types';

export const decoratorRefSchema = z
  .object({
    id: z.string().min(1),
    expression: z.custom<DecoratorExpression>(isFunction, { message: 'Expected a decorator expression function' }),
  })
  .strict();

export const parameterSourceSchema = z
  .object({
    index: z.number().int().nonnegative().optional(),
    name: z.string().min(1).optional(),
    rest: z.boolean().optional(),
    decorators: z.array(decoratorRefSchema).optional(),
  })
  .strict();

export const memberSourceSchema = z
  .object({
    kind: z.enum(MEMBER_KINDS),
    name: z.union([z.string().min(1), z.symbol()]).optional(),
    private: z.boolean().optional(),
    decorators: z.array(decoratorRefSchema).optional(),
    parameters: z.array(parameterSourceSchema).optional(),
    implementation: z.custom<AnyFunction>(isFunction, { message: 'Expected a function' }).optional(),
  })
  .strict();

export const classSourceSchema = z
  .object({
    type: z.literal('class'),
    name: z.string().min(1).optional(),
    decorators: z.array(decoratorRefSchema).optional(),
    members: z.array(memberSourceSchema).optional(),
  })
  .strict();

export const functionSourceSchema = z
  .object({
    type: z.literal('function'),
    kind: z.enum(FUNCTION_KINDS),
    name: z.string().min(1).optional(),
    parameters: z.array(parameterSourceSchema).optional(),
  })
  .strict();

export const declarationSourceSchema = z.discriminatedUnion('type', [classSourceSchema, functionSourceSchema]);

export type DecoratorRefSource = z.input<typeof decoratorRefSchema>;

export type ParameterSource = z.input<typeof parameterSourceSchema>;

export type MemberSource = z.input<typeof memberSourceSchema>;

export type ClassSource = z.input<typeof classSourceSchema>;

export type FunctionSource = z.input<typeof functionSourceSchema>;

export type DeclarationSource = z.input<typeof declarationSourceSchema>;
