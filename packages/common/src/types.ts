export type Class<T = object> = new (...args: any[]) => T;

export type AnyFunction = (...args: unknown[]) => unknown;

export type MemberName = string | symbol;
