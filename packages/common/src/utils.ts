import type { AnyFunction, Class, MemberName } from './types';

export function isFunction(fn: unknown): fn is AnyFunction {
  return typeof fn === 'function';
}

export function isClass(target: unknown): target is Class {
  return typeof target === 'function' && typeof target.prototype === 'object' && target.prototype !== null;
}

/**
 * Checks that `value` is `base` itself or a constructor whose prototype chain reaches `base`.
 */
export function isDerivedClass<T extends Class>(value: unknown, base: T): value is T {
  if (!isClass(value)) {
    return false;
  }

  return value === base || value.prototype instanceof base;
}

export function isUndefined(obj: unknown): obj is undefined {
  return typeof obj === 'undefined';
}

export function isSymbol(fn: unknown): fn is symbol {
  return typeof fn === 'symbol';
}

export function formatMemberName(name: MemberName | undefined): string {
  if (isUndefined(name)) {
    return 'constructor';
  }

  return isSymbol(name) ? `[${name.description ?? 'symbol'}]` : name;
}
