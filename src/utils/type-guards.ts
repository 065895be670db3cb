export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/** Guard verifying the value is a symbol. */
export const isSymbol = is('symbol');

/** Guard verifying the value is undefined. */
export const isUndefined = is('undefined');

/**
 * Guard verifying the value is `null`.
 *
 * `typeof null === "object"`, so it cannot be expressed via {@link is}.
 */
export function isNull(value: unknown): value is null {
  return value === null;
}

/**
 * Guard verifying the value is a finite number.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1.5, -0
 * - false for:  NaN, Infinity, -Infinity, non-numbers
 */
export function isFiniteValue(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value);
}

/** Guard verifying the value is a function. */
export function isFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === 'function';
}

/** Guard verifying the value is an array. */
export function isArray(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

/**
 * Guard verifying the value is a plain object: created by an object
 * literal or `Object.create(null)`.
 *
 * Arrays, class instances, `Date`, `Map` and other built-ins are rejected
 * because JSON encoding would drop or reshape their contents.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
