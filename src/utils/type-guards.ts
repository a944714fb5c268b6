export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  string: string;
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

/** Guard verifying the value is undefined. */
export const isUndefined = is('undefined');

/**
 * Guard verifying the value is `null`.
 *
 * Note:
 * `typeof null === "object"`, so it cannot be expressed via the `is(...)` factory.
 */
export function isNull(value: unknown): value is null {
  return value === null;
}

/**
 * Guard verifying the value is absent on the wire: `null` or `undefined`.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return isNull(value) || isUndefined(value);
}

/**
 * Mapping of complex runtime categories to corresponding TypeScript types.
 * Used by the {@link isComplex} factory.
 */
type ComplexTypeMap = {
  object: Record<string, unknown>;
  array: unknown[];
};

/**
 * Creates a guard for a complex runtime category.
 *
 * Semantics:
 * - `'object'`: non-null, non-array object (plain records and class instances).
 * - `'array'`: `Array.isArray`.
 */
export function isComplex<T extends keyof ComplexTypeMap>(
  type: T
): Guard<ComplexTypeMap[T]> {
  return (value: unknown): value is ComplexTypeMap[T] => {
    if (value === null) return false;

    if (type === 'array') {
      return Array.isArray(value);
    }

    if (type === 'object') {
      return typeof value === 'object' && !Array.isArray(value);
    }

    return false;
  };
}

/** Guard verifying the value is a non-null object (excluding arrays). */
export const isObject = isComplex('object');

/** Guard verifying the value is an array. */
export const isArray = isComplex('array');
