/**
 * Guard verifying the value is absent.
 *
 * Note:
 * The walker does not distinguish `null` from `undefined`; both are reported
 * through the single null visit.
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value carries a reference identity.
 *
 * Only objects and functions can be told apart by `===` without comparing
 * their contents; primitives compare by value and are never considered
 * identical ancestors.
 *
 * @param value
 *   Candidate runtime value to test.
 * @returns
 *   `true` iff {@link value} is a non-null object or a function.
 */
export function hasIdentity(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) ||
    typeof value === 'function'
  );
}

/** Guard verifying the value is a function. */
export function isFunction(
  value: unknown
): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

/**
 * Guard verifying the value can be consumed with `for...of`.
 *
 * Note:
 * Strings are iterable too, but they are classified as scalars long before
 * this guard is consulted, so it only ever sees objects.
 */
export function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && isFunction(value[Symbol.iterator]);
}
