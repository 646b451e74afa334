import { attempt, describeError } from '../utils/unchecked';
import { isFunction } from '../utils/type-guards';
import { log } from '../logger';
import { toDisplayString } from './utils';

/**
 * Values that define their own ordering.
 *
 * `a.compareTo(b)` returns a negative number, zero or a positive number when
 * `a` sorts before, with or after `b`.
 */
export type Comparable = {
  compareTo(other: unknown): number;
};

/**
 * Categories of values with a natural ordering. Two values are mutually
 * comparable iff they fall in the same category.
 */
type NaturalCategory =
  | 'number'
  | 'bigint'
  | 'string'
  | 'boolean'
  | 'date'
  | 'comparable';

const SORTED_COLLECTION = Symbol('object-graph-walker.sorted-collection');

/**
 * Marks a set (or any collection) as already ordered, so `setsSorted` leaves
 * its iteration order untouched.
 *
 * @returns The same collection, for chaining.
 */
export function markSorted<T extends object>(collection: T): T {
  Object.defineProperty(collection, SORTED_COLLECTION, {
    value: true,
    enumerable: false
  });
  return collection;
}

export function isMarkedSorted(collection: object): boolean {
  return (
    SORTED_COLLECTION in collection && collection[SORTED_COLLECTION] === true
  );
}

function isComparable(value: unknown): value is Comparable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'compareTo' in value &&
    isFunction(value.compareTo)
  );
}

function naturalCategoryOf(value: unknown): NaturalCategory | undefined {
  switch (typeof value) {
    case 'number':
      return 'number';
    case 'bigint':
      return 'bigint';
    case 'string':
      return 'string';
    case 'boolean':
      return 'boolean';
  }
  if (value instanceof Date) return 'date';
  if (isComparable(value)) return 'comparable';
  return undefined;
}

function compareOrdered<T extends number | bigint | string>(
  left: T,
  right: T
): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * Numeric comparison with `NaN` sorting after every number.
 */
function compareNumbers(left: number, right: number): number {
  if (Number.isNaN(left)) return Number.isNaN(right) ? 0 : 1;
  if (Number.isNaN(right)) return -1;
  return compareOrdered(left, right);
}

/**
 * Compares two values of the same natural category.
 *
 * Precondition:
 * Both values belong to `category`; callers check this first.
 */
function compareWithin(
  category: NaturalCategory,
  left: unknown,
  right: unknown
): number {
  switch (category) {
    case 'number':
      return typeof left === 'number' && typeof right === 'number'
        ? compareNumbers(left, right)
        : 0;
    case 'bigint':
      return typeof left === 'bigint' && typeof right === 'bigint'
        ? compareOrdered(left, right)
        : 0;
    case 'string':
      return typeof left === 'string' && typeof right === 'string'
        ? compareOrdered(left, right)
        : 0;
    case 'boolean':
      return Number(left === true) - Number(right === true);
    case 'date':
      if (left instanceof Date && right instanceof Date) {
        return compareNumbers(left.getTime(), right.getTime());
      }
      return 0;
    case 'comparable':
      return isComparable(left) ? left.compareTo(right) : 0;
  }
}

/**
 * Comparator for map keys.
 *
 * Logic:
 * 1. Natural Order:
 *    When both keys fall in the same natural category (numbers, bigints,
 *    strings, booleans, dates, or objects exposing `compareTo`), compare them
 *    naturally. `NaN` and invalid dates sort last.
 * 2. Fallback:
 *    Otherwise compare their display strings, so a mix of comparable and
 *    non-comparable keys never raises.
 */
export function compareKeys(left: unknown, right: unknown): number {
  const leftCategory = naturalCategoryOf(left);
  if (leftCategory && leftCategory === naturalCategoryOf(right)) {
    return compareWithin(leftCategory, left, right);
  }
  return compareOrdered(toDisplayString(left), toDisplayString(right));
}

/**
 * Returns map keys in final iteration order.
 */
export function orderMapKeys(
  map: ReadonlyMap<unknown, unknown>,
  sorted: boolean
): unknown[] {
  const keys = Array.from(map.keys());
  return sorted ? keys.sort(compareKeys) : keys;
}

/**
 * Returns set elements in final iteration order (best effort).
 *
 * Logic:
 * 1. Opt-out:
 *    Sorting disabled, or the set is marked as already ordered: keep the
 *    insertion order.
 * 2. Mutual comparability:
 *    Every element must fall in the same natural category; otherwise keep
 *    the insertion order.
 * 3. Sort:
 *    A `compareTo` that throws also falls back to the insertion order.
 */
export function orderSetElements(
  set: ReadonlySet<unknown>,
  sorted: boolean
): unknown[] {
  const elements = Array.from(set);
  if (!sorted || isMarkedSorted(set) || elements.length < 2) return elements;

  const category = naturalCategoryOf(elements[0]);
  if (!category) return elements;
  if (!elements.every(element => naturalCategoryOf(element) === category)) {
    return elements;
  }

  const outcome = attempt(() =>
    [...elements].sort((left, right) => compareWithin(category, left, right))
  );
  if (outcome.ok) return outcome.value;

  log.debug('Set elements are not mutually comparable; keeping insertion order.', {
    reason: describeError(outcome.error)
  });
  return elements;
}
