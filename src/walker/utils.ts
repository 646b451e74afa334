import type { RuntimeType, WalkerOptions } from './types';
import { isBoxedScalar, scalarRuntimeType } from './scalars';
import { hasIdentity, isNullish } from '../utils/type-guards';
import { attempt } from '../utils/unchecked';

/**
 * Library defaults.
 *
 * - `nullsIncluded`: `false` (absent members disappear with their key).
 * - `keysSorted` / `setsSorted`: `true` (deterministic output).
 * - `fieldsIncluded`: `true`; transient, static and accessor members are opt-in.
 * - `detectCycles`: `true` (prevents stack overflows).
 * - `fieldReadFailure`: `'throw'`, `accessorFailure`: `'omit'`.
 */
export const DEFAULT_OPTIONS: Readonly<WalkerOptions> = {
  nullsIncluded: false,
  keysSorted: true,
  setsSorted: true,
  transientFieldsIncluded: false,
  staticFieldsIncluded: false,
  gettersIncluded: false,
  fieldsIncluded: true,
  detectCycles: true,
  fieldReadFailure: 'throw',
  accessorFailure: 'omit'
};

/**
 * Merges the provided partial options with the library's default configuration.
 *
 * @param options - The user-provided partial options.
 * @returns A complete `WalkerOptions` object with all fields initialized.
 */
export function normalizeOptions(
  options: Partial<WalkerOptions> = {}
): WalkerOptions {
  return {
    ...DEFAULT_OPTIONS,
    ...options
  };
}

/**
 * Determines the runtime type reported to `classInclusionPredicate`.
 *
 * Logic:
 * 1. Boxed scalars and primitives report their wrapper constructor.
 * 2. Objects report `Object.getPrototypeOf(value).constructor`, when that is
 *    a function.
 * 3. Null-prototype objects (and prototypes without a usable constructor)
 *    report `null`.
 *
 * @param value - A non-null value.
 */
export function runtimeTypeOf(value: unknown): RuntimeType {
  if (isBoxedScalar(value)) return scalarRuntimeType(value);

  switch (typeof value) {
    case 'boolean':
      return Boolean;
    case 'number':
      return Number;
    case 'bigint':
      return BigInt;
    case 'string':
      return String;
    case 'symbol':
      return Symbol;
  }

  if (!hasIdentity(value)) return null;

  const prototype: unknown = Object.getPrototypeOf(value);
  if (!hasIdentity(prototype)) return null;

  const constructor: unknown = Reflect.get(prototype, 'constructor');
  return typeof constructor === 'function' ? constructor : null;
}

/**
 * Value-level inclusion filter.
 *
 * Rules:
 * 1. `null` / `undefined` pass only when `nullsIncluded` is on.
 * 2. Anything else passes unless `classInclusionPredicate` rejects its
 *    runtime type.
 *
 * A rejected value is dropped together with its key.
 */
export function isValueAccepted(value: unknown, options: WalkerOptions): boolean {
  if (isNullish(value)) return options.nullsIncluded;

  const predicate = options.classInclusionPredicate;
  if (!predicate) return true;

  return predicate(runtimeTypeOf(value));
}

/**
 * String form of an arbitrary value, for sorting and display.
 *
 * `String(value)` throws for null-prototype objects and for objects whose
 * `toString` throws; those fall back to their `Object.prototype.toString` tag
 * so comparisons never raise.
 */
export function toDisplayString(value: unknown): string {
  const rendered = attempt(() => String(value));
  if (rendered.ok) return rendered.value;
  return Object.prototype.toString.call(value);
}
