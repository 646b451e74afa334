import type {
  AccessorDescriptor,
  FieldDescriptor,
  MemberKey,
  WalkerOptions
} from './types';
import { isFunction } from '../utils/type-guards';

/**
 * A member of a structural object, ready to be read.
 *
 * - `field`: an own property of the instance (or of its class, for statics).
 * - `accessor`: a getter found on the prototype chain.
 */
export type Member =
  | {
      origin: 'OBJECT_FIELD';
      displayName: string;
      descriptor: FieldDescriptor;
    }
  | {
      origin: 'OBJECT_ACCESSOR';
      displayName: string;
      descriptor: AccessorDescriptor;
      invoke: (target: object) => unknown;
    };

type DiscoveredAccessor = {
  descriptor: AccessorDescriptor;
  invoke: (target: object) => unknown;
};

/**
 * Accessor names that describe the object itself (identity, type,
 * prototype) rather than its data.
 */
const RESERVED_ACCESSOR_NAMES = new Set([
  'constructor',
  '__proto__',
  'getClass',
  'getConstructor',
  'getPrototype',
  'getPrototypeOf',
  'isPrototypeOf',
  'getOwnPropertyNames',
  'getOwnPropertyDescriptor',
  'getOwnPropertyDescriptors'
]);

/**
 * Own properties every function carries; never reported as static fields.
 */
const FUNCTION_OWN_PROPERTIES = new Set(['length', 'name', 'prototype']);

/**
 * Prototype-chain walk stops at these; their members are language built-ins.
 */
const CHAIN_ROOTS: readonly object[] = [Object.prototype, Function.prototype];

const GETTER_METHOD_PATTERN = /^(get|is)([A-Z0-9_$].*)$/;

/**
 * Names emitted by compilers and bundlers rather than written by the user
 * (`__esModule`, down-levelled helpers, ...).
 */
export function isSynthesizedName(name: string): boolean {
  return name.startsWith('__');
}

/**
 * Lower-cases the first letter: `Total` -> `total`.
 */
function decapitalize(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

/**
 * Collects the fields of `holder` that pass the structural filters.
 *
 * Rules:
 * 1. Compiler-synthesized names are rejected.
 * 2. Properties holding functions are behavior, not data, and are rejected.
 * 3. Non-enumerable (transient) properties pass only with
 *    `transientFieldsIncluded`.
 * 4. `fieldInclusionPredicate` has the last word.
 *
 * Property descriptors are inspected without invoking getters, so rejection
 * happens before the member is read.
 */
function collectFields(
  holder: object,
  isStatic: boolean,
  options: WalkerOptions
): FieldDescriptor[] {
  const fields: FieldDescriptor[] = [];

  for (const name of Object.getOwnPropertyNames(holder)) {
    if (isSynthesizedName(name)) continue;
    if (isStatic && FUNCTION_OWN_PROPERTIES.has(name)) continue;

    const property = Object.getOwnPropertyDescriptor(holder, name);
    if (!property) continue;

    const stored: unknown = property.value;
    if (isFunction(stored)) continue;

    const transient = property.enumerable !== true;
    if (transient && !options.transientFieldsIncluded) continue;

    const field: FieldDescriptor = {
      name,
      holder,
      transient,
      static: isStatic
    };
    if (
      options.fieldInclusionPredicate &&
      !options.fieldInclusionPredicate(field)
    ) {
      continue;
    }
    fields.push(field);
  }

  return fields;
}

/**
 * Class constructor whose own properties are the static fields of `value`.
 * Plain objects (`Object`) and null-prototype objects have none.
 */
function staticHolderOf(value: object): object | undefined {
  const prototype: unknown = Object.getPrototypeOf(value);
  if (typeof prototype !== 'object' || prototype === null) return undefined;
  if (CHAIN_ROOTS.includes(prototype)) return undefined;

  const constructor: unknown = Reflect.get(prototype, 'constructor');
  return isFunction(constructor) && constructor !== Object
    ? constructor
    : undefined;
}

/**
 * Recognizes a zero-argument accessor on a prototype.
 *
 * Accepted:
 * - `get name()` accessor properties (setter-only properties are not);
 * - zero-parameter `getXxx()` / `isXxx()` methods.
 *
 * Never accepted: non-public names (`_` prefix), reserved introspection names.
 */
function toAccessor(
  prototype: object,
  name: string
): DiscoveredAccessor | undefined {
  if (name.startsWith('_') || RESERVED_ACCESSOR_NAMES.has(name)) return undefined;

  const property = Object.getOwnPropertyDescriptor(prototype, name);
  if (!property) return undefined;

  const { get } = property;
  if (get) {
    return {
      descriptor: {
        name,
        style: 'property',
        propertyName: name,
        declaringPrototype: prototype
      },
      invoke: target => get.call(target)
    };
  }

  const method: unknown = property.value;
  if (!isFunction(method) || method.length !== 0) return undefined;

  const match = GETTER_METHOD_PATTERN.exec(name);
  if (!match) return undefined;

  return {
    descriptor: {
      name,
      style: 'method',
      propertyName: decapitalize(match[2]),
      declaringPrototype: prototype
    },
    invoke: target => Reflect.apply(method, target, [])
  };
}

/**
 * Collects accessors along the prototype chain of `value`.
 *
 * Logic:
 * 1. Walks from the object's prototype up to, excluding, `Object.prototype`
 *    / `Function.prototype`.
 * 2. The nearest declaration of a name wins (overrides shadow).
 * 3. Names that are own properties of `value` are fields, not accessors.
 */
function collectAccessors(value: object): DiscoveredAccessor[] {
  const accessors: DiscoveredAccessor[] = [];
  const seen = new Set<string>(Object.getOwnPropertyNames(value));

  let prototype: unknown = Object.getPrototypeOf(value);
  while (
    typeof prototype === 'object' &&
    prototype !== null &&
    !CHAIN_ROOTS.includes(prototype)
  ) {
    for (const name of Object.getOwnPropertyNames(prototype)) {
      if (seen.has(name)) continue;
      seen.add(name);

      const accessor = toAccessor(prototype, name);
      if (accessor) accessors.push(accessor);
    }
    prototype = Object.getPrototypeOf(prototype);
  }

  return accessors;
}

/**
 * Display name of a field: the configured rewrite, or the property name.
 */
function fieldDisplayName(field: FieldDescriptor, options: WalkerOptions) {
  return options.fieldNameFunction?.(field) ?? field.name;
}

function accessorDisplayName(
  accessor: AccessorDescriptor,
  options: WalkerOptions
) {
  return options.accessorNameFunction?.(accessor) ?? accessor.propertyName;
}

/**
 * Compares display names case-insensitively.
 *
 * Uses plain code-unit comparison on the lower-cased names rather than
 * `localeCompare`, so the order does not depend on the host locale.
 */
export function compareDisplayNames(left: string, right: string): number {
  const a = left.toLowerCase();
  const b = right.toLowerCase();
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Enumerates the members of a structural object in final order.
 *
 * Logic:
 * 1. Fields (unless `fieldsIncluded` is off): own properties, then, with
 *    `staticFieldsIncluded`, the own properties of the object's class.
 * 2. Accessors (with `gettersIncluded`): prototype-chain getters.
 * 3. Ordering: with `keysSorted`, the combined set is sorted by display
 *    name, case-insensitively. `Array.prototype.sort` is stable, so ties
 *    keep discovery order. Otherwise discovery order is kept.
 *
 * @param value - The object being composed.
 * @param options - The walker's current options.
 */
export function enumerateMembers(
  value: object,
  options: WalkerOptions
): Member[] {
  const members: Member[] = [];

  if (options.fieldsIncluded) {
    const fields = collectFields(value, false, options);

    const staticHolder = options.staticFieldsIncluded
      ? staticHolderOf(value)
      : undefined;
    if (staticHolder) fields.push(...collectFields(staticHolder, true, options));

    for (const field of fields) {
      members.push({
        origin: 'OBJECT_FIELD',
        displayName: fieldDisplayName(field, options),
        descriptor: field
      });
    }
  }

  if (options.gettersIncluded) {
    for (const { descriptor, invoke } of collectAccessors(value)) {
      members.push({
        origin: 'OBJECT_ACCESSOR',
        displayName: accessorDisplayName(descriptor, options),
        descriptor,
        invoke
      });
    }
  }

  if (options.keysSorted) {
    members.sort((left, right) =>
      compareDisplayNames(left.displayName, right.displayName)
    );
  }

  return members;
}

/**
 * Builds the key reported to the visitor for a member.
 */
export function memberKey(member: Member, owner: object): MemberKey {
  return { origin: member.origin, name: member.displayName, owner };
}
