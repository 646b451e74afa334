/**
 * Constructor of a value, as seen by class-level inclusion predicates.
 *
 * - Objects: their prototype's `constructor` (`null` for null-prototype objects).
 * - Primitives and boxed scalars: the wrapper constructor
 *   (`Boolean`, `Number`, `BigInt`, `String`, `Symbol`).
 */
export type RuntimeType = Function | null;

/**
 * Any class whose instances an adapter can be registered for.
 *
 * @template T - The instance type produced by the constructor.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Lifecycle events emitted around composites and their children.
 *
 * Cadence for a composite with two children:
 * `ENTER`, `BEFORE_CHILD`, child, `AFTER_CHILD`, `BETWEEN_CHILDREN`,
 * `BEFORE_CHILD`, child, `AFTER_CHILD`, `LEAVE`.
 */
export type VisitEvent =
  | 'ENTER'
  | 'LEAVE'
  | 'BEFORE_CHILD'
  | 'AFTER_CHILD'
  | 'BETWEEN_CHILDREN';

/**
 * The two flavors of composites with named children.
 */
export type KeyValueObjectKind = 'MAP' | 'OBJECT';

/**
 * Where a key comes from.
 */
export type KeyOrigin = 'OBJECT_FIELD' | 'OBJECT_ACCESSOR' | 'CONTAINER_KEY';

/**
 * A named slot of a structural object: a field or an accessor.
 */
export type MemberKey = {
  origin: 'OBJECT_FIELD' | 'OBJECT_ACCESSOR';
  /**
   * Display name, after `fieldNameFunction` / `accessorNameFunction`.
   */
  name: string;
  owner: object;
};

/**
 * A key of a `Map` entry. The key itself is reported, whatever its type.
 */
export type ContainerKey = {
  origin: 'CONTAINER_KEY';
  name: unknown;
  owner: ReadonlyMap<unknown, unknown>;
};

export type Key = MemberKey | ContainerKey;

/**
 * Read-only view of the walk in progress, handed to every lifecycle callback.
 */
export type TraversalState = {
  /**
   * Current nesting level, 0 at the root.
   *
   * Incremented before a composite's `ENTER` and decremented before its
   * `LEAVE`, so children observe their parent's level + 1.
   */
  readonly depth: number;
};

/**
 * Consumer of walk events.
 *
 * Scalar visits are mandatory: each of the closed set of scalar kinds has
 * exactly one method. Key and lifecycle callbacks are optional.
 */
export interface TraversalVisitor {
  visitNull(): void;
  visitBoolean(value: boolean): void;
  visitInt8(value: number): void;
  visitInt16(value: number): void;
  visitInt32(value: number): void;
  visitInt64(value: bigint): void;
  visitFloat32(value: number): void;
  visitFloat64(value: number): void;
  /**
   * A single UTF-16 code unit.
   */
  visitChar(value: string): void;
  visitString(value: string): void;
  visitEnum(value: symbol): void;

  visitKey?(key: Key, state: TraversalState): void;

  onKeyValueObjectEvent?(
    event: VisitEvent,
    kind: KeyValueObjectKind,
    owner: object,
    state: TraversalState
  ): void;

  onSequenceEvent?(
    event: VisitEvent,
    sequence: Iterable<unknown>,
    state: TraversalState
  ): void;
}

/**
 * A structural field discovered on an object (or, for statics, on its class).
 */
export type FieldDescriptor = {
  /**
   * Own property name.
   */
  name: string;
  /**
   * The object the property is read from: the instance, or its constructor
   * for static fields.
   */
  holder: object;
  /**
   * `true` for non-enumerable properties.
   */
  transient: boolean;
  static: boolean;
};

/**
 * A zero-argument accessor discovered on an object's prototype chain.
 */
export type AccessorDescriptor = {
  /**
   * Property name on the prototype (`total` for `get total()`, `getTotal`
   * for a `getTotal()` method).
   */
  name: string;
  /**
   * - `'property'`: a `get` accessor.
   * - `'method'`: a zero-parameter `getXxx()` / `isXxx()` method.
   */
  style: 'property' | 'method';
  /**
   * Name with any `get` / `is` prefix removed and the first letter
   * lower-cased; used as the default display name.
   */
  propertyName: string;
  declaringPrototype: object;
};

/**
 * What to do when reading a member fails.
 *
 * - `'throw'`: abort the walk with a typed error.
 * - `'omit'`: log a warning and drop the member.
 */
export type MemberFailurePolicy = 'throw' | 'omit';

export type WalkerOptions = {
  /**
   * Emit members and elements whose value is `null` / `undefined`.
   * When `false`, the key is dropped together with the value.
   *
   * @default false
   */
  nullsIncluded: boolean;

  /**
   * Sort object members case-insensitively by display name, and map entries
   * by natural key order (falling back to the keys' string form).
   *
   * @default true
   */
  keysSorted: boolean;

  /**
   * Sort set elements by natural order, when all of them are mutually
   * comparable. Sets marked with `markSorted` keep their order.
   *
   * @default true
   */
  setsSorted: boolean;

  /**
   * Include non-enumerable own properties.
   *
   * @default false
   */
  transientFieldsIncluded: boolean;

  /**
   * Include the own properties of the object's class constructor.
   *
   * @default false
   */
  staticFieldsIncluded: boolean;

  /**
   * Include `get` accessors and zero-parameter `getXxx()` / `isXxx()`
   * methods found on the prototype chain.
   *
   * @default false
   */
  gettersIncluded: boolean;

  /**
   * Include own data properties. Turning this off together with
   * `gettersIncluded` gives an accessor-only view of objects.
   *
   * @default true
   */
  fieldsIncluded: boolean;

  /**
   * Guard against references back to an ancestor on the current path.
   *
   * - Path-scoped, not global: two siblings may reference the same object.
   * - If `false`, cyclic graphs overflow the call stack.
   *
   * @default true
   */
  detectCycles: boolean;

  /**
   * Rejects fields before they are read.
   */
  fieldInclusionPredicate?: (field: FieldDescriptor) => boolean;

  /**
   * Rejects values by runtime type. A rejected value is dropped together with
   * its key.
   */
  classInclusionPredicate?: (type: RuntimeType) => boolean;

  /**
   * Value visited in place of a back-reference to an ancestor.
   * When unset, the back-reference is dropped together with its key.
   * Only consulted when `detectCycles` is on.
   */
  alreadyVisitedReplacementFunction?: (value: unknown) => unknown;

  fieldNameFunction?: (field: FieldDescriptor) => string;

  accessorNameFunction?: (accessor: AccessorDescriptor) => string;

  /**
   * @default 'throw'
   */
  fieldReadFailure: MemberFailurePolicy;

  /**
   * @default 'omit'
   */
  accessorFailure: MemberFailurePolicy;
};

/**
 * A registered rewrite, applied to a value before structural introspection.
 */
export type TypeAdapter = (value: object) => unknown;
