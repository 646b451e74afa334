import type { RuntimeType, TraversalVisitor } from './types';

/**
 * The closed set of terminal value kinds.
 *
 * Every kind maps to exactly one visitor method (see {@link emitScalar}).
 * Plain JavaScript values only ever produce `boolean`, `int64` (bigint),
 * `float64` (number), `string` and `enum` (symbol); the narrower widths
 * come from typed arrays or explicit boxing.
 */
export type ScalarKind =
  | 'boolean'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'char'
  | 'string'
  | 'enum';

/**
 * Runtime representation carried by each scalar kind.
 */
export type ScalarValueMap = {
  boolean: boolean;
  int8: number;
  int16: number;
  int32: number;
  int64: bigint;
  float32: number;
  float64: number;
  char: string;
  string: string;
  enum: symbol;
};

const BOXED_SCALAR = Symbol('object-graph-walker.boxed-scalar');

/**
 * A scalar of one specific kind, stated explicitly rather than inferred from
 * `typeof`.
 */
export type BoxedScalarOf<K extends ScalarKind> = {
  readonly [BOXED_SCALAR]: true;
  readonly kind: K;
  readonly value: ScalarValueMap[K];
};

/**
 * Any boxed scalar.
 *
 * Distributes over {@link ScalarKind}, so switching on `kind` narrows `value`.
 */
export type BoxedScalar = { [K in ScalarKind]: BoxedScalarOf<K> }[ScalarKind];

/**
 * Creates a boxed scalar of the given kind.
 *
 * @example
 * ```ts
 * walker.walk([boxScalar('int32', 8), boxScalar('int32', 9)], visitor);
 * ```
 */
export function boxScalar<K extends ScalarKind>(
  kind: K,
  value: ScalarValueMap[K]
): BoxedScalarOf<K> {
  return { [BOXED_SCALAR]: true, kind, value };
}

export const int8 = (value: number) => boxScalar('int8', value);
export const int16 = (value: number) => boxScalar('int16', value);
export const int32 = (value: number) => boxScalar('int32', value);
export const int64 = (value: bigint) => boxScalar('int64', value);
export const float32 = (value: number) => boxScalar('float32', value);
export const float64 = (value: number) => boxScalar('float64', value);
export const enumerant = (value: symbol) => boxScalar('enum', value);

/**
 * Boxes a single UTF-16 code unit.
 *
 * @throws If `value` is not exactly one code unit long.
 */
export function char(value: string) {
  if (value.length !== 1) {
    throw new Error(
      `A char must be a single UTF-16 code unit, received ${JSON.stringify(value)}.`
    );
  }
  return boxScalar('char', value);
}

export function isBoxedScalar(value: unknown): value is BoxedScalar {
  return (
    typeof value === 'object' &&
    value !== null &&
    BOXED_SCALAR in value &&
    value[BOXED_SCALAR] === true
  );
}

/**
 * Classifies a primitive by `typeof`.
 *
 * @returns The boxed form, or `undefined` for `null` and `undefined`.
 */
export function primitiveScalar(value: unknown): BoxedScalar | undefined {
  switch (typeof value) {
    case 'boolean':
      return boxScalar('boolean', value);
    case 'bigint':
      return boxScalar('int64', value);
    case 'number':
      return boxScalar('float64', value);
    case 'symbol':
      return boxScalar('enum', value);
    case 'string':
      return boxScalar('string', value);
  }
  return undefined;
}

/**
 * Classifies an object as a scalar, if it is one.
 *
 * Logic:
 * 1. Boxed scalars keep their declared kind.
 * 2. Wrapper objects (`new Number(1)`, `Object(1n)`, ...) are unboxed and
 *    classified like their primitive.
 *
 * @returns The boxed form, or `undefined` when the object is not a scalar.
 */
export function toScalar(value: object): BoxedScalar | undefined {
  if (isBoxedScalar(value)) return value;

  if (value instanceof Boolean) return boxScalar('boolean', value.valueOf());
  if (value instanceof BigInt) return boxScalar('int64', value.valueOf());
  if (value instanceof Number) return boxScalar('float64', value.valueOf());
  if (value instanceof String) return boxScalar('string', value.valueOf());

  return undefined;
}

/**
 * Routes a scalar to the visitor method of its kind.
 */
export function emitScalar(
  scalar: BoxedScalar,
  visitor: TraversalVisitor
): void {
  switch (scalar.kind) {
    case 'boolean':
      return visitor.visitBoolean(scalar.value);
    case 'int8':
      return visitor.visitInt8(scalar.value);
    case 'int16':
      return visitor.visitInt16(scalar.value);
    case 'int32':
      return visitor.visitInt32(scalar.value);
    case 'int64':
      return visitor.visitInt64(scalar.value);
    case 'float32':
      return visitor.visitFloat32(scalar.value);
    case 'float64':
      return visitor.visitFloat64(scalar.value);
    case 'char':
      return visitor.visitChar(scalar.value);
    case 'string':
      return visitor.visitString(scalar.value);
    case 'enum':
      return visitor.visitEnum(scalar.value);
  }
}

/**
 * Wrapper constructor standing in for the runtime type of a scalar, so a
 * class inclusion predicate sees the same type for `1`, `new Number(1)` and
 * `int32(1)`.
 */
export function scalarRuntimeType(scalar: BoxedScalar): RuntimeType {
  switch (scalar.kind) {
    case 'boolean':
      return Boolean;
    case 'int64':
      return BigInt;
    case 'char':
    case 'string':
      return String;
    case 'enum':
      return Symbol;
    default:
      return Number;
  }
}
