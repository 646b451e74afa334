import type { BoxedScalar } from '../walker/scalars';
import {
  char,
  float32,
  float64,
  int8,
  int16,
  int32,
  int64
} from '../walker/scalars';

/**
 * Every typed-array view the walker boxes. `DataView` is excluded: it has no
 * element type.
 */
export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/**
 * Returns `true` for typed-array views (including Node's `Buffer`).
 */
export function isTypedArray(value: object): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Converts a typed array into boxed scalars of the matching width.
 *
 * Width mapping
 * -------------
 * Unsigned views are widened to the next signed kind that holds every value:
 * - `Int8Array` -> `int8`
 * - `Uint8Array`, `Uint8ClampedArray`, `Int16Array` -> `int16`
 * - `Uint16Array` -> `char` (one UTF-16 code unit per element)
 * - `Int32Array` -> `int32`
 * - `Uint32Array`, `BigInt64Array`, `BigUint64Array` -> `int64`
 * - `Float32Array` -> `float32`
 * - `Float64Array` -> `float64`
 *
 * @param array - The typed array to box.
 * @returns The boxed elements, in index order.
 */
export function boxTypedArray(array: TypedArray): BoxedScalar[] {
  if (array instanceof Int8Array) return Array.from(array, int8);
  if (
    array instanceof Uint8Array ||
    array instanceof Uint8ClampedArray ||
    array instanceof Int16Array
  ) {
    return Array.from(array, int16);
  }
  if (array instanceof Uint16Array) {
    return Array.from(array, unit => char(String.fromCharCode(unit)));
  }
  if (array instanceof Int32Array) return Array.from(array, int32);
  if (array instanceof Uint32Array) {
    return Array.from(array, unit => int64(BigInt(unit)));
  }
  if (array instanceof BigInt64Array || array instanceof BigUint64Array) {
    return Array.from(array, int64);
  }
  if (array instanceof Float32Array) return Array.from(array, float32);
  return Array.from(array, float64);
}
