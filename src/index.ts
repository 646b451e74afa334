export type {
  AccessorDescriptor,
  Constructor,
  ContainerKey,
  FieldDescriptor,
  Key,
  KeyOrigin,
  KeyValueObjectKind,
  MemberFailurePolicy,
  MemberKey,
  RuntimeType,
  TraversalState,
  TraversalVisitor,
  TypeAdapter,
  VisitEvent,
  WalkerOptions
} from './walker/types';
export type { ObjectWalker } from './walker';
export type {
  BoxedScalar,
  BoxedScalarOf,
  ScalarKind,
  ScalarValueMap
} from './walker/scalars';
export type { Comparable } from './walker/ordering';
export type { TypeAdapterRegistry } from './walker/adapters';
export type { TypedArray } from './utils/array-utils';
export type { LogLevel, LogMeta } from './logger';

export { createObjectWalker } from './walker';
export {
  boxScalar,
  char,
  enumerant,
  float32,
  float64,
  int8,
  int16,
  int32,
  int64,
  isBoxedScalar
} from './walker/scalars';
export { markSorted } from './walker/ordering';
export {
  BUILTIN_ADAPTERS,
  createTypeAdapterRegistry
} from './walker/adapters';
export { DEFAULT_OPTIONS, normalizeOptions } from './walker/utils';
export { boxTypedArray, isTypedArray } from './utils/array-utils';
export {
  AccessorInvocationError,
  FieldReadError,
  WalkerBusyError
} from './errors';
export { log, resetLogger, resolveLogLevel } from './logger';
export { createJson5Dumper, dumpJson5 } from './json5';
