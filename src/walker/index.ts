import type {
  Constructor,
  TraversalVisitor,
  WalkerOptions
} from './types';
import type { WalkContext } from './composers';

import { createTypeAdapterRegistry } from './adapters';
import {
  composeKeyValueObject,
  composeMap,
  composeSequence
} from './composers';
import { createCycleGuard } from './cycle-guard';
import { orderSetElements } from './ordering';
import { emitScalar, primitiveScalar, toScalar } from './scalars';
import { normalizeOptions } from './utils';
import { WalkerBusyError } from '../errors';
import { boxTypedArray, isTypedArray } from '../utils/array-utils';
import { hasIdentity, isIterable } from '../utils/type-guards';

export type ObjectWalker = {
  /**
   * Walks `value` depth-first, reporting its structure to `visitor`.
   *
   * Runs synchronously to completion. Errors thrown by the visitor, and
   * fatal member failures, propagate to the caller; the walker is left
   * ready for the next walk either way.
   *
   * @throws {WalkerBusyError} When called from inside a walk of the same walker.
   */
  walk(value: unknown, visitor: TraversalVisitor): void;

  /**
   * Rewrites instances of `type` (and its subclasses) before introspection.
   * The rewritten value is classified from scratch.
   */
  registerAdapter<T>(type: Constructor<T>, rewrite: (value: T) => unknown): void;

  /**
   * Registers rewrites for `Date`, `URL`, `URLSearchParams` and `RegExp`.
   */
  registerBuiltinAdapters(): void;

  /**
   * Merges `options` into the current configuration. Takes effect from the
   * next walk.
   */
  configure(options: Partial<WalkerOptions>): void;

  readonly options: Readonly<WalkerOptions>;

  /**
   * Nesting level of the walk in progress (0 between walks).
   */
  readonly depth: number;
};

/**
 * Classifies a value and routes it to its visit or composer.
 *
 * Precedence (first match wins):
 * 1. Primitives                               -> one visit per kind;
 *                                                 `visitNull` for `null` and
 *                                                 `undefined`
 * 2. Scalar objects (boxed, wrapper)            -> one visit per kind
 * 3. `Map`                                      -> map composer
 * 4. `Set`                                      -> ordered, then sequence
 * 5. Typed arrays                               -> boxed, then sequence
 * 6. Arrays                                     -> sequence
 * 7. Other iterables                            -> sequence
 * 8. Everything else                            -> adapter, or structural object
 *
 * Order matters: maps, sets and typed arrays are iterable too, and must be
 * recognized before the general iterable case.
 */
function dispatch(
  value: unknown,
  context: WalkContext,
  resolveAdapter: (value: object) => ((value: object) => unknown) | undefined
): void {
  const { visitor, options } = context;

  if (!hasIdentity(value)) {
    const primitive = primitiveScalar(value);
    return primitive ? emitScalar(primitive, visitor) : visitor.visitNull();
  }

  const scalar = toScalar(value);
  if (scalar) return emitScalar(scalar, visitor);

  if (value instanceof Map) return composeMap(value, context);

  if (value instanceof Set) {
    return composeSequence(
      value,
      context,
      orderSetElements(value, options.setsSorted)
    );
  }

  if (isTypedArray(value)) {
    return composeSequence(value, context, boxTypedArray(value));
  }

  if (Array.isArray(value) || isIterable(value)) {
    return composeSequence(value, context);
  }

  const adapter = resolveAdapter(value);
  if (adapter) {
    const rewritten = adapter(value);
    // A rewrite returning its input would re-enter this branch forever.
    if (rewritten !== value) return context.dispatch(rewritten);
  }

  composeKeyValueObject(value, context);
}

/**
 * Creates a walker with its own configuration, adapter registry and
 * traversal context.
 *
 * Lifecycle of a walk
 * -------------------
 * 1. Snapshot:
 *    The options in force when `walk` starts apply to the whole walk.
 * 2. Root:
 *    The root value is pushed on the ancestor stack, so a back-reference to
 *    the root is detected like any other.
 * 3. Reset:
 *    Whatever happens, the stack is emptied and the depth returns to 0 when
 *    `walk` returns or throws.
 *
 * A walker is not re-entrant; use one walker per concurrent walk.
 *
 * @param options - Partial options merged over the defaults.
 */
export function createObjectWalker(
  options: Partial<WalkerOptions> = {}
): ObjectWalker {
  let current = normalizeOptions(options);
  let active: WalkContext | undefined;

  const registry = createTypeAdapterRegistry();
  const guard = createCycleGuard(() => active?.options ?? current);

  return {
    walk(value, visitor) {
      if (active) throw new WalkerBusyError();

      const context: WalkContext = {
        options: current,
        visitor,
        guard,
        state: { depth: 0 },
        dispatch: child => dispatch(child, context, registry.resolve)
      };
      active = context;

      try {
        const decision = guard.enter(value);
        if (decision.type === 'skip') return;

        try {
          context.dispatch(decision.value);
        } finally {
          guard.leave();
        }
      } finally {
        guard.reset();
        active = undefined;
      }
    },

    registerAdapter(type, rewrite) {
      registry.register(type, rewrite);
    },

    registerBuiltinAdapters() {
      registry.registerBuiltins();
    },

    configure(partial) {
      current = { ...current, ...partial };
    },

    get options() {
      return current;
    },

    get depth() {
      return active?.state.depth ?? 0;
    }
  };
}
