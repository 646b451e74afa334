import type {
  Key,
  KeyValueObjectKind,
  TraversalVisitor,
  VisitEvent,
  WalkerOptions
} from './types';
import type { CycleGuard } from './cycle-guard';
import type { Member } from './members';

import { enumerateMembers, memberKey } from './members';
import { orderMapKeys } from './ordering';
import { isValueAccepted } from './utils';
import { AccessorInvocationError, FieldReadError } from '../errors';
import { log } from '../logger';
import { attempt, describeError, runUnchecked } from '../utils/unchecked';

/**
 * Mutable per-walk state shared by the composers.
 */
export type WalkContext = {
  readonly options: WalkerOptions;
  readonly visitor: TraversalVisitor;
  readonly guard: CycleGuard;
  readonly state: { depth: number };
  /**
   * Re-enters classification for a child value.
   */
  readonly dispatch: (value: unknown) => void;
};

/**
 * A child of a keyed composite, after reading and before filtering.
 */
type KeyedChild = { key: Key; value: unknown };

/**
 * Wraps a composite body in `ENTER` / `LEAVE`.
 *
 * Depth is incremented before `ENTER` and decremented before `LEAVE`; the
 * decrement runs in `finally`, so a failing child leaves the depth balanced.
 * `LEAVE` is only emitted when the body completed.
 */
function withinComposite(
  context: WalkContext,
  emit: (event: VisitEvent) => void,
  body: () => void
): void {
  context.state.depth++;
  try {
    emit('ENTER');
    body();
  } finally {
    context.state.depth--;
  }
  emit('LEAVE');
}

/**
 * Emits keyed children with the shared cadence.
 *
 * Per child:
 * 1. Filter:    value-level inclusion (`nullsIncluded`, class predicate).
 * 2. Guard:     ancestor check; a `skip` drops the key with the value.
 * 3. Emit:      `BETWEEN_CHILDREN` (not before the first child),
 *               `BEFORE_CHILD`, key, value, `AFTER_CHILD`.
 * 4. Unwind:    `leave()` in `finally`.
 */
function emitKeyedChildren(
  context: WalkContext,
  children: Iterable<KeyedChild>,
  emit: (event: VisitEvent) => void
): void {
  const { options, visitor, guard, state } = context;
  let first = true;

  for (const { key, value } of children) {
    if (!isValueAccepted(value, options)) continue;

    const decision = guard.enter(value);
    if (decision.type === 'skip') continue;

    try {
      if (!first) emit('BETWEEN_CHILDREN');
      first = false;
      emit('BEFORE_CHILD');
      visitor.visitKey?.(key, state);
      context.dispatch(decision.value);
      emit('AFTER_CHILD');
    } finally {
      guard.leave();
    }
  }
}

function keyValueEmitter(
  context: WalkContext,
  kind: KeyValueObjectKind,
  owner: object
) {
  return (event: VisitEvent) =>
    context.visitor.onKeyValueObjectEvent?.(event, kind, owner, context.state);
}

/**
 * Runs a member read under an `'omit'` policy: a failure is logged and the
 * member dropped.
 */
function readOrOmit(
  read: () => unknown,
  message: string
): { value: unknown } | undefined {
  const outcome = attempt(read);
  if (outcome.ok) return { value: outcome.value };

  log.warn(message, { reason: describeError(outcome.error) });
  return undefined;
}

/**
 * Reads one member of a structural object.
 *
 * Failure policies:
 * - Fields (`fieldReadFailure`, default `'throw'`): a throwing read aborts the
 *   walk with a `FieldReadError`.
 * - Accessors (`accessorFailure`, default `'omit'`): a throwing accessor is
 *   logged and the member dropped.
 *
 * @returns The value wrapped in `{ value }`, or `undefined` to drop the member.
 */
function readMember(
  member: Member,
  target: object,
  options: WalkerOptions
): { value: unknown } | undefined {
  if (member.origin === 'OBJECT_FIELD') {
    const { name, holder } = member.descriptor;
    const read = (): unknown => Reflect.get(holder, name);

    if (options.fieldReadFailure === 'throw') {
      return {
        value: runUnchecked(read, cause => new FieldReadError(name, cause))
      };
    }
    return readOrOmit(read, `Skipping field "${name}": read failed.`);
  }

  const { descriptor, invoke: invokeOn } = member;
  const { name } = descriptor;
  const invoke = () => invokeOn(target);

  if (options.accessorFailure === 'throw') {
    return {
      value: runUnchecked(
        invoke,
        cause => new AccessorInvocationError(name, cause)
      )
    };
  }
  return readOrOmit(invoke, `Skipping accessor "${name}": invocation failed.`);
}

/**
 * Composes a structural object: fields and accessors as keyed children.
 *
 * Members are enumerated (and ordered) up front, then read lazily one by one,
 * so a failing read happens after the preceding siblings were emitted.
 */
export function composeKeyValueObject(
  value: object,
  context: WalkContext
): void {
  const emit = keyValueEmitter(context, 'OBJECT', value);
  const members = enumerateMembers(value, context.options);

  function* children(): Generator<KeyedChild> {
    for (const member of members) {
      const read = readMember(member, value, context.options);
      if (read) yield { key: memberKey(member, value), value: read.value };
    }
  }

  withinComposite(context, emit, () =>
    emitKeyedChildren(context, children(), emit)
  );
}

/**
 * Composes a `Map`: one keyed child per entry, the key reported as-is.
 */
export function composeMap(
  map: ReadonlyMap<unknown, unknown>,
  context: WalkContext
): void {
  const emit = keyValueEmitter(context, 'MAP', map);
  const keys = orderMapKeys(map, context.options.keysSorted);

  function* children(): Generator<KeyedChild> {
    for (const name of keys) {
      yield {
        key: { origin: 'CONTAINER_KEY', name, owner: map },
        value: map.get(name)
      };
    }
  }

  withinComposite(context, emit, () =>
    emitKeyedChildren(context, children(), emit)
  );
}

/**
 * Composes an ordered sequence.
 *
 * Elements go through the inclusion filter but not through the cycle guard:
 * an element has no key through which the path could be re-entered.
 *
 * @param sequence - Reported to the visitor as the composite.
 * @param elements - The elements in final order (sorted sets, boxed typed
 *   arrays); defaults to iterating `sequence`.
 */
export function composeSequence(
  sequence: Iterable<unknown>,
  context: WalkContext,
  elements: Iterable<unknown> = sequence
): void {
  const { options, visitor, state } = context;
  const emit = (event: VisitEvent) =>
    visitor.onSequenceEvent?.(event, sequence, state);

  withinComposite(context, emit, () => {
    let first = true;
    for (const element of elements) {
      if (!isValueAccepted(element, options)) continue;

      if (!first) emit('BETWEEN_CHILDREN');
      first = false;
      emit('BEFORE_CHILD');
      context.dispatch(element);
      emit('AFTER_CHILD');
    }
  });
}
