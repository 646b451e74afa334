import type { ObjectWalker } from '..';
import type { Key, TraversalVisitor, VisitEvent, WalkerOptions } from '../types';
import { createObjectWalker } from '..';

/**
 * Walk Input
 * Represents the input payload for a walk test.
 */
export type WalkInput = {
  value: unknown;

  /**
   * Optional per-scenario overrides for walker configuration.
   */
  options?: Partial<WalkerOptions>;

  /**
   * Optional walker preparation (adapter registration).
   */
  setup?: (walker: ObjectWalker) => void;
};

/**
 * Which lifecycle events the recorder keeps.
 *
 * - `'all'`: every event, for cadence checks.
 * - `'structure'`: only `ENTER` / `LEAVE`, for shape checks.
 */
export type RecordedEvents = 'all' | 'structure';

const KEY_PREFIXES: Record<Key['origin'], string> = {
  OBJECT_FIELD: 'field',
  OBJECT_ACCESSOR: 'accessor',
  CONTAINER_KEY: 'entry'
};

/**
 * Renders a key as a token, e.g. `field:name`, `accessor:total`, `entry:1`.
 */
export function keyToken(key: Key): string {
  return `${KEY_PREFIXES[key.origin]}:${String(key.name)}`;
}

/**
 * Creates a visitor that records every callback as a string token.
 *
 * Tokens
 * ------
 * - Scalars: `kind(value)`, e.g. `float64(1)`, `int64(3)`, `enum(red)`;
 *   `null` for the null visit.
 * - Keys: see {@link keyToken}.
 * - Lifecycle: `OBJECT:ENTER`, `MAP:BEFORE_CHILD`, `SEQUENCE:LEAVE`, ...
 *
 * @param tokens - Receives the tokens in emission order.
 * @param events - Lifecycle events to keep.
 */
export function createRecordingVisitor(
  tokens: string[],
  events: RecordedEvents = 'all'
): TraversalVisitor {
  const scalar = (kind: string) => (value: unknown) =>
    tokens.push(`${kind}(${String(value)})`);
  const lifecycle = (owner: string, event: VisitEvent) => {
    if (events === 'structure' && event !== 'ENTER' && event !== 'LEAVE') {
      return;
    }
    tokens.push(`${owner}:${event}`);
  };

  return {
    visitNull: () => tokens.push('null'),
    visitBoolean: scalar('boolean'),
    visitInt8: scalar('int8'),
    visitInt16: scalar('int16'),
    visitInt32: scalar('int32'),
    visitInt64: scalar('int64'),
    visitFloat32: scalar('float32'),
    visitFloat64: scalar('float64'),
    visitChar: scalar('char'),
    visitString: scalar('string'),
    visitEnum: value => tokens.push(`enum(${value.description ?? ''})`),
    visitKey: key => tokens.push(keyToken(key)),
    onKeyValueObjectEvent: (event, kind) => lifecycle(kind, event),
    onSequenceEvent: event => lifecycle('SEQUENCE', event)
  };
}

/**
 * Walk Runner
 * Represents a configured walk returning the recorded tokens.
 */
export type WalkRunner = (input: WalkInput) => string[];

/**
 * Creates a walk runner with a fixed set of base options.
 *
 * Per-scenario options (if provided) are merged first, so the base options win.
 * This ensures each suite can enforce its intended configuration explicitly.
 *
 * @param baseOptions - The configuration to apply for all runs of this runner.
 * @param events - Lifecycle events to record.
 */
export function createWalkRunner(
  baseOptions: Partial<WalkerOptions> = {},
  events: RecordedEvents = 'structure'
): WalkRunner {
  return (input: WalkInput) => {
    const walker = createObjectWalker({ ...input.options, ...baseOptions });
    input.setup?.(walker);

    const tokens: string[] = [];
    walker.walk(input.value, createRecordingVisitor(tokens, events));
    return tokens;
  };
}
