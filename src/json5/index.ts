import type {
  Key,
  TraversalState,
  TraversalVisitor,
  VisitEvent,
  WalkerOptions
} from '../walker/types';

import { formatKey, quoteString } from './escape';
import { createObjectWalker } from '../walker';
import { toDisplayString } from '../walker/utils';

const INDENT = '    ';

/**
 * Creates a visitor that renders the walked value as indented JSON5.
 *
 * Layout
 * ------
 * - Composites open on the current line and close on their own line, at the
 *   parent's indentation.
 * - Every child sits on its own line, indented four spaces per level, and is
 *   followed by `,` (JSON5 allows the trailing comma).
 * - Keys are bare when they are plain words, quoted otherwise.
 *
 * Numbers use `String`, so `NaN` and `Infinity` come out as JSON5 literals;
 * enumerants render as their description.
 *
 * @param write - Receives the output in chunks.
 */
export function createJson5Dumper(
  write: (chunk: string) => void
): TraversalVisitor {
  const indent = (state: TraversalState) => write(INDENT.repeat(state.depth));

  const onCompositeEvent =
    (open: string, close: string) =>
    (event: VisitEvent, state: TraversalState) => {
      switch (event) {
        case 'ENTER':
          return write(`${open}\n`);
        case 'BEFORE_CHILD':
          return indent(state);
        case 'AFTER_CHILD':
          return write(',\n');
        case 'LEAVE':
          indent(state);
          return write(close);
        case 'BETWEEN_CHILDREN':
          return;
      }
    };

  const onObjectEvent = onCompositeEvent('{', '}');
  const onArrayEvent = onCompositeEvent('[', ']');
  const writeNumber = (value: number | bigint) => write(String(value));
  const writeString = (value: string) => write(quoteString(value));

  return {
    visitNull: () => write('null'),
    visitBoolean: value => write(value ? 'true' : 'false'),
    visitInt8: writeNumber,
    visitInt16: writeNumber,
    visitInt32: writeNumber,
    visitInt64: writeNumber,
    visitFloat32: writeNumber,
    visitFloat64: writeNumber,
    visitChar: writeString,
    visitString: writeString,
    visitEnum: value => writeString(value.description ?? ''),

    visitKey(key: Key) {
      const name =
        key.origin === 'CONTAINER_KEY' ? toDisplayString(key.name) : key.name;
      write(`${formatKey(name)}: `);
    },

    onKeyValueObjectEvent: (event, _kind, _owner, state) =>
      onObjectEvent(event, state),

    onSequenceEvent: (event, _sequence, state) => onArrayEvent(event, state)
  };
}

/**
 * Walks `value` with a fresh walker and returns its JSON5 rendering.
 *
 * The walker has the built-in adapters registered, so dates, URLs and
 * regular expressions render as strings.
 *
 * @example
 * ```ts
 * dumpJson5({ a: 1, b: [true, null] }, { nullsIncluded: true });
 * // {
 * //     a: 1,
 * //     b: [
 * //         true,
 * //         null,
 * //     ],
 * // }
 * ```
 */
export function dumpJson5(
  value: unknown,
  options: Partial<WalkerOptions> = {}
): string {
  const walker = createObjectWalker(options);
  walker.registerBuiltinAdapters();

  const chunks: string[] = [];
  walker.walk(
    value,
    createJson5Dumper(chunk => chunks.push(chunk))
  );
  return chunks.join('');
}
