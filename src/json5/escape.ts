/**
 * Replacements for the characters a JSON5 string literal cannot hold as-is.
 * Control characters without a short escape use `\uXXXX`.
 */
const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\t': '\\t',
  '\b': '\\b',
  '\n': '\\n',
  '\r': '\\r',
  '\f': '\\f'
};

const ESCAPED_CHARACTERS = /[\u0000-\u001f"\\]/g;

const UNQUOTED_KEY_PATTERN = /^[A-Za-z0-9_]+$/;

function escapeCharacter(character: string): string {
  const short = SHORT_ESCAPES[character];
  if (short !== undefined) return short;
  return `\\u${character.charCodeAt(0).toString(16).padStart(4, '0')}`;
}

/**
 * Renders `value` as a double-quoted JSON5 string literal.
 *
 * @example
 * ```ts
 * quoteString('a "b"\n'); // => "a \"b\"\n" (escaped)
 * ```
 */
export function quoteString(value: string): string {
  return `"${value.replace(ESCAPED_CHARACTERS, escapeCharacter)}"`;
}

/**
 * Renders an object key: bare when it is a plain identifier-like word,
 * quoted otherwise.
 */
export function formatKey(name: string): string {
  return UNQUOTED_KEY_PATTERN.test(name) ? name : quoteString(name);
}
