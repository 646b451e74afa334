import type { Constructor, TypeAdapter } from './types';

/**
 * A registration: the constructor matched with `instanceof`, and the rewrite
 * applied to its instances.
 */
type AdapterEntry = {
  type: Constructor;
  rewrite: TypeAdapter;
};

export type TypeAdapterRegistry = {
  /**
   * Registers `rewrite` for instances of `type` (and, by the subtype scan,
   * of its subclasses). Registering the same constructor again replaces the
   * rewrite in place.
   */
  register<T>(type: Constructor<T>, rewrite: (value: T) => unknown): void;

  /**
   * Registers the adapters for common opaque built-ins
   * (see {@link BUILTIN_ADAPTERS}).
   */
  registerBuiltins(): void;

  /**
   * Returns the rewrite for `value`, or `undefined` when none applies.
   */
  resolve(value: object): TypeAdapter | undefined;

  /**
   * Registered constructors, in registration order.
   */
  types(): Constructor[];
};

/**
 * Exact runtime type of an object, used as the memo cache key.
 *
 * The prototype object identifies the concrete class without relying on the
 * mutable `constructor` property; null-prototype objects share the `null` key.
 */
function exactTypeOf(value: object): object | null {
  const prototype: unknown = Object.getPrototypeOf(value);
  return typeof prototype === 'object' || typeof prototype === 'function'
    ? prototype
    : null;
}

/**
 * Built-in rewrites for opaque values that carry no useful own properties.
 *
 * - `Date`: ISO-8601 string (`'Invalid Date'` for invalid dates).
 * - `URL`: `href`.
 * - `URLSearchParams`: the serialized query string.
 * - `RegExp`: the `/source/flags` literal.
 */
export const BUILTIN_ADAPTERS: ReadonlyArray<
  (registry: TypeAdapterRegistry) => void
> = [
  registry =>
    registry.register(Date, date =>
      Number.isNaN(date.getTime()) ? String(date) : date.toISOString()
    ),
  registry => registry.register(URL, url => url.href),
  registry => registry.register(URLSearchParams, params => params.toString()),
  registry => registry.register(RegExp, pattern => pattern.toString())
];

/**
 * Creates an adapter registry with its own memo cache.
 *
 * Resolution
 * ----------
 * 1. Fast path:
 *    Exact-type cache hit (a previous resolution for the same prototype,
 *    including a cached "no adapter").
 * 2. Slow path:
 *    Linear scan over registrations in order, testing `value instanceof type`;
 *    the first match wins.
 * 3. Memoization:
 *    The slow-path result is cached under the exact type, so later lookups
 *    for that type skip the scan.
 *
 * Registering clears the cache: a cached miss must not hide an adapter added
 * afterwards.
 */
export function createTypeAdapterRegistry(): TypeAdapterRegistry {
  const entries: AdapterEntry[] = [];
  const cache = new Map<object | null, TypeAdapter | null>();

  const registry: TypeAdapterRegistry = {
    register(type, rewrite) {
      // Values that are not instances pass through unchanged.
      const adapter: TypeAdapter = value =>
        value instanceof type ? rewrite(value) : value;

      const existing = entries.find(entry => entry.type === type);
      if (existing) {
        existing.rewrite = adapter;
      } else {
        entries.push({ type, rewrite: adapter });
      }
      cache.clear();
    },

    registerBuiltins() {
      for (const install of BUILTIN_ADAPTERS) install(registry);
    },

    resolve(value) {
      const exactType = exactTypeOf(value);

      const cached = cache.get(exactType);
      if (cached !== undefined) return cached ?? undefined;

      const match = entries.find(entry => value instanceof entry.type);
      cache.set(exactType, match ? match.rewrite : null);
      return match?.rewrite;
    },

    types() {
      return entries.map(entry => entry.type);
    }
  };

  return registry;
}
