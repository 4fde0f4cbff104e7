/**
 * Type-safe Map wrapper for fixed lookup tables.
 *
 * Used where a table is indexed by a value that arrives at run time (a log
 * level name from the environment, a numeric severity), so that lookups go
 * through `get`/`has` rather than dynamic property access on a plain object.
 *
 * @packageDocumentation
 */

import { InvariantViolationError } from '../errors.js';

/**
 * Map with enforced key and value types.
 *
 * @example
 * ```ts
 * const severities = TypedMap.fromEntries<string, number>([
 *   ['info', 20],
 *   ['error', 40],
 * ]);
 * severities.get('info'); // 20
 * severities.invert().get(40); // 'error'
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class TypedMap<K, V> {
  private readonly map: Map<K, V>;

  constructor() {
    this.map = new Map<K, V>();
  }

  /**
   * Creates a TypedMap from an iterable of entries.
   *
   * @param entries - An iterable of [key, value] tuples.
   */
  static fromEntries<K, V>(entries: Iterable<readonly [K, V]>): TypedMap<K, V> {
    const typedMap = new TypedMap<K, V>();
    for (const [key, value] of entries) {
      typedMap.map.set(key, value);
    }
    return typedMap;
  }

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  /**
   * Sets a value for the specified key.
   *
   * @returns The TypedMap instance for method chaining.
   */
  set(key: K, value: V): this {
    this.map.set(key, value);
    return this;
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  values(): IterableIterator<V> {
    return this.map.values();
  }

  get size(): number {
    return this.map.size;
  }

  /**
   * Builds the reverse lookup table (value to key).
   *
   * A mapping can only be inverted when no two keys share a value.
   *
   * @returns A new TypedMap from values to keys.
   * @throws InvariantViolationError if two keys map to the same value.
   *
   * @example
   * ```ts
   * TypedMap.fromEntries([['a', 1], ['b', 2]]).invert().get(2); // 'b'
   * TypedMap.fromEntries([['a', 1], ['b', 1]]).invert(); // throws
   * ```
   */
  invert(): TypedMap<V, K> {
    const inverted = new TypedMap<V, K>();
    for (const [key, value] of this.map) {
      const existing = inverted.map.get(value);
      if (inverted.map.has(value)) {
        throw new InvariantViolationError(
          `Cannot invert mapping: keys '${String(existing)}' and '${String(key)}' share the value '${String(value)}'`,
          { value, keys: [existing, key] }
        );
      }
      inverted.map.set(value, key);
    }
    return inverted;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.map[Symbol.iterator]();
  }
}
