/**
 * Map and union helpers that avoid non-null assertions.
 */

/**
 * Get a value from a Map, or set and return a default if not found.
 */
export function getOrSet<K, V>(map: Map<K, V>, key: K, defaultValue: () => V): V {
  const existing = map.get(key);
  if (existing !== undefined) {
    return existing;
  }
  const value = defaultValue();
  map.set(key, value);
  return value;
}

/**
 * Exhaustiveness check for tagged unions.
 */
export function assertNever(value: never, description = "value"): never {
  throw new Error(`Unhandled ${description}: ${JSON.stringify(value)}`);
}
