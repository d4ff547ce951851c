/**
 * Safe access utilities that throw descriptive errors instead of using non-null assertions.
 * Use these throughout the codebase to avoid `!` assertions.
 */

/**
 * Get an element from an array at a specific index, throwing if out of bounds.
 */
export function getAt<T>(array: readonly T[], index: number, description = "array"): T {
  if (index < 0 || index >= array.length) {
    throw new Error(
      `Index ${index} out of bounds for ${description} with length ${array.length}`
    );
  }
  const value = array[index];
  if (value === undefined) {
    throw new Error(`Unexpected undefined at index ${index} in ${description}`);
  }
  return value;
}

/**
 * Get a value from a Map, or set and return a default if not found.
 * This is useful for the pattern: if (!map.has(key)) map.set(key, default); return map.get(key)!;
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
 * Validate that a rate or interval is a positive finite number.
 * Throws with the caller's tag so configuration mistakes surface at start-up.
 */
export function requirePositive(value: number, name: string, tag: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`[${tag}] ${name} must be a positive finite number. Got: ${value}`);
  }
  return value;
}
