/**
 * Deterministic state hashing for replay verification
 */

/**
 * Hash any JSON-like value. Maps are serialized as entry lists sorted by key
 * so insertion order does not affect the result.
 */
export function hashState(obj: unknown): string {
  const str = JSON.stringify(obj, (_, value: unknown) => {
    if (value instanceof Map) {
      return Array.from(value.entries()).sort((a, b) => String(a[0]).localeCompare(String(b[0])));
    }
    return value;
  });

  // djb2
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) + hash + str.charCodeAt(i)) >>> 0;
  }
  return hash.toString(16);
}
