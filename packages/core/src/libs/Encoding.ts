function sortKeys(value: object): Record<string, unknown> {
  const entries: [string, unknown][] = Object.entries(value);
  return Object.fromEntries(
    entries
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );
}

/**
 * Canonical JSON encoding used for state hashing.
 * Object keys are sorted, undefined members dropped, no whitespace.
 * Iterables that are not arrays (Set, Map values) are written as arrays
 * so that a cell set hashes the same way as the list it was built from.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (value instanceof Map) {
      return Array.from(value.values());
    }
    if (value instanceof Set) {
      return Array.from(value);
    }
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return sortKeys(value);
    }
    return value;
  });
}
