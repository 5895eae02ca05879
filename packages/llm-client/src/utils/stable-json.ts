/**
 * Deterministic JSON serialization: object keys are sorted and `undefined`
 * members dropped, so structurally equal values serialize identically
 * regardless of property insertion order.
 */

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    // JSON.stringify turns undefined array slots into null; keep that.
    return value.map((item) => (item === undefined ? null : normalize(item)));
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined) {
        sorted[key] = normalize(member);
      }
    }
    return sorted;
  }
  return value;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value)) ?? "null";
}
