/**
 * Deterministic JSON formatting utilities
 */

/**
 * Stable, deterministic JSON stringification with keys in code-unit order
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(obj: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        const entries = Object.entries(value).sort(([a], [b]) => sorter(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}
