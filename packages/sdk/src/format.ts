/**
 * Deterministic JSON formatting utilities
 */

/**
 * Key ordering: insertion order, alphabetical, or an explicit list first
 */
export type KeyOrder = "preserve" | "alpha" | string[];

/**
 * JSON stringification with controlled key ordering and a trailing newline
 * @param obj - Object to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(obj: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha" || order === "preserve") {
      return a < b ? -1 : a > b ? 1 : 0;
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    // If both in order array, use their positions
    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    // If only a is in order, it comes first
    if (aIndex !== -1) return -1;
    // If only b is in order, it comes first
    if (bIndex !== -1) return 1;
    // Both not in order array, fallback to alphabetical
    return a < b ? -1 : a > b ? 1 : 0;
  };

  const normalize = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }
    // Detect cycles
    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(value)) {
        return value.map(normalize);
      }

      const keys = Object.keys(value);
      if (order !== "preserve") {
        keys.sort(sorter);
      }
      const out: Record<string, unknown> = {};
      for (const k of keys) {
        out[k] = normalize(Reflect.get(value, k));
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    // Strip BOM if present
    const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    const data: unknown = JSON.parse(cleaned);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
