/**
 * Deterministic JSON formatting for record bytes
 */

/**
 * Deterministic comparison for object keys using UTF-16 code unit order
 * (locale independent, unlike localeCompare)
 */
function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Stable, compact JSON stringification with sorted keys
 * @param value - JSON-compatible value
 * @returns JSON text without insignificant whitespace
 * @throws TypeError on cycles, bigints, functions, symbols or non-finite numbers
 */
export function stableStringify(value: unknown): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown, path: string): unknown => {
    switch (typeof input) {
      case "string":
      case "boolean":
        return input;
      case "number":
        if (!Number.isFinite(input)) {
          throw new TypeError(`Non-finite number at ${path}`);
        }
        return input;
      case "undefined":
        return undefined;
      case "object":
        break;
      default:
        throw new TypeError(`Unsupported ${typeof input} at ${path}`);
    }

    if (input === null) return null;

    if (seen.has(input)) {
      throw new TypeError(`Circular reference detected at ${path}`);
    }
    seen.add(input);

    try {
      if (Array.isArray(input)) {
        // undefined array slots serialize as null, matching JSON.stringify
        return input.map((item: unknown, i) => normalize(item, `${path}[${i}]`) ?? null);
      }

      if (input instanceof Date) {
        return input.toISOString();
      }

      const out: Record<string, unknown> = {};
      for (const key of Object.keys(input).sort(compareKeys)) {
        const normalized = normalize(Reflect.get(input, key), `${path}.${key}`);
        if (normalized !== undefined) {
          out[key] = normalized;
        }
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  const normalized = normalize(value, "$");
  if (normalized === undefined) {
    throw new TypeError("Cannot serialize undefined");
  }
  return JSON.stringify(normalized);
}
