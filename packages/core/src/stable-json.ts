import crypto from "node:crypto";

// Deterministic JSON: object keys sorted at every depth, so the same request
// always renders to the same oracle prompt and the same log hash.
export function stableStringify(value: unknown, indent?: number): string {
  return JSON.stringify(sortValue(value, new WeakSet<object>()), null, indent);
}

function sortValue(value: unknown, seen: WeakSet<object>): unknown {
  if (Array.isArray(value)) {
    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);
    const items = value.map((item) => sortValue(item, seen));
    seen.delete(value);
    return items;
  }
  if (isPlainObject(value)) {
    if (seen.has(value)) {
      return "[Circular]";
    }
    seen.add(value);
    const next: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      next[key] = sortValue(value[key], seen);
    }
    seen.delete(value);
    return next;
  }
  return value;
}

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function hashObject(value: unknown): string {
  return sha256Hex(stableStringify(value));
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
