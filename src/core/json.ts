import type { JsonValue, WireRecord } from "../contract/types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Copy of `value` with object keys sorted at every level. */
function sortedJson(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid JSON value at ${path}: non-finite number`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) => sortedJson(item, `${path}[${index}]`));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortedJson(value[key], `${path}.${key}`)]),
    );
  }
  throw new Error(`Invalid JSON value at ${path}: ${typeof value}`);
}

/**
 * Deterministic JSON: keys sorted, no whitespace. Throws on anything JSON
 * cannot represent (undefined, functions, non-finite numbers, class instances).
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortedJson(value, "$"));
}

// ---------------------------------------------------------------------------
// Record comparison
// ---------------------------------------------------------------------------

function subPlayOf(record: WireRecord): number {
  return record.metadata.subPlay ?? Number.MAX_SAFE_INTEGER;
}

/**
 * Copy of a record whose children (recursively) are ordered by `subPlay`.
 * Sibling order upstream is not meaningful; this is the order both sides of a
 * comparison are put in. Ties keep their original relative order.
 */
export function canonicalizeRecord(record: WireRecord): WireRecord {
  const children = record.metadata.children
    .map((child, index) => ({ child: canonicalizeRecord(child), index }))
    .sort((a, b) => subPlayOf(a.child) - subPlayOf(b.child) || a.index - b.index)
    .map(({ child }) => child);
  return { ...record, metadata: { ...record.metadata, children } };
}

/** Structural equality of two records after canonical child ordering. */
export function recordsEqual(a: WireRecord, b: WireRecord): boolean {
  return stableStringify(canonicalizeRecord(a)) === stableStringify(canonicalizeRecord(b));
}
