/**
 * Keys that only exist on the remote side and never take part in comparisons.
 */
const REMOTE_ONLY_KEYS = new Set<string>(["remoteId", "resourceRemoteId", "scopeRemoteId", "bindings", "isDefault"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Removes remote identifiers so desired and actual entities compare on content only.
 */
export function stripRemoteFieldsDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(stripRemoteFieldsDeep);
  }
  if (!isRecord(value)) {
    return value;
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (REMOTE_ONLY_KEYS.has(k) || v === undefined) continue;
    out[k] = stripRemoteFieldsDeep(v);
  }
  return out;
}

/**
 * Deterministic representation for set-like comparison:
 * - object keys are sorted
 * - arrays of strings are de-duplicated and sorted
 * - arrays of objects are sorted by `name` or `id` when present
 */
export function canonicalizeDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    if (value.every((v): v is string => typeof v === "string")) {
      return [...new Set(value)].sort((a, b) => a.localeCompare(b));
    }

    const items = value.map(canonicalizeDeep);
    const records = items.filter(isRecord);
    if (records.length === items.length) {
      for (const field of ["name", "id"]) {
        if (records.every((r) => typeof r[field] === "string")) {
          return [...records].sort((a, b) => String(a[field]).toLowerCase().localeCompare(String(b[field]).toLowerCase()));
        }
      }
    }
    return items;
  }

  if (!isRecord(value)) {
    return value;
  }

  const out: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort((a, b) => a.localeCompare(b))) {
    out[k] = canonicalizeDeep(value[k]);
  }
  return out;
}

export function normalizeForDiff(value: unknown): unknown {
  return canonicalizeDeep(stripRemoteFieldsDeep(value));
}

/**
 * Order-insensitive equality for string sets and records of them.
 */
export function sameContent(a: unknown, b: unknown): boolean {
  return JSON.stringify(normalizeForDiff(a)) === JSON.stringify(normalizeForDiff(b));
}
