/**
 * Raw metric payloads as delivered by acquisition connectors: arbitrarily nested
 * string-keyed objects with numeric, text, or null leaves.
 */

export type RawLeaf = number | string | null;
export type RawValue = RawLeaf | RawPayload;
export type RawPayload = { [key: string]: RawValue };

export type FlatPayload = {
  /** Joined key -> numeric leaf, in payload order. */
  numbers: Map<string, number>;
  /** Joined key -> text leaf; kept for unique-data descriptions. */
  texts: Map<string, string>;
};

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return v != null && typeof v === "object" && !Array.isArray(v);
}

/**
 * Coerce untrusted JSON into a RawPayload. Arrays, booleans and non-finite
 * numbers are dropped; returns null when the input is not an object.
 */
export function toRawPayload(input: unknown): RawPayload | null {
  if (!isPlainObject(input)) return null;
  const out: RawPayload = {};
  for (const [key, v] of Object.entries(input)) {
    if (v === null) out[key] = null;
    else if (typeof v === "number") {
      if (Number.isFinite(v)) out[key] = v;
    } else if (typeof v === "string") out[key] = v;
    else if (isPlainObject(v)) {
      const nested = toRawPayload(v);
      if (nested) out[key] = nested;
    }
  }
  return out;
}

/**
 * Flatten nested payloads by joining parent and child keys with "_".
 * Numeric leaves go to `numbers`, non-empty text leaves to `texts`, nulls are dropped.
 */
export function flattenPayload(payload: RawPayload, prefix = "", into?: FlatPayload): FlatPayload {
  const flat = into ?? { numbers: new Map<string, number>(), texts: new Map<string, string>() };
  for (const [key, v] of Object.entries(payload)) {
    const joined = prefix ? `${prefix}_${key}` : key;
    if (v == null) continue;
    if (typeof v === "number") {
      flat.numbers.set(joined, v);
    } else if (typeof v === "string") {
      if (v.trim()) flat.texts.set(joined, v.trim());
    } else {
      flattenPayload(v, joined, flat);
    }
  }
  return flat;
}

/** Merge flattened sources in order; later sources overwrite earlier keys. */
export function mergeFlatPayloads(sources: FlatPayload[]): FlatPayload {
  const merged: FlatPayload = { numbers: new Map(), texts: new Map() };
  for (const src of sources) {
    for (const [k, v] of src.numbers) merged.numbers.set(k, v);
    for (const [k, v] of src.texts) merged.texts.set(k, v);
  }
  return merged;
}
