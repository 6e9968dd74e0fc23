/**
 * Attribute cleaning and flattening.
 *
 * Span and resource attributes arrive as arbitrary producer input. Honeycomb
 * events only carry flat string keys with scalar values, so attributes are
 * classified, flattened and sorted before they reach an event.
 */

import { Buffer } from "node:buffer";

/**
 * Scalar value safe to put on the wire.
 */
export type CleanAttributeValue = string | number | boolean;

export type AttributePair = readonly [string, CleanAttributeValue];

/**
 * Cleaned attributes: unique keys, sorted by key.
 */
export type CleanAttributes = readonly AttributePair[];

/**
 * Attribute value after classification.
 */
export type RawAttributeValue =
  | { kind: "null" }
  | { kind: "bool"; value: boolean }
  | { kind: "int"; value: number }
  | { kind: "float"; value: number }
  | { kind: "string"; value: string }
  | { kind: "symbol"; name: string | undefined }
  | { kind: "map"; entries: Array<[unknown, unknown]> }
  | { kind: "unsupported" };

/**
 * Honeycomb's documented ceiling for a single string value, in bytes.
 */
export const MAX_VALUE_BYTES = 49_127;

// Keys some producers use to tag an object's type; never useful as data.
const BOOKKEEPING_KEYS = new Set(["__typename"]);

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classify a dynamically-typed attribute value.
 */
export function classifyValue(value: unknown): RawAttributeValue {
  if (value === null || value === undefined) {
    return { kind: "null" };
  }

  switch (typeof value) {
    case "boolean":
      return { kind: "bool", value };
    case "string":
      return { kind: "string", value };
    case "number":
      if (!Number.isFinite(value)) {
        return { kind: "unsupported" };
      }
      return Number.isInteger(value) ? { kind: "int", value } : { kind: "float", value };
    case "bigint": {
      const asNumber = Number(value);
      return Number.isSafeInteger(asNumber) ? { kind: "int", value: asNumber } : { kind: "unsupported" };
    }
    case "symbol":
      return { kind: "symbol", name: value.description };
    case "object":
      if (value instanceof Map) {
        return { kind: "map", entries: [...value.entries()] };
      }
      if (!Array.isArray(value) && isPlainObject(value)) {
        return { kind: "map", entries: Object.entries(value) };
      }
      return { kind: "unsupported" };
    default:
      return { kind: "unsupported" };
  }
}

function cleanKey(key: unknown): string | undefined {
  if (typeof key === "string") {
    return key;
  }
  if (typeof key === "symbol") {
    return key.description;
  }
  return undefined;
}

function cleanPair(key: unknown, value: unknown): AttributePair[] {
  const k = cleanKey(key);
  if (k === undefined) {
    return [];
  }

  const raw = classifyValue(value);
  switch (raw.kind) {
    case "null":
    case "unsupported":
      return [];
    case "bool":
    case "int":
    case "float":
    case "string":
      return [[k, raw.value]];
    case "symbol":
      return raw.name === undefined ? [] : [[k, raw.name]];
    case "map":
      return raw.entries
        .filter(([inner]) => !(typeof inner === "string" && BOOKKEEPING_KEYS.has(inner)))
        .flatMap(([inner, innerValue]) => {
          const innerKey = cleanKey(inner);
          return innerKey === undefined ? [] : cleanPair(`${k}.${innerKey}`, innerValue);
        });
    default: {
      const unreachable: never = raw;
      return unreachable;
    }
  }
}

function toEntries(input: unknown): Array<[unknown, unknown]> | undefined {
  if (input instanceof Map) {
    return [...input.entries()];
  }
  if (Array.isArray(input)) {
    const entries: Array<[unknown, unknown]> = [];
    for (const item of input) {
      if (Array.isArray(item) && item.length === 2) {
        entries.push([item[0], item[1]]);
      }
    }
    return entries;
  }
  if (typeof input === "object" && input !== null && isPlainObject(input)) {
    return Object.entries(input);
  }
  return undefined;
}

/**
 * Clean and flatten attributes, dropping whatever can't be cleaned.
 *
 * Accepts a plain object, a `Map`, or a list of `[key, value]` pairs. Nested
 * maps are flattened with `.`-joined keys; `{ http: { method: "GET" } }`
 * becomes `[["http.method", "GET"]]`.
 */
export function cleanAttributes(input: unknown): CleanAttributes {
  const entries = toEntries(input);
  if (!entries) {
    return [];
  }
  return sortAttributes(entries.flatMap(([key, value]) => cleanPair(key, value)));
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sort an attribute list by key, keeping the first pair seen for each key.
 */
export function sortAttributes(pairs: readonly AttributePair[]): CleanAttributes {
  const seen = new Set<string>();
  const unique: AttributePair[] = [];
  for (const pair of pairs) {
    if (!seen.has(pair[0])) {
      seen.add(pair[0]);
      unique.push(pair);
    }
  }
  return unique.sort((a, b) => compareKeys(a[0], b[0]));
}

/**
 * Merge two sorted attribute lists. On a key collision the pair from `first`
 * wins.
 */
export function mergeAttributes(first: CleanAttributes, second: CleanAttributes): CleanAttributes {
  const merged: AttributePair[] = [];
  let i = 0;
  let j = 0;

  while (i < first.length && j < second.length) {
    const order = compareKeys(first[i][0], second[j][0]);
    if (order < 0) {
      merged.push(first[i++]);
    } else if (order > 0) {
      merged.push(second[j++]);
    } else {
      merged.push(first[i++]);
      j++;
    }
  }

  while (i < first.length) merged.push(first[i++]);
  while (j < second.length) merged.push(second[j++]);
  return merged;
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0b1100_0000) === 0b1000_0000;
}

/**
 * Trim a string longer than `limit` UTF-8 bytes to exactly `limit` bytes.
 *
 * The tail is replaced with 3 to 6 dots so the cut lands on a code point
 * boundary.
 */
export function trimLongString(value: string, limit: number = MAX_VALUE_BYTES): string {
  if (Buffer.byteLength(value, "utf8") <= limit) {
    return value;
  }

  const bytes = Buffer.from(value, "utf8");
  let cut = limit - 3;
  while (cut > 0 && isContinuationByte(bytes[cut])) {
    cut--;
  }
  return bytes.subarray(0, cut).toString("utf8") + ".".repeat(limit - cut);
}

/**
 * Apply {@link trimLongString} to every string value.
 */
export function trimLongStrings(pairs: CleanAttributes, limit: number = MAX_VALUE_BYTES): CleanAttributes {
  return pairs.map(([key, value]): AttributePair => [key, typeof value === "string" ? trimLongString(value, limit) : value]);
}
