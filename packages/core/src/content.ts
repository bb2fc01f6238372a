/**
 * Content serialization.
 *
 * Converts arbitrary captured values into the JSON-shaped content tree
 * that redactions and snapshot comparison operate on. Never mutates the
 * input; every function returns a fresh tree.
 */

import type { Content, ContentMap } from "./types.js";

/** Check whether a content value is a map (plain object, not an array). */
export function isContentMap(value: Content): value is ContentMap {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Add a key to a map being built. Defines the property instead of
 * assigning it, so a `__proto__` key stays an own entry and the map's
 * prototype is never touched.
 */
export function setEntry(map: ContentMap, key: string, value: Content): void {
  Object.defineProperty(map, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function describePath(path: string[]): string {
  return path.length === 0 ? "." : path.join("");
}

function serialize(value: unknown, path: string[], seen: Set<object>): Content {
  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return value.toString();
    case "undefined":
    case "function":
    case "symbol":
      return null;
  }

  if (value === null) return null;
  if (typeof value !== "object") return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }

  if (seen.has(value)) {
    throw new Error(`Cannot serialize cyclic value at ${describePath(path)}`);
  }
  seen.add(value);

  try {
    if (hasToJSON(value)) {
      return serialize(value.toJSON(), path, seen);
    }

    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown, i) =>
        serialize(item, [...path, `[${i}]`], seen),
      );
    }

    const result: ContentMap = {};
    if (value instanceof Map) {
      for (const [key, val] of value) {
        const name = String(key);
        setEntry(result, name, serialize(val, [...path, `.${name}`], seen));
      }
      return result;
    }

    for (const [key, val] of Object.entries(value)) {
      setEntry(result, key, serialize(val, [...path, `.${key}`], seen));
    }
    return result;
  } finally {
    seen.delete(value);
  }
}

/**
 * Serialize a captured value into content.
 *
 * Dates become ISO strings, bigints become decimal strings, `Map` and
 * `Set` become maps and sequences, and values JSON cannot represent
 * (undefined, functions, NaN) become null. Objects with `toJSON()` are
 * serialized through it. Throws on cyclic structures.
 */
export function toContent(value: unknown): Content {
  return serialize(value, [], new Set());
}

/**
 * Return a copy with the keys of every map sorted, at every depth.
 * Sequence order is preserved.
 */
export function sortContent(content: Content): Content {
  if (Array.isArray(content)) {
    return content.map(sortContent);
  }
  if (isContentMap(content)) {
    const result: ContentMap = {};
    for (const key of Object.keys(content).sort()) {
      setEntry(result, key, sortContent(content[key]));
    }
    return result;
  }
  return content;
}

/** Deep copy of a content tree. */
export function cloneContent(content: Content): Content {
  if (Array.isArray(content)) {
    return content.map(cloneContent);
  }
  if (isContentMap(content)) {
    const result: ContentMap = {};
    for (const [key, val] of Object.entries(content)) {
      setEntry(result, key, cloneContent(val));
    }
    return result;
  }
  return content;
}

/** Freeze a content tree in place, at every depth, and return it. */
export function freezeContent(content: Content): Content {
  if (Array.isArray(content)) {
    content.forEach((item) => freezeContent(item));
    Object.freeze(content);
  } else if (isContentMap(content)) {
    Object.values(content).forEach((item) => freezeContent(item));
    Object.freeze(content);
  }
  return content;
}

/**
 * Structural equality. Map key order matters, since it is visible in
 * the serialized snapshot.
 */
export function contentEquals(a: Content, b: Content): boolean {
  if (a === b) return true;

  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => contentEquals(item, b[i]));
  }

  if (isContentMap(a)) {
    if (!isContentMap(b)) return false;
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every(
      (key, i) => key === bKeys[i] && contentEquals(a[key], b[key]),
    );
  }

  return false;
}
