/**
 * Core types for the snapbind ecosystem.
 *
 * These are the public types that settings, redactions, and snapshot
 * consumers depend on. Zero external dependencies.
 */

// --- Content ---

/** Scalar leaf of a content tree. */
export type ContentPrimitive = string | number | boolean | null;

/**
 * Structured value produced by serializing a captured test value.
 *
 * Sequences are arrays; maps are plain objects whose key order is the
 * insertion order (sorted only when the settings ask for it).
 */
export type Content = ContentPrimitive | Content[] | ContentMap;

export type ContentMap = { [key: string]: Content };

// --- Paths ---

/** A map key step in a content path. */
export interface KeySegment {
  kind: "key";
  key: string;
}

/**
 * A sequence index step in a content path.
 *
 * `length` is the length of the enclosing sequence, needed to resolve
 * negative indices and ranges in selectors.
 */
export interface IndexSegment {
  kind: "index";
  index: number;
  length: number;
}

export type PathSegment = KeySegment | IndexSegment;
