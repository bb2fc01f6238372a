/**
 * Content paths.
 *
 * A path locates a node inside a content tree and is what selectors match
 * against. Paths are immutable; `key()` and `index()` return extended
 * copies, so a path handed to a callback stays valid after the walk moves on.
 */

import type { PathSegment } from "./types.js";

const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export class ContentPath {
  private static readonly ROOT = new ContentPath([]);

  private constructor(readonly segments: readonly PathSegment[]) {}

  /** The path of the root node. */
  static root(): ContentPath {
    return ContentPath.ROOT;
  }

  /** Extend with a map key. */
  key(key: string): ContentPath {
    return new ContentPath([...this.segments, { kind: "key", key }]);
  }

  /** Extend with a sequence index inside a sequence of `length` items. */
  index(index: number, length: number): ContentPath {
    return new ContentPath([...this.segments, { kind: "index", index, length }]);
  }

  get depth(): number {
    return this.segments.length;
  }

  /**
   * Render for diagnostics, e.g. `.users[0].id` or `.headers["x-id"]`.
   * The root renders as `.`.
   */
  toString(): string {
    if (this.segments.length === 0) return ".";
    return this.segments
      .map((seg) => {
        if (seg.kind === "index") return `[${seg.index}]`;
        return IDENT_RE.test(seg.key) ? `.${seg.key}` : `[${JSON.stringify(seg.key)}]`;
      })
      .join("");
  }
}
