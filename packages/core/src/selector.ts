/**
 * Selector grammar and matcher.
 *
 * A selector addresses nodes in a content tree by path:
 *
 *   .user.id              key "user", then key "id"
 *   .items[0]             first element of "items"
 *   .items[-1]            last element
 *   .items[1:3]           elements 1 and 2 (end is exclusive)
 *   .items[].id           "id" of every element ([*] is the same)
 *   .headers["x-req"]     key that is not an identifier
 *   .*.created_at         any single step, then "created_at"
 *   .**.id                "id" at any depth, including the root map
 *   .id, .**.token        alternatives
 *
 * Selectors are parsed once and are immutable afterwards, so a parsed
 * selector can be stored in settings and reused for every match.
 */

import type { ContentPath } from "./path.js";
import type { PathSegment } from "./types.js";

// --- Selector segments ---

export type SelectorSegment =
  | { kind: "key"; key: string }
  | { kind: "wildcard" }
  | { kind: "deep-wildcard" }
  | { kind: "any-index" }
  | { kind: "index"; index: number }
  | { kind: "range"; start: number | null; end: number | null };

/** Parse failure returned by {@link parseSelector}. */
export interface SelectorParseFailure {
  error: string;
  /** Offset into the pattern where parsing stopped. */
  position: number;
}

/** Thrown by {@link Selector.parse} when the pattern is not a valid selector. */
export class SelectorParseError extends Error {
  constructor(
    readonly pattern: string,
    readonly position: number,
    reason: string,
  ) {
    super(`Invalid selector "${pattern}" at position ${position}: ${reason}`);
    this.name = "SelectorParseError";
  }
}

export function isParseFailure(
  result: Selector | SelectorParseFailure,
): result is SelectorParseFailure {
  return "error" in result;
}

// --- Parser ---

const KEY_CHAR_RE = /[A-Za-z0-9_-]/;
const DIGIT_RE = /[0-9]/;

class Failure {
  constructor(
    readonly reason: string,
    readonly position: number,
  ) {}
}

class Parser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parse(): SelectorSegment[][] {
    const alternatives: SelectorSegment[][] = [];
    this.skipSpaces();
    for (;;) {
      alternatives.push(this.parsePath());
      this.skipSpaces();
      if (this.pos >= this.src.length) break;
      if (this.src[this.pos] !== ",") {
        throw new Failure(`unexpected character "${this.src[this.pos]}"`, this.pos);
      }
      this.pos++;
      this.skipSpaces();
    }
    return alternatives;
  }

  private parsePath(): SelectorSegment[] {
    const segments: SelectorSegment[] = [];
    for (;;) {
      const ch = this.src[this.pos];
      if (ch === ".") {
        this.pos++;
        segments.push(this.parseDotted());
      } else if (ch === "[") {
        this.pos++;
        segments.push(this.parseBracketed());
      } else {
        break;
      }
    }
    if (segments.length === 0) {
      throw new Failure('expected "." or "["', this.pos);
    }
    return segments;
  }

  private parseDotted(): SelectorSegment {
    if (this.src[this.pos] === "*") {
      this.pos++;
      if (this.src[this.pos] === "*") {
        this.pos++;
        return { kind: "deep-wildcard" };
      }
      return { kind: "wildcard" };
    }
    const start = this.pos;
    while (this.pos < this.src.length && KEY_CHAR_RE.test(this.src[this.pos])) {
      this.pos++;
    }
    if (this.pos === start) {
      throw new Failure('expected key after "."', this.pos);
    }
    return { kind: "key", key: this.src.slice(start, this.pos) };
  }

  private parseBracketed(): SelectorSegment {
    const ch = this.src[this.pos];
    let segment: SelectorSegment;

    if (ch === "]") {
      segment = { kind: "any-index" };
    } else if (ch === "*") {
      this.pos++;
      segment = { kind: "any-index" };
    } else if (ch === '"') {
      segment = { kind: "key", key: this.parseString() };
    } else {
      const start = this.parseInt();
      if (this.src[this.pos] === ":") {
        this.pos++;
        const end = this.parseInt();
        segment = { kind: "range", start, end };
      } else if (start === null) {
        throw new Failure("expected index, range, string or \"]\"", this.pos);
      } else {
        segment = { kind: "index", index: start };
      }
    }

    if (this.src[this.pos] !== "]") {
      throw new Failure('expected "]"', this.pos);
    }
    this.pos++;
    return segment;
  }

  private parseInt(): number | null {
    const start = this.pos;
    if (this.src[this.pos] === "-") this.pos++;
    const digitsStart = this.pos;
    while (this.pos < this.src.length && DIGIT_RE.test(this.src[this.pos])) {
      this.pos++;
    }
    if (this.pos === digitsStart) {
      if (this.pos !== start) throw new Failure('expected digits after "-"', this.pos);
      return null;
    }
    return Number.parseInt(this.src.slice(start, this.pos), 10);
  }

  private parseString(): string {
    const start = this.pos;
    this.pos++; // opening quote
    while (this.pos < this.src.length && this.src[this.pos] !== '"') {
      if (this.src[this.pos] === "\\") this.pos++;
      this.pos++;
    }
    if (this.pos >= this.src.length) {
      throw new Failure("unterminated string", start);
    }
    this.pos++; // closing quote
    let value: unknown;
    try {
      value = JSON.parse(this.src.slice(start, this.pos));
    } catch {
      throw new Failure("invalid string escape", start);
    }
    return String(value);
  }

  private skipSpaces(): void {
    while (this.src[this.pos] === " ") this.pos++;
  }
}

// --- Matching ---

function resolveIndex(index: number, length: number): number {
  return index < 0 ? length + index : index;
}

function segmentMatches(pattern: SelectorSegment, seg: PathSegment): boolean {
  switch (pattern.kind) {
    case "key":
      return seg.kind === "key" && seg.key === pattern.key;
    case "wildcard":
      return true;
    case "any-index":
      return seg.kind === "index";
    case "index":
      return seg.kind === "index" && resolveIndex(pattern.index, seg.length) === seg.index;
    case "range": {
      if (seg.kind !== "index") return false;
      const start = pattern.start === null ? 0 : resolveIndex(pattern.start, seg.length);
      const end = pattern.end === null ? seg.length : resolveIndex(pattern.end, seg.length);
      return seg.index >= start && seg.index < end;
    }
    case "deep-wildcard":
      // handled by matchFrom
      return false;
  }
}

function matchFrom(
  pattern: readonly SelectorSegment[],
  pi: number,
  path: readonly PathSegment[],
  si: number,
): boolean {
  if (pi === pattern.length) return si === path.length;

  const current = pattern[pi];
  if (current.kind === "deep-wildcard") {
    for (let skip = si; skip <= path.length; skip++) {
      if (matchFrom(pattern, pi + 1, path, skip)) return true;
    }
    return false;
  }

  if (si === path.length) return false;
  return segmentMatches(current, path[si]) && matchFrom(pattern, pi + 1, path, si + 1);
}

// --- Public API ---

export class Selector {
  private constructor(
    /** The pattern text this selector was parsed from. */
    readonly source: string,
    readonly alternatives: readonly (readonly SelectorSegment[])[],
  ) {}

  /**
   * Parse a selector pattern.
   * @throws SelectorParseError when the pattern is malformed.
   */
  static parse(pattern: string): Selector {
    const result = Selector.tryParse(pattern);
    if (isParseFailure(result)) {
      throw new SelectorParseError(pattern, result.position, result.error);
    }
    return result;
  }

  /** Parse without throwing; see {@link parseSelector}. */
  static tryParse(pattern: string): Selector | SelectorParseFailure {
    try {
      return new Selector(pattern, new Parser(pattern).parse());
    } catch (err: unknown) {
      if (err instanceof Failure) {
        return { error: err.reason, position: err.position };
      }
      throw err;
    }
  }

  /** Whether any alternative matches the full path. */
  isMatch(path: ContentPath): boolean {
    return this.alternatives.some((alt) => matchFrom(alt, 0, path.segments, 0));
  }

  toString(): string {
    return this.source;
  }
}

/**
 * Parse a selector pattern without throwing.
 * Returns a {@link SelectorParseFailure} for malformed patterns.
 */
export function parseSelector(pattern: string): Selector | SelectorParseFailure {
  return Selector.tryParse(pattern);
}
