/**
 * Redaction rule list.
 *
 * A redaction pairs a parsed selector with one of three actions:
 *
 * - static: the matched node is replaced by a fixed value
 * - dynamic: a callback computes the replacement from the node and its path
 * - assertion: a callback inspects the node and throws when it is wrong;
 *   the node is left unchanged
 *
 * Rules are kept in registration order. The evaluator applies them in
 * that order, so a later rule sees the tree as rewritten by earlier ones.
 */

import {
  type Content,
  type ContentPath,
  Selector,
  contentEquals,
  freezeContent,
  toContent,
} from "@snapbind/core";

/** Computes a replacement. The result is serialized with `toContent`. */
export type DynamicRedactionFn = (value: Content, path: ContentPath) => unknown;

/** Checks a matched value; throws to fail the test. */
export type AssertionFn = (value: Content, path: ContentPath) => void;

export interface StaticRedaction {
  kind: "static";
  value: Content;
}

export interface DynamicRedaction {
  kind: "dynamic";
  replace: DynamicRedactionFn;
}

export interface AssertionRedaction {
  kind: "assertion";
  check: AssertionFn;
}

export type Redaction = StaticRedaction | DynamicRedaction | AssertionRedaction;

export type RedactionEntry = readonly [Selector, Redaction];

/** A selector given as pattern text or already parsed. */
export type SelectorInput = string | Selector;

/**
 * Anything `setRedactions()` accepts: another rule list, `[selector, value]`
 * pairs, or a record of selector to value. Pairs and records create static
 * rules in iteration order.
 */
export type RedactionsInput =
  | Redactions
  | Iterable<readonly [SelectorInput, unknown]>
  | Record<string, unknown>;

/**
 * Parse a selector given as text; pass parsed selectors through.
 * @throws SelectorParseError for malformed patterns.
 */
export function resolveSelector(selector: SelectorInput): Selector {
  return typeof selector === "string" ? Selector.parse(selector) : selector;
}

/**
 * Build a static rule from any serializable value. The stored value is
 * frozen: rule lists are shared between handles.
 */
export function staticRedaction(value: unknown): StaticRedaction {
  return { kind: "static", value: freezeContent(toContent(value)) };
}

function redactionEquals(a: Redaction, b: Redaction): boolean {
  switch (a.kind) {
    case "static":
      return b.kind === "static" && contentEquals(a.value, b.value);
    case "dynamic":
      return b.kind === "dynamic" && a.replace === b.replace;
    case "assertion":
      return b.kind === "assertion" && a.check === b.check;
  }
}

/**
 * Compare two rule sequences: same length, same selector text and
 * equal actions at every position. Callbacks compare by identity.
 */
export function redactionListsEqual(
  a: Iterable<RedactionEntry>,
  b: Iterable<RedactionEntry>,
): boolean {
  const left = [...a];
  const right = [...b];
  if (left.length !== right.length) return false;
  return left.every(
    ([selector, redaction], i) =>
      selector.source === right[i][0].source && redactionEquals(redaction, right[i][1]),
  );
}

function isEntryIterable(
  input: RedactionsInput,
): input is Iterable<readonly [SelectorInput, unknown]> {
  return Symbol.iterator in input;
}

/**
 * Ordered list of redaction rules owned by one settings snapshot.
 *
 * Only the owning snapshot writes to it, and only after the copy-on-write
 * step has made that snapshot unique. Everyone else reads through
 * `entries()`.
 */
export class Redactions implements Iterable<RedactionEntry> {
  private readonly list: RedactionEntry[];

  constructor(entries: Iterable<RedactionEntry> = []) {
    this.list = [...entries];
  }

  /**
   * Build a rule list. Every selector is parsed before the list is
   * created, so a malformed selector throws without producing anything.
   */
  static from(input: RedactionsInput): Redactions {
    if (input instanceof Redactions) return input.clone();
    const pairs: (readonly [SelectorInput, unknown])[] = isEntryIterable(input)
      ? [...input]
      : Object.entries(input);
    return new Redactions(
      pairs.map(([selector, value]): RedactionEntry => [
        resolveSelector(selector),
        staticRedaction(value),
      ]),
    );
  }

  get size(): number {
    return this.list.length;
  }

  /** Rules in registration order. */
  entries(): IterableIterator<RedactionEntry> {
    return this.list.values();
  }

  [Symbol.iterator](): IterableIterator<RedactionEntry> {
    return this.entries();
  }

  /** Append a rule. Only for a uniquely owned snapshot. */
  push(selector: Selector, redaction: Redaction): void {
    this.list.push([selector, redaction]);
  }

  /** Remove all rules. Only for a uniquely owned snapshot. */
  clear(): void {
    this.list.length = 0;
  }

  /** Shallow copy: selectors and actions are immutable and shared. */
  clone(): Redactions {
    return new Redactions(this.list);
  }
}
