/**
 * Redaction engine.
 *
 * Applies a settings rule list to a content tree. Each rule walks the
 * whole tree from the root; the first node on a branch whose path the
 * selector matches is handed to the rule's action, and the walk does not
 * descend into it. Rules run in registration order, each on the output
 * of the previous one. Preserves structure; does not mutate the input.
 */

import {
  type Content,
  ContentPath,
  type ContentMap,
  type Selector,
  cloneContent,
  isContentMap,
  setEntry,
  toContent,
} from "@snapbind/core";
import type { Redaction, RedactionEntry } from "@snapbind/settings";

export interface RedactionStats {
  /** Total number of matched nodes across all rules. */
  totalMatches: number;
  /** Matches per action kind. */
  byKind: Record<Redaction["kind"], number>;
}

/**
 * Create fresh stats for a redaction pass.
 */
export function createStats(): RedactionStats {
  return { totalMatches: 0, byKind: { static: 0, dynamic: 0, assertion: 0 } };
}

/**
 * Run one action on a matched node. Callback errors propagate unchanged.
 * Static values are copied into the tree; the rule's own value is shared
 * by every handle that holds the rule list.
 */
function applyAction(value: Content, path: ContentPath, redaction: Redaction): Content {
  switch (redaction.kind) {
    case "static":
      return cloneContent(redaction.value);
    case "dynamic":
      return toContent(redaction.replace(value, path));
    case "assertion":
      redaction.check(value, path);
      return value;
  }
}

/**
 * Apply a single rule to `value`, which sits at `path`.
 */
function applyRule(
  value: Content,
  path: ContentPath,
  selector: Selector,
  redaction: Redaction,
  stats: RedactionStats,
): Content {
  if (selector.isMatch(path)) {
    stats.totalMatches++;
    stats.byKind[redaction.kind]++;
    return applyAction(value, path, redaction);
  }

  if (Array.isArray(value)) {
    const items = value;
    return items.map((item, i) =>
      applyRule(item, path.index(i, items.length), selector, redaction, stats),
    );
  }

  if (isContentMap(value)) {
    const result: ContentMap = {};
    for (const [key, val] of Object.entries(value)) {
      setEntry(result, key, applyRule(val, path.key(key), selector, redaction, stats));
    }
    return result;
  }

  // Scalars: pass through
  return value;
}

/**
 * Apply rules to a content tree in order.
 *
 * @param content - The tree to redact.
 * @param redactions - Rules, typically `settings.iterRedactions()`.
 * @param stats - Mutable stats object; updated with match counts.
 * @returns A new tree. Assertion rules leave their nodes unchanged.
 */
export function applyRedactions(
  content: Content,
  redactions: Iterable<RedactionEntry>,
  stats: RedactionStats = createStats(),
): Content {
  let result = content;
  for (const [selector, redaction] of redactions) {
    result = applyRule(result, ContentPath.root(), selector, redaction, stats);
  }
  return result;
}
