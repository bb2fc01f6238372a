/**
 * Snapshot value preparation.
 *
 * The step an assertion runs right before comparing: read the calling
 * thread's current settings, serialize the captured value, apply the
 * redactions and, when asked, sort maps.
 */

import { type Content, sortContent, toContent } from "@snapbind/core";
import { Settings, logVerbose } from "@snapbind/settings";

import { type RedactionStats, applyRedactions, createStats } from "./redact.js";

export interface PreparedSnapshot {
  /** Normalized content, ready for serialization and comparison. */
  content: Content;
  /** Snapshot directory from the settings in effect. */
  snapshotPath: string;
  stats: RedactionStats;
}

/**
 * Normalize `value` with the current settings.
 *
 * Errors thrown by dynamic redactions and assertions propagate to the
 * caller unchanged.
 */
export function prepareSnapshotValue(value: unknown): PreparedSnapshot {
  return Settings.with((current) => {
    const stats = createStats();
    let content = applyRedactions(toContent(value), current.iterRedactions(), stats);
    if (current.sortMaps()) {
      content = sortContent(content);
    }

    if (stats.totalMatches > 0) {
      const details = Object.entries(stats.byKind)
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${kind}=${count}`)
        .join(", ");
      logVerbose("redact", `Redacted ${stats.totalMatches} match(es): ${details}`);
    }

    return { content, snapshotPath: current.snapshotPath(), stats };
  });
}
