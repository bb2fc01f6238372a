/**
 * @snapbind/redact - Apply snapshot settings to captured values.
 *
 * Reads the calling thread's current settings and normalizes a captured
 * value before comparison: static and dynamic redactions rewrite matched
 * nodes, assertions check them, and maps are sorted when configured.
 *
 * ```typescript
 * import { Settings } from '@snapbind/settings';
 * import { prepareSnapshotValue } from '@snapbind/redact';
 *
 * const settings = new Settings();
 * settings.addRedaction(".token", "[token]");
 * const { content } = settings.bind(() => prepareSnapshotValue(response));
 * ```
 */

export type { RedactionStats } from "./redact.js";
export { applyRedactions, createStats } from "./redact.js";
export type { PreparedSnapshot } from "./prepare.js";
export { prepareSnapshotValue } from "./prepare.js";
