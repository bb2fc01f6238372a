/**
 * @snapbind/settings - Scoped configuration for snapshot assertions.
 *
 * Holds the tunables that decide how a captured value is normalized
 * before it is compared with a stored snapshot: map sorting, the
 * snapshot directory, and an ordered list of redactions addressed by
 * selectors.
 *
 * ```typescript
 * import { Settings } from '@snapbind/settings';
 *
 * const settings = new Settings();
 * settings.addRedaction(".**.created_at", "[timestamp]");
 * settings.addAssertion(".id", (value) => assert.match(String(value), /^u_/));
 * settings.bind(() => runAssertions());
 * ```
 */

export type {
  AssertionFn,
  AssertionRedaction,
  DynamicRedaction,
  DynamicRedactionFn,
  Redaction,
  RedactionEntry,
  RedactionsInput,
  SelectorInput,
  StaticRedaction,
} from "./redactions.js";
export { Redactions, redactionListsEqual, resolveSelector, staticRedaction } from "./redactions.js";

export type { SettingsOverrides, SettingsView } from "./settings.js";
export { ActualSettings, DEFAULT_SNAPSHOT_PATH, Settings, withSettings } from "./settings.js";

export { Shared, makeMut } from "./shared.js";
export { ThreadSlot } from "./binding.js";

export type { ResolvedSettingsConfig, SettingsConfig } from "./config.js";
export { resolveSettingsConfig, settingsFromConfig, settingsFromEnv } from "./config.js";

export type { SettingsFileJson } from "./file.js";
export { loadSettingsFile, settingsFromJson, stripJsonComments } from "./file.js";

export { isVerbose, logVerbose, setVerbose, verboseFromEnv } from "./log.js";
export { parseFlag, readFlag } from "./flags.js";
