/**
 * Snapshot settings.
 *
 * A `Settings` handle is a cheap, shareable front-end over an immutable
 * settings snapshot. Cloning a handle only retains the snapshot; the
 * first write after a share clones it, so other handles never observe
 * the write.
 *
 * Each thread has one current handle. `bind()` makes a handle current
 * for the duration of a callback, `bindToThread()` makes it current for
 * the rest of the thread's life, and `Settings.with()` is how snapshot
 * assertions read the current values at comparison time.
 *
 * ```typescript
 * import { Settings } from "@snapbind/settings";
 *
 * const settings = new Settings();
 * settings.setSortMaps(true);
 * settings.addRedaction(".created_at", "[timestamp]");
 * settings.bind(() => {
 *   assertSnapshot(loadUser());
 * });
 * ```
 */

import { ThreadSlot } from "./binding.js";
import { logVerbose } from "./log.js";
import {
  type AssertionFn,
  type DynamicRedactionFn,
  type RedactionEntry,
  Redactions,
  type RedactionsInput,
  type SelectorInput,
  redactionListsEqual,
  resolveSelector,
  staticRedaction,
} from "./redactions.js";
import { Shared, makeMut } from "./shared.js";

/** Default snapshot directory, relative to the test that asserts. */
export const DEFAULT_SNAPSHOT_PATH = "snapshots";

/**
 * The tunables behind a handle. Treated as immutable whenever more than
 * one handle (or the thread slot) holds it.
 */
export class ActualSettings {
  constructor(
    public sortMaps: boolean,
    public snapshotPath: string,
    public redactions: Redactions,
  ) {}

  clone(): ActualSettings {
    return new ActualSettings(this.sortMaps, this.snapshotPath, this.redactions.clone());
  }
}

// Held by the module itself, so a handle on the default is never unique
// and its first write always copies.
const DEFAULT_SETTINGS = new Shared(
  new ActualSettings(false, DEFAULT_SNAPSHOT_PATH, new Redactions()),
);

const CURRENT_SETTINGS = new ThreadSlot<Shared<ActualSettings>>(() =>
  DEFAULT_SETTINGS.retain(),
);

/** Read-only access to a handle, as passed to `Settings.with()` callbacks. */
export interface SettingsView {
  sortMaps(): boolean;
  snapshotPath(): string;
  iterRedactions(): IterableIterator<RedactionEntry>;
  redactionCount(): number;
  /** An independent handle on the same snapshot. */
  clone(): Settings;
}

/** Values applied by {@link withSettings} on top of the current handle. */
export interface SettingsOverrides {
  sortMaps?: boolean;
  snapshotPath?: string;
  redactions?: RedactionsInput;
}

export class Settings implements SettingsView {
  private inner: Shared<ActualSettings>;

  /** A handle on the shared default snapshot. Allocates no snapshot. */
  constructor() {
    this.inner = DEFAULT_SETTINGS.retain();
  }

  /** Same as `new Settings()`. */
  static new(): Settings {
    return new Settings();
  }

  /** A new handle on the calling thread's current snapshot. */
  static current(): Settings {
    return Settings.fromShared(CURRENT_SETTINGS.get().retain());
  }

  /**
   * Run `fn` with a read-only view of the calling thread's current handle
   * and return its result.
   */
  static with<R>(fn: (current: SettingsView) => R): R {
    return fn(Settings.view(CURRENT_SETTINGS.get()));
  }

  /** Alias of {@link Settings.with}. */
  static withCurrent<R>(fn: (current: SettingsView) => R): R {
    return Settings.with(fn);
  }

  private static fromShared(inner: Shared<ActualSettings>): Settings {
    const settings = new Settings();
    settings.inner.release();
    settings.inner = inner;
    return settings;
  }

  private static view(inner: Shared<ActualSettings>): SettingsView {
    return {
      sortMaps: () => inner.value.sortMaps,
      snapshotPath: () => inner.value.snapshotPath,
      iterRedactions: () => inner.value.redactions.entries(),
      redactionCount: () => inner.value.redactions.size,
      clone: () => Settings.fromShared(inner.retain()),
    };
  }

  /** O(1): the new handle shares this snapshot until either side writes. */
  clone(): Settings {
    return Settings.fromShared(this.inner.retain());
  }

  private mut(): ActualSettings {
    this.inner = makeMut(this.inner, (actual) => actual.clone());
    return this.inner.value;
  }

  // --- Tunables ---

  /**
   * Sort map keys before comparison. Only affects serialized snapshots.
   * Default: false.
   */
  setSortMaps(value: boolean): void {
    this.mut().sortMaps = value;
  }

  sortMaps(): boolean {
    return this.inner.value.sortMaps;
  }

  /**
   * Directory for snapshot files. Relative paths are resolved against the
   * test's location by the snapshot writer. Default: "snapshots".
   */
  setSnapshotPath(path: string): void {
    this.mut().snapshotPath = path;
  }

  snapshotPath(): string {
    return this.inner.value.snapshotPath;
  }

  // --- Redactions ---

  /**
   * Replace every value matched by `selector` with `replacement`.
   * @throws SelectorParseError before anything is registered.
   */
  addRedaction(selector: SelectorInput, replacement: unknown): void {
    const parsed = resolveSelector(selector);
    const redaction = staticRedaction(replacement);
    this.mut().redactions.push(parsed, redaction);
  }

  /**
   * Replace every value matched by `selector` with what `fn` returns for
   * it. `fn` may run many times, once per match per assertion.
   *
   * ```typescript
   * settings.addDynamicRedaction(".id", (value, path) => {
   *   assert.equal(path.toString(), ".id");
   *   return "[uuid]";
   * });
   * ```
   *
   * @throws SelectorParseError before anything is registered.
   */
  addDynamicRedaction(selector: SelectorInput, fn: DynamicRedactionFn): void {
    const parsed = resolveSelector(selector);
    this.mut().redactions.push(parsed, { kind: "dynamic", replace: fn });
  }

  /**
   * Check every value matched by `selector` without changing it. `fn`
   * should throw (e.g. through `node:assert`) when the check fails.
   *
   * @throws SelectorParseError before anything is registered.
   */
  addAssertion(selector: SelectorInput, fn: AssertionFn): void {
    const parsed = resolveSelector(selector);
    this.mut().redactions.push(parsed, { kind: "assertion", check: fn });
  }

  /**
   * Replace all rules at once. All selectors are parsed first; on a parse
   * error the current rules stay in place.
   */
  setRedactions(redactions: RedactionsInput): void {
    const next = Redactions.from(redactions);
    this.mut().redactions = next;
  }

  clearRedactions(): void {
    this.mut().redactions.clear();
  }

  /** Rules in registration order. */
  iterRedactions(): IterableIterator<RedactionEntry> {
    return this.inner.value.redactions.entries();
  }

  redactionCount(): number {
    return this.inner.value.redactions.size;
  }

  // --- Identity ---

  /** Whether the tunables are equal, regardless of shared storage. */
  equals(other: SettingsView): boolean {
    return (
      this.sortMaps() === other.sortMaps() &&
      this.snapshotPath() === other.snapshotPath() &&
      redactionListsEqual(this.iterRedactions(), other.iterRedactions())
    );
  }

  /** Whether both handles currently point at the same snapshot storage. */
  sharesSnapshotWith(other: Settings): boolean {
    return this.inner === other.inner;
  }

  // --- Binding ---

  /**
   * Make this handle current for the calling thread while `body` runs,
   * then restore the previous one, also when `body` throws.
   *
   * `body` runs synchronously. Work it schedules for later (promises,
   * timers) sees whatever is current when it runs.
   */
  bind<R>(body: () => R): R {
    const previous = CURRENT_SETTINGS.replace(this.inner.retain());
    logVerbose("settings", `bound ${describe(this.inner.value)} on thread ${CURRENT_SETTINGS.threadId}`);
    try {
      return body();
    } finally {
      CURRENT_SETTINGS.replace(previous).release();
      logVerbose("settings", `restored ${describe(previous.value)} on thread ${CURRENT_SETTINGS.threadId}`);
    }
  }

  /** Make this handle current for the rest of the calling thread's life. */
  bindToThread(): void {
    CURRENT_SETTINGS.replace(this.inner.retain()).release();
    logVerbose("settings", `bound ${describe(this.inner.value)} to thread ${CURRENT_SETTINGS.threadId}`);
  }
}

function describe(actual: ActualSettings): string {
  return `settings(sortMaps=${actual.sortMaps}, snapshotPath=${actual.snapshotPath}, redactions=${actual.redactions.size})`;
}

/**
 * Run `body` with a copy of the current handle adjusted by `overrides`.
 * `redactions` replaces the copied rule list rather than extending it.
 *
 * ```typescript
 * withSettings({ sortMaps: true, redactions: { ".id": "[id]" } }, () => {
 *   assertSnapshot(response);
 * });
 * ```
 */
export function withSettings<R>(overrides: SettingsOverrides, body: () => R): R {
  const settings = Settings.current();
  if (overrides.sortMaps !== undefined) settings.setSortMaps(overrides.sortMaps);
  if (overrides.snapshotPath !== undefined) settings.setSnapshotPath(overrides.snapshotPath);
  if (overrides.redactions !== undefined) settings.setRedactions(overrides.redactions);
  return settings.bind(body);
}
