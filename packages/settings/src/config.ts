/**
 * Settings configuration resolution.
 *
 * Merges programmatic overrides with environment variables. The process
 * default settings never read the environment; only handles built with
 * {@link settingsFromEnv} or {@link settingsFromConfig} do.
 */

import { loadSettingsFile } from "./file.js";
import { parseFlag } from "./flags.js";
import { setVerbose } from "./log.js";
import { Settings } from "./settings.js";

export interface SettingsConfig {
  sortMaps?: boolean;
  snapshotPath?: string;
  /** Path to a settings JSON(C) file, applied before the other values. */
  settingsFile?: string;
  verbose?: boolean;
}

/**
 * Fully resolved config. `null` means "not configured": the handle keeps
 * the value from the settings file, or the default.
 */
export interface ResolvedSettingsConfig {
  sortMaps: boolean | null;
  snapshotPath: string | null;
  settingsFile: string | null;
  verbose: boolean;
}

function nonEmpty(raw: string | undefined): string | null {
  return raw !== undefined && raw !== "" ? raw : null;
}

/**
 * Resolve settings config from environment variables and overrides.
 *
 * Priority: programmatic overrides > environment variables > defaults.
 *
 * Environment variables:
 * - `SNAPBIND_SORT_MAPS` (`1`/`0`, `true`/`false`)
 * - `SNAPBIND_SNAPSHOT_PATH` for the snapshot directory
 * - `SNAPBIND_SETTINGS_FILE` for a settings file to load first
 * - `SNAPBIND_VERBOSE=1` for diagnostics on stderr
 */
export function resolveSettingsConfig(
  overrides?: SettingsConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedSettingsConfig {
  const sortMaps =
    overrides?.sortMaps ?? parseFlag("SNAPBIND_SORT_MAPS", env.SNAPBIND_SORT_MAPS);

  const snapshotPath =
    overrides?.snapshotPath || nonEmpty(env.SNAPBIND_SNAPSHOT_PATH);

  const settingsFile =
    overrides?.settingsFile || nonEmpty(env.SNAPBIND_SETTINGS_FILE);

  const verbose =
    overrides?.verbose ?? parseFlag("SNAPBIND_VERBOSE", env.SNAPBIND_VERBOSE) ?? false;

  return { sortMaps, snapshotPath, settingsFile, verbose };
}

/**
 * Build a handle from a resolved config: the settings file (if any)
 * first, then the explicit values on top.
 */
export function settingsFromConfig(config: ResolvedSettingsConfig): Settings {
  if (config.verbose) setVerbose(true);

  const settings = config.settingsFile
    ? loadSettingsFile(config.settingsFile)
    : new Settings();

  if (config.sortMaps !== null) settings.setSortMaps(config.sortMaps);
  if (config.snapshotPath !== null) settings.setSnapshotPath(config.snapshotPath);
  return settings;
}

/** Shorthand for `settingsFromConfig(resolveSettingsConfig(overrides, env))`. */
export function settingsFromEnv(
  overrides?: SettingsConfig,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  return settingsFromConfig(resolveSettingsConfig(overrides, env));
}
