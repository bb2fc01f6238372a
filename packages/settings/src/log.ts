/**
 * Diagnostic output.
 *
 * Silent unless verbose mode is on (`SNAPBIND_VERBOSE=1` or
 * `setVerbose(true)`). Lines go to stderr so they never mix with test
 * reporter output on stdout.
 */

import { readFlag } from "./flags.js";

/**
 * Initial verbose state from the environment. Accepts the same values as
 * `resolveSettingsConfig`; an unrecognized value leaves verbose off here
 * and is reported when the config is resolved.
 */
export function verboseFromEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return readFlag(env.SNAPBIND_VERBOSE) ?? false;
}

let verbose = verboseFromEnv();

export function setVerbose(value: boolean): void {
  verbose = value;
}

export function isVerbose(): boolean {
  return verbose;
}

/** Write `[scope] message` to stderr when verbose. */
export function logVerbose(scope: string, message: string): void {
  if (verbose) {
    console.error(`[${scope}] ${message}`);
  }
}
