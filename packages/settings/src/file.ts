/**
 * Settings files.
 *
 * A settings file is a JSON document that a test suite can share instead
 * of configuring handles in code. Only static redactions can be expressed
 * in a file; dynamic redactions and assertions need code.
 *
 * Settings file format:
 * {
 *   "sortMaps": true,
 *   "snapshotPath": "__snapshots__",
 *   "redactions": {
 *     ".**.created_at": "[timestamp]",
 *     ".users[].id": "[id]"
 *   }
 * }
 */

import fs from "node:fs";

import { Settings } from "./settings.js";

// --- Settings JSON schema types ---

export interface SettingsFileJson {
  /** Sort map keys before comparison. */
  sortMaps?: boolean;
  /** Snapshot directory. */
  snapshotPath?: string;
  /** Static redactions, applied in key order. */
  redactions?: Record<string, unknown>;
}

const KNOWN_KEYS = new Set(["sortMaps", "snapshotPath", "redactions"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Index just past the string literal that opens at `start`. */
function stringEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "\\") i += 2;
    else if (text[i] === '"') return i + 1;
    else i++;
  }
  return text.length;
}

/**
 * Strip // comments and trailing commas from JSON-with-comments. String
 * literals are copied as they are. Not a full JSONC parser: block
 * comments are not supported.
 */
export function stripJsonComments(text: string): string {
  let withoutComments = "";
  for (let i = 0; i < text.length; ) {
    if (text[i] === '"') {
      const end = stringEnd(text, i);
      withoutComments += text.slice(i, end);
      i = end;
    } else if (text.startsWith("//", i)) {
      while (i < text.length && text[i] !== "\n") i++;
    } else {
      withoutComments += text[i++];
    }
  }

  let result = "";
  for (let i = 0; i < withoutComments.length; ) {
    const ch = withoutComments[i];
    if (ch === '"') {
      const end = stringEnd(withoutComments, i);
      result += withoutComments.slice(i, end);
      i = end;
      continue;
    }
    if (ch === "," && /^\s*[\]}]/.test(withoutComments.slice(i + 1))) {
      i++;
      continue;
    }
    result += ch;
    i++;
  }
  return result;
}

/**
 * Validate a parsed settings document and build a handle from it.
 * Throws on unknown keys, wrong types, and malformed selectors.
 */
export function settingsFromJson(json: unknown, source = "settings"): Settings {
  if (!isRecord(json)) {
    throw new Error(`Invalid ${source}: expected a JSON object`);
  }

  const unknownKeys = Object.keys(json).filter((key) => !KNOWN_KEYS.has(key));
  if (unknownKeys.length > 0) {
    throw new Error(
      `Invalid ${source}: unknown key(s) ${unknownKeys.map((k) => `"${k}"`).join(", ")}. ` +
        `Allowed: ${[...KNOWN_KEYS].join(", ")}`,
    );
  }

  const settings = new Settings();

  if (json.sortMaps !== undefined) {
    if (typeof json.sortMaps !== "boolean") {
      throw new Error(`Invalid ${source}: "sortMaps" must be a boolean`);
    }
    settings.setSortMaps(json.sortMaps);
  }

  if (json.snapshotPath !== undefined) {
    if (typeof json.snapshotPath !== "string" || json.snapshotPath === "") {
      throw new Error(`Invalid ${source}: "snapshotPath" must be a non-empty string`);
    }
    settings.setSnapshotPath(json.snapshotPath);
  }

  if (json.redactions !== undefined) {
    if (!isRecord(json.redactions)) {
      throw new Error(`Invalid ${source}: "redactions" must map selectors to values`);
    }
    settings.setRedactions(json.redactions);
  }

  return settings;
}

/**
 * Load settings from a JSON file path. Supports // comments and trailing commas.
 */
export function loadSettingsFile(filePath: string): Settings {
  const raw = fs.readFileSync(filePath, "utf8");
  const json: unknown = JSON.parse(stripJsonComments(raw));
  return settingsFromJson(json, filePath);
}
