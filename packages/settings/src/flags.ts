/**
 * Boolean environment flags, shared by config resolution and the
 * verbose switch.
 */

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

/**
 * Read a flag value. `null` when unset, empty or unrecognized.
 */
export function readFlag(raw: string | undefined): boolean | null {
  if (raw === undefined) return null;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  return null;
}

/**
 * Like {@link readFlag}, but an unrecognized non-empty value throws.
 */
export function parseFlag(name: string, raw: string | undefined): boolean | null {
  const flag = readFlag(raw);
  if (flag === null && raw !== undefined && raw.trim() !== "") {
    throw new Error(`Invalid value for ${name}: "${raw}". Expected one of 1, 0, true, false.`);
  }
  return flag;
}
