import { logger } from "../logger.js";

/**
 * Reduce a free-form version string to `MAJOR.MINOR`, or `MAJOR` when there is
 * no minor component. Leading non-digits are skipped and anything after the
 * minor component (revision, suffixes) is dropped. Returns "" when the string
 * contains no leading digits to work with.
 *
 *   "12.04.5 LTS" → "12.04"    "release 7" → "7"    "wheezy/sid" → ""
 */
export function parseVersionString(version: string): string {
  const pair = /^[^0-9]*([0-9]+\.[0-9]+)/.exec(version);
  if (pair?.[1]) return pair[1];
  const single = /^[^0-9]*([0-9]+)/.exec(version);
  return single?.[1] ?? "";
}

/** Split a parsed version into its digit-string components. */
export function splitVersion(version: string): { major: string | null; minor: string | null } {
  const match = /^([0-9]+)(?:\.([0-9]+))?/.exec(version);
  if (!match?.[1]) return { major: null, minor: null };
  return { major: match[1], minor: match[2] ?? null };
}

/** Debian code names seen in /etc/debian_version on images that carry no number. */
const DEBIAN_TESTING_CODENAMES: Readonly<Record<string, string>> = {
  "wheezy/sid": "7.0",
  "jessie/sid": "8.0",
  "stretch/sid": "9.0",
  "buster/sid": "10.0",
  "bullseye/sid": "11.0",
  "bookworm/sid": "12.0",
  "trixie/sid": "13.0",
};

/**
 * Numeric Debian version. Numeric input is kept; empty input falls back to the
 * contents of /etc/debian_version (passed in by the caller). Codename-only
 * testing releases are mapped through a small table.
 */
export function deriveDebianNumericVersion(input: string, debianVersionFile: string | null): string {
  const trimmed = input.trim();
  if (/^[0-9]/.test(trimmed)) return trimmed;

  const source = trimmed === "" && debianVersionFile !== null ? debianVersionFile.trim() : trimmed;
  const mapped = DEBIAN_TESTING_CODENAMES[source];
  if (mapped) return parseVersionString(mapped);
  if (/^[0-9]/.test(source)) return source;

  logger.warn({ codename: source }, "Unable to parse the Debian version");
  return "";
}

/** Strip one pair of matching single or double quotes. */
export function unquote(value: string): string {
  const match = /^(["'])(.*)\1$/.exec(value);
  return match?.[2] ?? value;
}

/** "RedHatEnterpriseServer" → "Red Hat Enterprise Server". */
export function camelCaseSplit(value: string): string {
  return value.replace(/([^A-Z-])([A-Z])/g, "$1 $2");
}

/** Lowercase, drop punctuation, collapse whitespace runs to "_". */
export function normalizeDistroName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9_ ]/g, "")
    .trim()
    .replace(/\s+/g, "_");
}
