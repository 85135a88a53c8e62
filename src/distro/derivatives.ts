// Derivative translation. A downstream distribution with a known base release
// is dispatched as that base: Linux Mint 17 installs exactly like Ubuntu 14.04.
// Translation is a pure function of the untranslated distro, so applying it to
// its own output changes nothing (base names are never derivative names).
import { logger } from "../logger.js";
import { normalizeDistroName } from "./version.js";

export interface DistroVersion {
  readonly name: string;
  readonly version: string;
}

export interface DerivativeInput extends DistroVersion {
  /** `ID=` from /etc/os-release, used by the Debian pass. */
  readonly osReleaseId: string | null;
}

export interface TranslationResult extends DistroVersion {
  readonly translatedFrom: string | null;
}

interface DerivativeFamily {
  readonly base: string;
  readonly pattern: RegExp;
  /** derivative → major → base version */
  readonly table: Readonly<Record<string, Readonly<Record<string, string>>>>;
  readonly key: (input: DerivativeInput) => string;
  readonly major: (derivative: string, version: string) => string;
}

const leadingDigits = (_derivative: string, version: string): string => /^([0-9]*)/.exec(version)?.[1] ?? "";

export const UBUNTU_DERIVATIVES: DerivativeFamily = {
  base: "ubuntu",
  pattern: /^(trisquel|linuxmint|linaro|elementary_os)$/,
  table: {
    trisquel: { "6": "12.04" },
    // Mint 15 is left out: add-apt-repository is broken there.
    linuxmint: { "13": "12.04", "14": "12.10", "16": "13.10", "17": "14.04" },
    linaro: { "12": "12.04" },
    elementary_os: { "02": "12.04" },
  },
  key: (input) => normalizeDistroName(input.name),
  major: (derivative, version) => (derivative === "elementary_os" ? version.replace(/\./g, "") : leadingDigits(derivative, version)),
};

export const DEBIAN_DERIVATIVES: DerivativeFamily = {
  base: "debian",
  pattern: /^(kali|linuxmint)$/,
  table: {
    kali: { "1": "7.0" },
    // LMDE reports ID=linuxmint with a single-digit version.
    linuxmint: { "1": "8.0" },
  },
  key: (input) => (input.osReleaseId ?? normalizeDistroName(input.name)).toLowerCase(),
  major: leadingDigits,
};

const FAMILIES: readonly DerivativeFamily[] = [UBUNTU_DERIVATIVES, DEBIAN_DERIVATIVES];

function lookupBase(family: DerivativeFamily, input: DerivativeInput): { derivative: string; version: string } | null {
  const derivative = family.key(input);
  if (!family.pattern.test(derivative)) return null;
  const version = family.table[derivative]?.[family.major(derivative, input.version)];
  return version ? { derivative, version } : null;
}

/**
 * Translate a derivative distro into its base distro. Each family is looked up
 * against the untranslated input; the first family with a table hit wins.
 * Base distros, unknown derivatives and unmapped releases are returned unchanged.
 */
export function translateDerivative(input: DerivativeInput): TranslationResult {
  const unchanged = { name: input.name, version: input.version, translatedFrom: null };
  if (FAMILIES.some((family) => family.base === normalizeDistroName(input.name))) return unchanged;
  for (const family of FAMILIES) {
    const hit = lookupBase(family, input);
    if (!hit) continue;
    logger.debug({ derivative: hit.derivative, base: family.base, baseVersion: hit.version }, `Detected ${family.base} ${hit.version} derivative`);
    return { name: family.base, version: hit.version, translatedFrom: hit.derivative };
  }
  return unchanged;
}
