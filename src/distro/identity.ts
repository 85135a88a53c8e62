// Identity construction and the support checks that must pass before any
// handler is resolved. buildIdentity is the only place an Identity is created.
import type { Identity, RawDistro } from "../types/identity.js";
import type { InstallMode } from "../types/install.js";
import { isPinnedStable } from "../types/install.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { releaseCodename } from "./codename.js";
import { translateDerivative } from "./derivatives.js";
import { normalizeDistroName, splitVersion } from "./version.js";

/**
 * Normalize and translate a raw distro into the canonical identity.
 * Derivative translation happens here, once, on the untranslated input.
 * A host whose distro could not be named is rejected, since no handler name
 * can be formed without it.
 */
export function buildIdentity(raw: RawDistro): Identity {
  if (normalizeDistroName(raw.name) === "") {
    throw new BootstrapError(BootstrapErrorCode.UNSUPPORTED_DISTRO, "Unable to determine the distribution of this host", {
      name: raw.name,
      version: raw.version,
    });
  }
  const translated = translateDerivative({
    name: normalizeDistroName(raw.name),
    version: raw.version,
    osReleaseId: raw.osReleaseId,
  });
  const { major, minor } =
    raw.simplifyVersion && translated.version !== "" ? splitVersion(translated.version) : { major: null, minor: null };
  const normalized = translated.name;

  return Object.freeze({
    distroName: translated.translatedFrom ? translated.name : raw.name,
    distroNameNormalized: normalized,
    version: translated.version,
    majorVersion: major,
    minorVersion: minor,
    codename: releaseCodename(normalized, major, minor),
    translatedFrom: translated.translatedFrom,
  });
}

interface EndOfLife {
  readonly matches: (name: string) => boolean;
  readonly unsupported: (major: number, minor: number, patchLevel: number) => boolean;
  readonly message: string;
  readonly reference?: string;
}

const END_OF_LIFE: readonly EndOfLife[] = [
  { matches: (n) => n === "debian", unsupported: (M) => M < 6, message: "End of life distributions are not supported.", reference: "https://wiki.debian.org/DebianReleases" },
  { matches: (n) => n === "ubuntu", unsupported: (M) => M < 12, message: "End of life distributions are not supported.", reference: "https://wiki.ubuntu.com/Releases" },
  { matches: (n) => n === "opensuse", unsupported: (M, m) => M < 12 || (M === 12 && m <= 1), message: "End of life distributions are not supported.", reference: "http://en.opensuse.org/Lifetime" },
  { matches: (n) => n === "suse", unsupported: (M, _m, sp) => M < 11 || (M === 11 && sp < 2), message: "Versions lower than SuSE 11 SP2 are not supported." },
  { matches: (n) => n === "fedora", unsupported: (M) => M < 18, message: "End of life distributions are not supported.", reference: "https://fedoraproject.org/wiki/Releases" },
  { matches: (n) => n === "centos", unsupported: (M) => M < 5, message: "End of life distributions are not supported.", reference: "http://wiki.centos.org/Download" },
  { matches: (n) => /^red_hat.*linux$/.test(n), unsupported: (M) => M < 5, message: "End of life distributions are not supported.", reference: "https://access.redhat.com/support/policy/updates/errata/" },
  { matches: (n) => n === "freebsd", unsupported: (M, m) => M < 9 || (M === 9 && m < 1), message: "Versions lower than FreeBSD 9.1 are not supported." },
];

/**
 * Fail for end-of-life releases. Unversioned identities pass: there is nothing
 * to compare. `patchLevel` is the SUSE service pack ("00" elsewhere).
 */
export function checkEndOfLife(identity: Identity, patchLevel = "00"): void {
  if (identity.majorVersion === null) return;
  const rule = END_OF_LIFE.find((r) => r.matches(identity.distroNameNormalized));
  if (!rule) return;
  const major = Number(identity.majorVersion);
  const minor = Number(identity.minorVersion ?? "0");
  if (!rule.unsupported(major, minor, Number(patchLevel))) return;
  throw new BootstrapError(BootstrapErrorCode.UNSUPPORTED_VERSION, rule.message, {
    distro: identity.distroName,
    version: identity.version,
    ...(rule.reference ? { reference: rule.reference } : {}),
  });
}

const TESTING_DISTROS = /(centos|red_hat|amazon|oracle)/;

/** Channels that only some distributions publish. */
export function checkInstallModeSupport(identity: Identity, mode: InstallMode): void {
  const name = identity.distroNameNormalized;
  if (mode.type === "daily" && name !== "ubuntu") {
    throw new BootstrapError(BootstrapErrorCode.UNSUPPORTED_INSTALL_TYPE, `${identity.distroName} does not have daily packages support`);
  }
  if (isPinnedStable(mode) && name !== "ubuntu") {
    throw new BootstrapError(
      BootstrapErrorCode.UNSUPPORTED_INSTALL_TYPE,
      `${identity.distroName} does not have major version pegged packages support`,
    );
  }
  if (mode.type === "testing" && !TESTING_DISTROS.test(name)) {
    throw new BootstrapError(BootstrapErrorCode.UNSUPPORTED_INSTALL_TYPE, `${identity.distroName} does not have testing packages support`);
  }
}
