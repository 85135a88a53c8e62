// Distro detection. Turns raw host signals into a RawDistro (name + version as
// the host reports them). Normalization and derivative translation happen
// later, in identity.ts, so this module never guesses a base distro.
import type { HardwareInfo, KernelFamily, RawDistro } from "../types/identity.js";
import type { SystemProbe } from "../system/probe.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { sortReleaseFiles } from "./release-files.js";
import { camelCaseSplit, deriveDebianNumericVersion, parseVersionString, unquote } from "./version.js";

interface NameVersion {
  name: string;
  version: string;
}

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = unquote(match[2].trim());
    }
  }
  return result;
}

export function classifyKernel(osName: string): KernelFamily {
  switch (osName.toLowerCase()) {
    case "linux":
      return "linux";
    case "sunos":
      return "sunos";
    case "openbsd":
    case "freebsd":
    case "netbsd":
      return "bsd";
    default:
      throw new BootstrapError(BootstrapErrorCode.UNSUPPORTED_KERNEL, `${osName || "Unknown OS"} not supported.`, { osName });
  }
}

/** Names reported by `lsb_release -si` that need rewriting before use. */
function mapLsbName(name: string, probe: SystemProbe): string {
  if (name === "Scientific") return "Scientific Linux";
  if (name.includes("RedHat")) return camelCaseSplit(name);
  if (name === "openSUSE project") return "opensuse";
  if (name === "SUSE LINUX") {
    const description = probe.exec("lsb_release", ["-sd"]) ?? "";
    return /opensuse/i.test(description) ? "opensuse" : "suse";
  }
  if (name === "EnterpriseEnterpriseServer" || name === "OracleServer") return "Oracle Linux";
  if (name === "AmazonAMI") return "Amazon Linux AMI";
  if (name === "Arch") return "Arch Linux";
  if (name === "Raspbian") return "Debian";
  return name;
}

function fromLsb(probe: SystemProbe): { result: NameVersion; final: boolean } | null {
  const lsbName = probe.exec("lsb_release", ["-si"]);
  if (lsbName !== null) {
    const name = mapLsbName(lsbName, probe);
    // Arch is rolling: no version, and nothing better to find on disk.
    if (name === "Arch Linux") return { result: { name, version: "" }, final: true };
    const release = probe.exec("lsb_release", ["-sr"]) ?? "";
    return { result: { name, version: release ? parseVersionString(release) : "" }, final: false };
  }

  const lsbFile = probe.readFile("/etc/lsb-release");
  if (lsbFile === null) return null;
  const fields = parseOsRelease(lsbFile);
  const release = fields.DISTRIB_RELEASE ?? "";
  return { result: { name: fields.DISTRIB_ID ?? "", version: release ? parseVersionString(release) : "" }, final: false };
}

function listReleaseFiles(probe: SystemProbe): string[] {
  const listed = probe
    .listDir("/etc")
    .filter((file) => /[_-](release|version)$/.test(file))
    .filter((file) => file !== "redhat-release" && file !== "lsb-release");
  return sortReleaseFiles([...listed, "redhat-release", "lsb-release"]);
}

function firstVersionLine(content: string): string {
  const lines = content.split("\n");
  const ordered = [...lines.filter((l) => l.includes("VERSION")), ...lines];
  return ordered.find((l) => /[0-9]/.test(l)) ?? "";
}

function nameFromRedhatRelease(content: string): string {
  if (content.includes("CentOS")) return "CentOS";
  if (content.includes("Scientific")) return "Scientific Linux";
  if (content.includes("Red Hat Enterprise Linux")) return "Red Hat Enterprise Linux";
  return "Red Hat Linux";
}

const SHORT_NAMES: Readonly<Record<string, string>> = {
  arch: "Arch Linux",
  centos: "CentOS",
  debian: "Debian",
  ubuntu: "Ubuntu",
  fedora: "Fedora",
  suse: "SUSE",
  mandrake: "Mandriva",
  mandriva: "Mandriva",
  gentoo: "Gentoo",
  slackware: "Slackware",
  turbolinux: "TurboLinux",
  unitedlinux: "UnitedLinux",
  oracle: "Oracle Linux",
};

function fromReleaseFile(probe: SystemProbe, file: string): NameVersion | null {
  const path = `/etc/${file}`;
  if (probe.isSymlink(path) || !probe.isFile(path)) return null;
  const content = probe.readFile(path) ?? "";

  const prefix = file.replace(/[_-]release$/, "").replace(/[_-]version$/, "");
  const shortName = prefix.toLowerCase();
  const raw =
    shortName === "debian"
      ? deriveDebianNumericVersion(content, probe.readFile("/etc/debian_version"))
      : firstVersionLine(content);
  if (raw === "" && shortName !== "arch") return null;

  let version = parseVersionString(raw);
  let name = prefix;

  if (shortName === "redhat") {
    name = nameFromRedhatRelease(content);
  } else if (shortName.startsWith("mandrake")) {
    name = "Mandriva";
  } else if (SHORT_NAMES[shortName]) {
    name = SHORT_NAMES[shortName];
  } else if (shortName === "system") {
    if (content.split("\n").some((l) => /Amazon.*Linux.*AMI/.test(l))) name = "Amazon Linux AMI";
  } else if (shortName === "os") {
    const osRelease = parseOsRelease(content);
    const id = osRelease.ID ?? "";
    const versionId = osRelease.VERSION_ID ?? "";
    version = versionId ? parseVersionString(versionId) : "";
    switch (id.toLowerCase()) {
      case "amzn":
        name = "Amazon Linux AMI";
        break;
      case "arch":
        name = "Arch Linux";
        version = "";
        break;
      case "debian":
        name = "Debian";
        version = deriveDebianNumericVersion(version, probe.readFile("/etc/debian_version"));
        break;
      default:
        name = id;
    }
  }
  return { name, version };
}

function gatherLinux(probe: SystemProbe): NameVersion {
  const lsb = fromLsb(probe);
  if (lsb && (lsb.final || (lsb.result.name !== "" && lsb.result.version !== ""))) return lsb.result;

  for (const file of listReleaseFiles(probe)) {
    const found = fromReleaseFile(probe, file);
    if (found) {
      logger.debug({ file, ...found }, "Distro detected from release file");
      return found;
    }
  }
  return lsb?.result ?? { name: "", version: "" };
}

interface SunosResult extends NameVersion {
  simplifyVersion: boolean;
  virtualType?: "global" | "smartmachine";
}

function matchSunosRelease(line: string, probe: SystemProbe): Partial<SunosResult> | null {
  let m: RegExpExecArray | null;
  if ((m = /OpenIndiana.*oi_([0-9]+)/.exec(line))) return { name: "OpenIndiana", version: m[1] };
  if ((m = /OpenSolaris.*snv_([0-9]+)/.exec(line))) return { name: "OpenSolaris", version: m[1] };
  if ((m = /Oracle Solaris ([0-9]+)/.exec(line))) return { name: "Oracle Solaris", version: m[1] };
  if (line.includes("Solaris")) {
    // Some SmartOS releases only say "Solaris" in /etc/release.
    const joyent = (probe.exec("uname", ["-v"]) ?? "").includes("joyent");
    return { name: joyent ? "SmartOS" : "Solaris" };
  }
  if (line.includes("NexentaCore")) return { name: "Nexenta Core" };
  if (line.includes("SmartOS")) return { name: "SmartOS" };
  if (line.includes("OmniOS")) {
    return { name: "OmniOS", version: line.trim().split(/\s+/)[2] ?? "", simplifyVersion: false };
  }
  return null;
}

/** Solaris version from the kernel release: 4.x → 1.x, 5.0–5.6 → 2.x, 5.N → N. */
function solarisVersionFromKernel(osVersion: string): string {
  if (osVersion.startsWith("4.")) return `1.${osVersion.slice(2)}`;
  const old = /^5\.([0-6])[^0-9]*$/.exec(osVersion);
  if (old) return `2.${old[1]}`;
  const modern = /^5\.([0-9]+)/.exec(osVersion);
  return modern?.[1] ?? osVersion;
}

function gatherSunos(hardware: HardwareInfo, probe: SystemProbe): SunosResult {
  let kernelId = "";
  if (probe.isFile("/sbin/uname")) {
    const out = probe.exec("/sbin/uname", ["-X"]) ?? "";
    const line = out.split("\n").find((l) => /kernelid/i.test(l));
    kernelId = line?.trim().split(/\s+/)[2] ?? "";
  }

  let found: Partial<SunosResult> | null = null;
  for (const line of (probe.readFile("/etc/release") ?? "").split("\n")) {
    found = matchSunosRelease(line, probe);
    if (found) break;
  }

  const result: SunosResult = found?.name
    ? { name: found.name, version: found.version ?? kernelId, simplifyVersion: found.simplifyVersion ?? true }
    : { name: "Solaris", version: solarisVersionFromKernel(hardware.osVersion), simplifyVersion: true };

  if (result.name === "SmartOS") {
    result.virtualType = probe.exec("zonename", []) === "global" ? "global" : "smartmachine";
  }
  return result;
}

function gatherBsd(hardware: HardwareInfo): NameVersion {
  return {
    name: hardware.osName,
    version: hardware.osVersion.replace(/[()]/, "").replace(/-.*$/, ""),
  };
}

/**
 * Discover which distribution the host runs. Throws UNSUPPORTED_KERNEL for
 * kernels outside the Linux, SunOS and BSD families.
 */
export function detectDistro(hardware: HardwareInfo, probe: SystemProbe): RawDistro {
  const family = classifyKernel(hardware.osName);
  const osReleaseFile = probe.readFile("/etc/os-release");
  const osReleaseId = osReleaseFile ? (parseOsRelease(osReleaseFile).ID ?? null) : null;

  switch (family) {
    case "linux": {
      const { name, version } = gatherLinux(probe);
      return { name, version, osReleaseId, simplifyVersion: true };
    }
    case "sunos": {
      const { name, version, simplifyVersion, virtualType } = gatherSunos(hardware, probe);
      return { name, version, osReleaseId, simplifyVersion, ...(virtualType ? { virtualType } : {}) };
    }
    case "bsd": {
      const { name, version } = gatherBsd(hardware);
      return { name, version, osReleaseId, simplifyVersion: true };
    }
  }
}
