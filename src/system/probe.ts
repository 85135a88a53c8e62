// Hardware/OS prober. Everything the identity normalizer knows about the host
// arrives through SystemProbe, so detection can be exercised against a fake
// filesystem. Probes never throw: missing data comes back as "" or null.
import { existsSync, lstatSync, readFileSync, readdirSync } from "node:fs";
import execa from "execa";
import type { HardwareInfo } from "../types/identity.js";

/** Read-only view of the host. */
export interface SystemProbe {
  /** File contents, or null when the file is missing or unreadable. */
  readFile(path: string): string | null;
  /** Entry names of a directory, or [] when it cannot be listed. */
  listDir(path: string): string[];
  isFile(path: string): boolean;
  isSymlink(path: string): boolean;
  /** Trimmed stdout of a successful command, or null. */
  exec(command: string, args: string[]): string | null;
}

export class LocalSystemProbe implements SystemProbe {
  readFile(path: string): string | null {
    try {
      return readFileSync(path, "utf-8");
    } catch {
      return null;
    }
  }

  listDir(path: string): string[] {
    try {
      return readdirSync(path);
    } catch {
      return [];
    }
  }

  isFile(path: string): boolean {
    try {
      return existsSync(path) && lstatSync(path).isFile();
    } catch {
      return false;
    }
  }

  isSymlink(path: string): boolean {
    try {
      return lstatSync(path).isSymbolicLink();
    } catch {
      return false;
    }
  }

  exec(command: string, args: string[]): string | null {
    try {
      const result = execa.sync(command, args, { reject: false, stdin: "ignore" });
      return result.exitCode === 0 ? result.stdout.trim() : null;
    } catch {
      return null;
    }
  }
}

function firstAvailable(probe: SystemProbe, attempts: [string, string[]][]): string | null {
  for (const [command, args] of attempts) {
    const out = probe.exec(command, args);
    if (out) return out;
  }
  return null;
}

/** CPU vendor: /proc/cpuinfo, then kstat (SmartOS/Solaris), then sysctl. */
function probeCpuVendor(probe: SystemProbe): string {
  const cpuinfo = probe.readFile("/proc/cpuinfo");
  if (cpuinfo !== null) {
    for (const line of cpuinfo.split("\n")) {
      if (!/vendor_id|Processor/.test(line)) continue;
      const field = line.trim().split(/\s+/)[2] ?? "";
      return field.replace(/-.*$/, "");
    }
    return "";
  }
  if (probe.isFile("/usr/bin/kstat")) {
    const out = probe.exec("/usr/bin/kstat", ["-p", "cpu_info:0:cpu_info0:vendor_id"]);
    return out?.split(/\s+/)[1] ?? "";
  }
  return probe.exec("sysctl", ["-n", "hw.model"]) ?? "";
}

export function probeHardware(probe: SystemProbe): HardwareInfo {
  return {
    cpuVendorId: probeCpuVendor(probe),
    cpuArch: firstAvailable(probe, [["uname", ["-m"]], ["uname", ["-p"]]]) ?? "unknown",
    osName: probe.exec("uname", ["-s"]) ?? "",
    osVersion: probe.exec("uname", ["-r"]) ?? "",
  };
}
