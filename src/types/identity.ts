/** Kernel families the bootstrapper knows how to inspect. */
export type KernelFamily = "linux" | "sunos" | "bsd";

/** Raw hardware/kernel signals, as reported by the host. Empty string means "not available". */
export interface HardwareInfo {
  readonly cpuVendorId: string;
  readonly cpuArch: string;
  readonly osName: string;
  readonly osVersion: string;
}

/**
 * Distribution name and version as gathered from the host, before any
 * normalization or derivative translation.
 */
export interface RawDistro {
  readonly name: string;
  readonly version: string;
  /** `ID=` from /etc/os-release when present; derivative detection keys on it. */
  readonly osReleaseId: string | null;
  /** False for distros whose version must not be split into major/minor (OmniOS). */
  readonly simplifyVersion: boolean;
  /** Only set for SmartOS hosts. */
  readonly virtualType?: "global" | "smartmachine";
}

/**
 * Canonical host identity used for every dispatch decision.
 * Major and minor are digit strings so zero padding survives (`20.04` → `20`, `04`).
 */
export interface Identity {
  readonly distroName: string;
  readonly distroNameNormalized: string;
  readonly version: string;
  readonly majorVersion: string | null;
  readonly minorVersion: string | null;
  readonly codename: string | null;
  /** Name of the derivative this identity was translated from, if any. */
  readonly translatedFrom: string | null;
}
