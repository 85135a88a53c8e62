import type { Phase } from "../types/phase.js";

/**
 * Naming template for one lifecycle phase. A handler name is
 * `prefix + distro [+ _major [+ _minor]] [+ _mode] + suffix`.
 */
export interface PhaseTemplate {
  readonly prefix: string;
  readonly suffix: string;
  /** Distro-agnostic handler tried after every distro tier. */
  readonly fallback: string | null;
  /** When set, tiers without the install mode are never generated. */
  readonly modeRequired: boolean;
  /** A mandatory phase with no handler fails the run before anything executes. */
  readonly mandatory: boolean;
}

export const PHASE_TEMPLATES: Readonly<Record<Phase, PhaseTemplate>> = {
  dependencies: { prefix: "install_", suffix: "_deps", fallback: null, modeRequired: false, mandatory: true },
  configure: { prefix: "config_", suffix: "_salt", fallback: "config_salt", modeRequired: false, mandatory: false },
  "preseed-keys": { prefix: "preseed_", suffix: "_master", fallback: "preseed_master", modeRequired: false, mandatory: false },
  install: { prefix: "install_", suffix: "", fallback: null, modeRequired: true, mandatory: true },
  "post-install": { prefix: "install_", suffix: "_post", fallback: null, modeRequired: false, mandatory: false },
  "check-services": { prefix: "install_", suffix: "_check_services", fallback: null, modeRequired: false, mandatory: false },
  "restart-daemons": { prefix: "install_", suffix: "_restart_daemons", fallback: null, modeRequired: false, mandatory: false },
  "daemons-running": { prefix: "daemons_running_", suffix: "", fallback: "daemons_running", modeRequired: false, mandatory: false },
};
