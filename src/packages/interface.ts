import type { Command } from "../types/command.js";

/**
 * Package-manager adapter. Recipes express intent through these methods;
 * implementations translate to the host's package tool.
 */
export interface PackageManager {
  readonly name: string;
  /** Refresh the package index. Null when the tool has no separate step. */
  refresh(): Command | null;
  install(packages: readonly string[]): Command;
  upgradeAll(): Command;
}
