// Request-level checks that run before anything is probed or installed.
import { statSync } from "node:fs";
import type { BootstrapConfig } from "../types/config.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Throws for contradictory requests. Returns false when there is nothing to
 * install or configure, which is not an error.
 */
export function checkPreconditions(config: BootstrapConfig): boolean {
  const { targets, lifecycle, paths, minion } = config;

  if (paths.config_dir !== null && !isDirectory(paths.config_dir)) {
    throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, `The configuration directory ${paths.config_dir} does not exist.`);
  }
  if (paths.keys_dir !== null && !isDirectory(paths.keys_dir)) {
    throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, `The pre-seed keys directory ${paths.keys_dir} does not exist.`);
  }

  if (!targets.minion && !targets.master && !targets.syndic && !lifecycle.config_only) {
    logger.warn("Nothing to install or configure");
    return false;
  }

  if (lifecycle.config_only && paths.config_dir === null) {
    throw new BootstrapError(
      BootstrapErrorCode.INVALID_ARGUMENTS,
      "In order to run the script in configuration only mode you also need to provide the configuration directory.",
    );
  }
  if (!targets.minion && minion.master_address !== null) {
    throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, "Don't pass a master address (-A) if no minion is going to be bootstrapped.");
  }
  if (!targets.minion && minion.minion_id !== null) {
    throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, "Don't pass a minion id (-i) if no minion is going to be bootstrapped.");
  }
  return true;
}
