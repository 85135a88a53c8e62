import type { BootstrapConfig } from "./config.js";
import type { Identity } from "./identity.js";
import type { InstallMode } from "./install.js";
import type { Executor } from "../execution/executor.js";

/**
 * Everything a handler may read. Created once per run and passed to every
 * handler; nothing in it changes while the run is in progress.
 */
export interface HandlerContext {
  readonly config: BootstrapConfig;
  readonly identity: Identity;
  readonly mode: InstallMode;
  readonly executor: Executor;
}
