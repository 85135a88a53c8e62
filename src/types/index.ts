export type { Command } from "./command.js";
export type { BootstrapConfig, ConfigOverrides } from "./config.js";
export type { HandlerContext } from "./context.js";
export type { HardwareInfo, Identity, KernelFamily, RawDistro } from "./identity.js";
export type { InstallMode, InstallType } from "./install.js";
export { INSTALL_TYPES, LATEST, describeMode, isPinnedStable } from "./install.js";
export type { Handler, HandlerResult, HaltRun, Phase, Resolution, ResolvedPlan } from "./phase.js";
export { PHASES, isHalt } from "./phase.js";
