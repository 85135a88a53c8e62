export * from "./types/index.js";
export { BootstrapError, BootstrapErrorCode, describeError } from "./shared/errors.js";
export { Teardown, installSignalHandlers } from "./shared/teardown.js";
export { logger, attachConsole, attachLogFile, closeLogFile, setLogLevel } from "./logger.js";

export { configSchema, SALTSTACK_REPO_URL } from "./config/schema.js";
export { DEFAULT_CONFIG, loadConfig, readEnvironment } from "./config/loader.js";
export type { ConfigResult, LoadConfigOptions } from "./config/loader.js";
export { buildProgram, parseArguments, parseInstallMode } from "./config/arguments.js";
export type { ParsedArguments } from "./config/arguments.js";
export { checkPreconditions } from "./config/preconditions.js";

export { LocalExecutor, executeOrThrow } from "./execution/executor.js";
export type { Executor, ExecResult } from "./execution/executor.js";
export { LocalSystemProbe, probeHardware } from "./system/probe.js";
export type { SystemProbe } from "./system/probe.js";

export { detectDistro } from "./distro/detector.js";
export { buildIdentity, checkEndOfLife, checkInstallModeSupport } from "./distro/identity.js";
export { translateDerivative } from "./distro/derivatives.js";
export { parseVersionString, normalizeDistroName } from "./distro/version.js";

export { PHASE_TEMPLATES } from "./dispatch/phases.js";
export { formatHandlerName, generateCandidates } from "./dispatch/candidates.js";
export type { HandlerKey } from "./dispatch/candidates.js";
export { HandlerRegistry } from "./dispatch/registry.js";
export { resolveHandler, resolvePlan, summarizePlan } from "./dispatch/resolver.js";
export { createDefaultRegistry } from "./handlers/index.js";

export { GitSourceRetriever } from "./source/git.js";
export type { CheckoutResult, SourceRetriever } from "./source/git.js";
export { LifecycleOrchestrator } from "./lifecycle/orchestrator.js";
export type { OrchestratorOptions, RunOutcome, RunStatus } from "./lifecycle/orchestrator.js";
export { runBootstrap, identifyHost, platformConfig } from "./bootstrap.js";
export type { BootstrapOptions } from "./bootstrap.js";
