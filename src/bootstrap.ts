// One bootstrap run: probe the host, build the identity, check support, then
// hand the resolved plan to the orchestrator.
import { rm } from "node:fs/promises";
import type { BootstrapConfig } from "./types/config.js";
import type { HandlerContext } from "./types/context.js";
import type { Identity } from "./types/identity.js";
import type { InstallMode } from "./types/install.js";
import { describeMode } from "./types/install.js";
import type { Executor } from "./execution/executor.js";
import { LocalExecutor } from "./execution/executor.js";
import type { SystemProbe } from "./system/probe.js";
import { LocalSystemProbe, probeHardware } from "./system/probe.js";
import { detectDistro } from "./distro/detector.js";
import { buildIdentity, checkEndOfLife, checkInstallModeSupport } from "./distro/identity.js";
import { susePatchLevel } from "./distro/codename.js";
import type { HandlerRegistry } from "./dispatch/registry.js";
import { createDefaultRegistry } from "./handlers/index.js";
import { freebsdConfig } from "./handlers/recipes/freebsd.js";
import { GitSourceRetriever } from "./source/git.js";
import type { SourceRetriever } from "./source/git.js";
import type { OrchestratorOptions, RunOutcome } from "./lifecycle/orchestrator.js";
import { LifecycleOrchestrator } from "./lifecycle/orchestrator.js";
import { checkPreconditions } from "./config/preconditions.js";
import { selectedDaemons } from "./handlers/common.js";
import type { Teardown } from "./shared/teardown.js";
import { logger } from "./logger.js";

/** Service checks are skipped while this file exists. */
export const DISABLE_CHECKS_MARKER = "/tmp/disable_salt_checks";

export interface BootstrapOptions {
  readonly config: BootstrapConfig;
  readonly mode: InstallMode;
  readonly teardown: Teardown;
  readonly probe?: SystemProbe;
  readonly executor?: Executor;
  readonly registry?: HandlerRegistry;
  readonly sourceRetriever?: SourceRetriever;
  readonly sleep?: OrchestratorOptions["sleep"];
  readonly applyHostSettings?: OrchestratorOptions["applyHostSettings"];
  /** Runs after the request checks, before the host is probed. */
  readonly checkPrivileges?: () => void;
}

/** Proxy variables exported to every command when a proxy was given. */
export function proxyEnvironment(config: BootstrapConfig): Record<string, string> {
  const proxy = config.network.http_proxy;
  return proxy === null ? {} : { http_proxy: proxy, https_proxy: proxy };
}

/**
 * Register removal of a checkout this run cloned. A working copy that was
 * already there is only ever updated, and stays in place whatever happens.
 */
export function removingFreshCheckouts(retriever: SourceRetriever, config: BootstrapConfig, teardown: Teardown): SourceRetriever {
  return {
    async retrieve(revision) {
      const checkout = await retriever.retrieve(revision);
      if (!checkout.updated && !config.lifecycle.keep_temp_files) {
        teardown.register("remove git checkout", async () => {
          logger.debug({ path: checkout.path }, "Removing the git checkout");
          await rm(checkout.path, { recursive: true, force: true });
        });
      }
      return checkout;
    },
  };
}

/** Platform path conventions applied for the whole run, host settings included. */
export function platformConfig(config: BootstrapConfig, identity: Identity): BootstrapConfig {
  return identity.distroNameNormalized === "freebsd" ? freebsdConfig(config) : config;
}

/** Identify the host and fail early for unsupported platforms or modes. */
export function identifyHost(probe: SystemProbe, mode: InstallMode): Identity {
  const hardware = probeHardware(probe);
  const identity = buildIdentity(detectDistro(hardware, probe));

  logger.info("System Information:");
  logger.info(`  CPU:          ${hardware.cpuVendorId}`);
  logger.info(`  CPU Arch:     ${hardware.cpuArch}`);
  logger.info(`  OS Name:      ${hardware.osName}`);
  logger.info(`  OS Version:   ${hardware.osVersion}`);
  logger.info(`  Distribution: ${identity.distroName} ${identity.version}`);
  if (identity.translatedFrom) {
    logger.info({ from: identity.translatedFrom }, `Treating ${identity.translatedFrom} as ${identity.distroName} ${identity.version}`);
  }

  const patchLevel = identity.distroNameNormalized === "suse" ? susePatchLevel(probe.readFile("/etc/SuSE-release")) : "00";
  checkEndOfLife(identity, patchLevel);
  checkInstallModeSupport(identity, mode);
  return identity;
}

/** Returns null when there was nothing to install or configure. */
export async function runBootstrap(options: BootstrapOptions): Promise<RunOutcome | null> {
  const { config, mode, teardown } = options;
  if (!checkPreconditions(config)) return null;
  options.checkPrivileges?.();

  const probe = options.probe ?? new LocalSystemProbe();
  const identity = identifyHost(probe, mode);

  for (const daemon of selectedDaemons(config)) {
    logger.info(`Installing ${daemon}`);
  }
  logger.info({ mode: describeMode(mode) }, `Installing Salt ${describeMode(mode)}`);
  if (config.lifecycle.config_only) logger.info("Only configuring");
  if (!config.lifecycle.start_daemons) logger.warn("Daemons will not be started");

  const executor = options.executor ?? new LocalExecutor(proxyEnvironment(config));
  const runConfig = platformConfig(config, identity);
  const context: HandlerContext = { config: runConfig, identity, mode, executor };

  const retriever =
    options.sourceRetriever ??
    new GitSourceRetriever(executor, {
      repoUrl: config.git.repo_url,
      upstreamUrl: config.git.upstream_url,
      checkoutDir: config.git.checkout_dir,
    });
  const sourceRetriever = removingFreshCheckouts(retriever, config, teardown);

  const orchestrator = new LifecycleOrchestrator({
    registry: options.registry ?? createDefaultRegistry(),
    context,
    sourceRetriever,
    planOptions: { checksDisabledByMarker: probe.isFile(DISABLE_CHECKS_MARKER) },
    sleep: options.sleep,
    applyHostSettings: options.applyHostSettings,
  });
  return orchestrator.run();
}
