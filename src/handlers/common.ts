// Building blocks shared by the distro recipes. Recipes stay thin: they pick
// packages and commands; everything that touches the host goes through here.
import { mkdir, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import type { BootstrapConfig } from "../types/config.js";
import type { Command } from "../types/command.js";
import type { HandlerContext } from "../types/context.js";
import type { InstallMode } from "../types/install.js";
import { LATEST } from "../types/install.js";
import type { PackageManager } from "../packages/interface.js";
import { executeOrThrow } from "../execution/executor.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export type Daemon = "minion" | "master" | "syndic";

/** Daemons selected for this run, in start order. */
export function selectedDaemons(config: BootstrapConfig): Daemon[] {
  const daemons: Daemon[] = [];
  if (config.targets.minion) daemons.push("minion");
  if (config.targets.master) daemons.push("master");
  if (config.targets.syndic) daemons.push("syndic");
  return daemons;
}

/** `salt-minion`, `salt-master`, `salt-syndic` for the selected targets. */
export function saltPackages(config: BootstrapConfig, prefix = "salt-"): string[] {
  return selectedDaemons(config).map((daemon) => `${prefix}${daemon}`);
}

export async function runAll(ctx: HandlerContext, commands: readonly Command[]): Promise<void> {
  for (const command of commands) {
    await executeOrThrow(ctx.executor, command);
  }
}

/** Download command honouring the insecure-download switch. */
export function fetchUrl(config: BootstrapConfig, url: string, destination: string): Command {
  const argv = ["curl", "-fsSL"];
  if (config.network.insecure_downloads) argv.push("--insecure");
  argv.push("-o", destination, url);
  return { argv };
}

/**
 * Write a package-manager repository file. An existing file is kept unless
 * overwriting was forced. Returns true when the file was written.
 */
export async function writeRepoFile(config: BootstrapConfig, path: string, content: string): Promise<boolean> {
  if (existsSync(path) && !config.lifecycle.force_overwrite) {
    logger.info({ path }, "Repository file already present; not overwriting");
    return false;
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
  logger.info({ path }, "Wrote repository file");
  return true;
}

/** Repository URL for a channel under the configured base URL. */
export function repoUrl(config: BootstrapConfig, ...segments: string[]): string {
  return [config.packages.repo_base_url.replace(/\/+$/, ""), ...segments].join("/");
}

/** Repository channel directory for package installs: a pinned version or `latest`. */
export function channelVersion(mode: InstallMode): string {
  return mode.type === "stable" || mode.type === "onedir" ? mode.version : LATEST;
}

export function requireCodename(ctx: HandlerContext): string {
  const { codename } = ctx.identity;
  if (codename === null) {
    throw new BootstrapError(BootstrapErrorCode.HANDLER_FAILED, `No release codename known for ${ctx.identity.distroName} ${ctx.identity.version}`);
  }
  return codename;
}

/** Install Salt from the git working copy. */
export function installFromCheckout(config: BootstrapConfig): Command {
  return { argv: ["python3", "-m", "pip", "install", "--upgrade", config.git.checkout_dir] };
}

/** Python requirements for a source install, via pip when allowed. */
export function checkoutRequirements(config: BootstrapConfig): Command[] {
  if (!config.lifecycle.pip_allowed) return [];
  return [{ argv: ["python3", "-m", "pip", "install", "-r", `${config.git.checkout_dir}/requirements/base.txt`] }];
}

export async function systemdRestartDaemons(ctx: HandlerContext): Promise<void> {
  for (const daemon of selectedDaemons(ctx.config)) {
    // Stopping a unit that is not running is fine.
    await ctx.executor.execute({ argv: ["systemctl", "stop", `salt-${daemon}.service`] });
    await executeOrThrow(ctx.executor, { argv: ["systemctl", "start", `salt-${daemon}.service`] });
  }
}

export async function systemdCheckServices(ctx: HandlerContext): Promise<void> {
  for (const daemon of selectedDaemons(ctx.config)) {
    await executeOrThrow(ctx.executor, { argv: ["systemctl", "is-enabled", `salt-${daemon}.service`] });
  }
}

export async function systemdEnableDaemons(ctx: HandlerContext): Promise<void> {
  await executeOrThrow(ctx.executor, { argv: ["systemctl", "daemon-reload"] });
  for (const daemon of selectedDaemons(ctx.config)) {
    await executeOrThrow(ctx.executor, { argv: ["systemctl", "enable", `salt-${daemon}.service`] });
  }
}

/**
 * The common shape of every `*_deps` handler: refresh, optional system
 * upgrade, the recipe's own packages, then whatever extras were requested.
 */
export async function installDependencies(
  ctx: HandlerContext,
  pm: PackageManager,
  packages: readonly string[],
  options: { refresh?: boolean } = {},
): Promise<void> {
  const refresh = options.refresh === false ? null : pm.refresh();
  if (refresh) await executeOrThrow(ctx.executor, refresh);
  if (ctx.config.lifecycle.upgrade_system) {
    await executeOrThrow(ctx.executor, pm.upgradeAll());
  }
  if (packages.length > 0) {
    await executeOrThrow(ctx.executor, pm.install(packages));
  }
  const extra = ctx.config.packages.extra;
  if (extra.length > 0) {
    logger.info({ packages: extra }, "Installing extra packages as requested");
    await executeOrThrow(ctx.executor, pm.install(extra));
  }
}

/** Install the salt-* packages for the selected daemons. */
export async function installSaltPackages(ctx: HandlerContext, pm: PackageManager, prefix = "salt-"): Promise<void> {
  const packages = saltPackages(ctx.config, prefix);
  if (packages.length === 0) return;
  await executeOrThrow(ctx.executor, pm.install(packages));
}

/** Copy the checkout's systemd units into place and enable them. */
export async function installCheckoutUnits(ctx: HandlerContext, unitDir = "/lib/systemd/system"): Promise<void> {
  for (const daemon of selectedDaemons(ctx.config)) {
    const unit = `salt-${daemon}.service`;
    await executeOrThrow(ctx.executor, {
      argv: ["install", "-m", "0644", `${ctx.config.git.checkout_dir}/pkg/common/${unit}`, `${unitDir}/${unit}`],
    });
  }
  await systemdEnableDaemons(ctx);
}
