// FreeBSD. Salt comes from the ports tree (sysutils/py-salt) and is driven by rc.d.
import type { HandlerRegistry } from "../../dispatch/registry.js";
import type { BootstrapConfig } from "../../types/config.js";
import type { HandlerContext } from "../../types/context.js";
import type { HandlerResult } from "../../types/phase.js";
import { PkgPackageManager } from "../../packages/pkg.js";
import { executeOrThrow } from "../../execution/executor.js";
import { configSalt } from "../defaults.js";
import {
  checkoutRequirements,
  installDependencies,
  installFromCheckout,
  runAll,
  saltPackages,
  selectedDaemons,
} from "../common.js";

const distro = "freebsd";
const pkg = new PkgPackageManager("FreeBSD");

export const DEFAULT_SALT_ETC_DIR = "/etc/salt";
export const FREEBSD_SALT_ETC_DIR = "/usr/local/etc/salt";

const GIT_PACKAGES = ["git", "python3", "py39-pip", "swig"];

async function deps(ctx: HandlerContext, packages: readonly string[]): Promise<void> {
  await executeOrThrow(ctx.executor, { argv: ["pkg", "bootstrap", "-f"], env: { ASSUME_ALWAYS_YES: "yes" } });
  await installDependencies(ctx, pkg, packages);
}

/**
 * The port reads its configuration from /usr/local/etc/salt. An explicitly
 * configured directory is kept.
 */
export function freebsdConfig(config: BootstrapConfig): BootstrapConfig {
  if (config.paths.salt_etc_dir !== DEFAULT_SALT_ETC_DIR) return config;
  return {
    ...config,
    paths: { ...config.paths, salt_etc_dir: FREEBSD_SALT_ETC_DIR, salt_pki_dir: `${FREEBSD_SALT_ETC_DIR}/pki` },
  };
}

export async function configFreebsdSalt(ctx: HandlerContext): Promise<HandlerResult> {
  return configSalt({ ...ctx, config: freebsdConfig(ctx.config) });
}

async function enableDaemons(ctx: HandlerContext): Promise<void> {
  for (const daemon of selectedDaemons(ctx.config)) {
    await executeOrThrow(ctx.executor, { argv: ["sysrc", `salt_${daemon}_enable=YES`] });
  }
}

async function restartDaemons(ctx: HandlerContext): Promise<void> {
  for (const daemon of selectedDaemons(ctx.config)) {
    await ctx.executor.execute({ argv: ["service", `salt_${daemon}`, "stop"] });
    await executeOrThrow(ctx.executor, { argv: ["service", `salt_${daemon}`, "start"] });
  }
}

export function registerFreebsdHandlers(registry: HandlerRegistry): void {
  registry.registerFor({ phase: "dependencies", distro, mode: "stable" }, (ctx) => deps(ctx, ["swig"]));
  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, (ctx) => deps(ctx, GIT_PACKAGES));

  registry.registerFor({ phase: "configure", distro }, configFreebsdSalt);

  registry.registerFor({ phase: "install", distro, mode: "stable" }, async (ctx) => {
    if (saltPackages(ctx.config).length === 0) return;
    await executeOrThrow(ctx.executor, pkg.install(["sysutils/py-salt"]));
  });
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });

  registry.registerFor({ phase: "post-install", distro }, enableDaemons);
  registry.registerFor({ phase: "restart-daemons", distro }, restartDaemons);
}
