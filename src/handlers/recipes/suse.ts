// openSUSE and SLES recipes.
import type { HandlerRegistry } from "../../dispatch/registry.js";
import type { HandlerContext } from "../../types/context.js";
import { ZypperPackageManager } from "../../packages/zypper.js";
import { executeOrThrow } from "../../execution/executor.js";
import { BootstrapError, BootstrapErrorCode } from "../../shared/errors.js";
import { logger } from "../../logger.js";
import {
  checkoutRequirements,
  installCheckoutUnits,
  installDependencies,
  installFromCheckout,
  installSaltPackages,
  runAll,
  systemdCheckServices,
  systemdEnableDaemons,
  systemdRestartDaemons,
} from "../common.js";

const zypper = new ZypperPackageManager();

const SALTSTACK_REPO_ALIAS = "systemsmanagement_saltstack";

const BASE_PACKAGES = ["curl", "python3", "python3-pyzmq", "python3-PyYAML", "python3-Jinja2"];
const GIT_PACKAGES = ["git", "patch", "gcc", "python3-devel", "python3-pip"];

/** `SLE_15` for SLES, `openSUSE_Leap_15.5` for Leap. */
export function saltstackRepository(distro: string, major: string | null, minor: string | null): string {
  const project = "https://download.opensuse.org/repositories/systemsmanagement:/saltstack";
  const release = distro === "suse" ? `SLE_${major}` : `openSUSE_Leap_${major}.${minor}`;
  return `${project}/${release}/systemsmanagement:saltstack.repo`;
}

/** Register the saltstack project repository unless zypper already knows it. */
async function addSaltRepository(ctx: HandlerContext): Promise<void> {
  if (ctx.config.packages.disable_repos) {
    logger.info("Repository configuration disabled; using the repositories already configured");
    return;
  }
  const repos = await executeOrThrow(ctx.executor, { argv: ["zypper", "--non-interactive", "repos"] });
  if (repos.stdout.includes(SALTSTACK_REPO_ALIAS) && !ctx.config.lifecycle.force_overwrite) {
    logger.info({ alias: SALTSTACK_REPO_ALIAS }, "Repository already configured");
    return;
  }
  const { distroNameNormalized, majorVersion, minorVersion } = ctx.identity;
  await executeOrThrow(ctx.executor, zypper.addRepo(saltstackRepository(distroNameNormalized, majorVersion, minorVersion), SALTSTACK_REPO_ALIAS));
}

/**
 * zypper exits 4 when only some repositories failed to refresh; the install
 * can still proceed from the rest.
 */
async function refresh(ctx: HandlerContext): Promise<void> {
  const result = await ctx.executor.execute(zypper.refresh());
  if (result.exitCode === 0) return;
  if (result.exitCode === 4) {
    logger.warn({ stderr: result.stderr }, "Some repositories failed to refresh");
    return;
  }
  throw new BootstrapError(BootstrapErrorCode.COMMAND_FAILED, `zypper refresh exited with ${result.exitCode}`, { stderr: result.stderr });
}

function registerZypperDistro(registry: HandlerRegistry, distro: "opensuse" | "suse", thirdPartyRepo: boolean): void {
  const deps = async (ctx: HandlerContext, packages: readonly string[]): Promise<void> => {
    if (thirdPartyRepo) await addSaltRepository(ctx);
    await refresh(ctx);
    await installDependencies(ctx, zypper, packages, { refresh: false });
  };

  registry.registerFor({ phase: "dependencies", distro, mode: "stable" }, (ctx) => deps(ctx, BASE_PACKAGES));
  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, (ctx) => deps(ctx, [...BASE_PACKAGES, ...GIT_PACKAGES]));

  registry.registerFor({ phase: "install", distro, mode: "stable" }, (ctx) => installSaltPackages(ctx, zypper));
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });

  registry.registerFor({ phase: "post-install", distro, mode: "stable" }, systemdEnableDaemons);
  registry.registerFor({ phase: "post-install", distro, mode: "git" }, (ctx) => installCheckoutUnits(ctx, "/usr/lib/systemd/system"));
  registry.registerFor({ phase: "restart-daemons", distro }, systemdRestartDaemons);
  registry.registerFor({ phase: "check-services", distro }, systemdCheckServices);
}

export function registerSuseHandlers(registry: HandlerRegistry): void {
  // Salt is in the openSUSE distribution repositories; SLES needs the project repository.
  registerZypperDistro(registry, "opensuse", false);
  registerZypperDistro(registry, "suse", true);
}
