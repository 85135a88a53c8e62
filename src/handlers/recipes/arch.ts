// Arch Linux. Unversioned: every handler is registered without a major.
import type { HandlerRegistry } from "../../dispatch/registry.js";
import type { HandlerContext } from "../../types/context.js";
import { PacmanPackageManager } from "../../packages/pacman.js";
import { executeOrThrow } from "../../execution/executor.js";
import {
  checkoutRequirements,
  installCheckoutUnits,
  installDependencies,
  installFromCheckout,
  runAll,
  saltPackages,
  systemdCheckServices,
  systemdEnableDaemons,
  systemdRestartDaemons,
} from "../common.js";

const distro = "arch_linux";
const pacman = new PacmanPackageManager();

const GIT_PACKAGES = ["git", "python", "python-pip", "python-setuptools", "python-pyzmq", "python-yaml", "python-jinja"];

/** Initialise the pacman keyring on fresh images. */
async function ensureKeyring(ctx: HandlerContext): Promise<void> {
  const present = await ctx.executor.execute({ argv: ["test", "-d", "/etc/pacman.d/gnupg"] });
  if (present.exitCode === 0) return;
  await runAll(ctx, [
    { argv: ["pacman-key", "--init"] },
    { argv: ["pacman-key", "--populate", "archlinux"] },
  ]);
}

async function deps(ctx: HandlerContext, packages: readonly string[]): Promise<void> {
  await ensureKeyring(ctx);
  await installDependencies(ctx, pacman, ["pacman", ...packages]);
}

export function registerArchHandlers(registry: HandlerRegistry): void {
  registry.registerFor({ phase: "dependencies", distro, mode: "stable" }, (ctx) => deps(ctx, []));
  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, (ctx) => deps(ctx, GIT_PACKAGES));

  // Arch ships a single `salt` package carrying every daemon.
  registry.registerFor({ phase: "install", distro, mode: "stable" }, async (ctx) => {
    if (saltPackages(ctx.config).length === 0) return;
    await executeOrThrow(ctx.executor, { argv: ["pacman", "-Syu", "--noconfirm", "--needed", "salt"] });
  });
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });

  registry.registerFor({ phase: "post-install", distro, mode: "stable" }, systemdEnableDaemons);
  registry.registerFor({ phase: "post-install", distro, mode: "git" }, (ctx) => installCheckoutUnits(ctx, "/usr/lib/systemd/system"));
  registry.registerFor({ phase: "restart-daemons", distro }, systemdRestartDaemons);
  registry.registerFor({ phase: "check-services", distro }, systemdCheckServices);
}
