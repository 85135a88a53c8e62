// Ubuntu and Debian recipes. Both use apt and the signed-by keyring layout;
// only Ubuntu has the daily PPA.
import type { HandlerRegistry } from "../../dispatch/registry.js";
import type { HandlerContext } from "../../types/context.js";
import { AptPackageManager } from "../../packages/apt.js";
import { executeOrThrow } from "../../execution/executor.js";
import { logger } from "../../logger.js";
import {
  channelVersion,
  checkoutRequirements,
  fetchUrl,
  installCheckoutUnits,
  installDependencies,
  installFromCheckout,
  installSaltPackages,
  repoUrl,
  requireCodename,
  runAll,
  systemdCheckServices,
  systemdRestartDaemons,
  writeRepoFile,
} from "../common.js";

type AptDistro = "ubuntu" | "debian";

const apt = new AptPackageManager();

const KEYRING = "/etc/apt/keyrings/salt-archive-keyring.gpg";
const SOURCES_LIST = "/etc/apt/sources.list.d/salt.list";

const BASE_PACKAGES = ["ca-certificates", "curl", "gnupg", "procps", "pciutils", "python3-apt"];
const GIT_PACKAGES = ["git", "python3", "python3-dev", "python3-pip", "python3-setuptools", "build-essential"];

/** `20.04` on Ubuntu, `11` on Debian. */
function repoRelease(ctx: HandlerContext, distro: AptDistro): string {
  const { majorVersion, minorVersion } = ctx.identity;
  return distro === "ubuntu" ? `${majorVersion}.${minorVersion}` : `${majorVersion}`;
}

async function addSaltRepository(ctx: HandlerContext, distro: AptDistro, channel: string[]): Promise<void> {
  if (ctx.config.packages.disable_repos) {
    logger.info("Repository configuration disabled; using the repositories already configured");
    return;
  }
  const codename = requireCodename(ctx);
  const arch = (await executeOrThrow(ctx.executor, { argv: ["dpkg", "--print-architecture"] })).stdout.trim();
  const base = repoUrl(ctx.config, distro, repoRelease(ctx, distro), arch, ...channel);

  await executeOrThrow(ctx.executor, { argv: ["mkdir", "-p", "/etc/apt/keyrings"] });
  await executeOrThrow(ctx.executor, fetchUrl(ctx.config, `${base}/SALT-PROJECT-GPG-PUBKEY-2023.gpg`, KEYRING));
  await writeRepoFile(ctx.config, SOURCES_LIST, `deb [signed-by=${KEYRING} arch=${arch}] ${base} ${codename} main\n`);
  await executeOrThrow(ctx.executor, apt.refresh());
}

function registerAptDistro(registry: HandlerRegistry, distro: AptDistro): void {
  const deps = async (ctx: HandlerContext): Promise<void> => {
    await installDependencies(ctx, apt, BASE_PACKAGES);
  };

  registry.registerFor({ phase: "dependencies", distro }, deps);
  registry.registerFor({ phase: "dependencies", distro, mode: "stable" }, async (ctx) => {
    await deps(ctx);
    await addSaltRepository(ctx, distro, [channelVersion(ctx.mode)]);
  });
  registry.registerFor({ phase: "dependencies", distro, mode: "onedir" }, async (ctx) => {
    await deps(ctx);
    await addSaltRepository(ctx, distro, ["onedir", channelVersion(ctx.mode)]);
  });
  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, async (ctx) => {
    await deps(ctx);
    await executeOrThrow(ctx.executor, apt.install(GIT_PACKAGES));
  });

  registry.registerFor({ phase: "install", distro, mode: "stable" }, (ctx) => installSaltPackages(ctx, apt));
  registry.registerFor({ phase: "install", distro, mode: "onedir" }, (ctx) => installSaltPackages(ctx, apt));
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });

  registry.registerFor({ phase: "post-install", distro, mode: "git" }, (ctx) => installCheckoutUnits(ctx));
  registry.registerFor({ phase: "restart-daemons", distro }, systemdRestartDaemons);
  registry.registerFor({ phase: "check-services", distro }, systemdCheckServices);
}

export function registerDebianHandlers(registry: HandlerRegistry): void {
  registerAptDistro(registry, "ubuntu");
  registerAptDistro(registry, "debian");

  registry.registerFor({ phase: "dependencies", distro: "ubuntu", mode: "daily" }, async (ctx) => {
    await installDependencies(ctx, apt, [...BASE_PACKAGES, "software-properties-common"]);
    await runAll(ctx, [{ argv: ["add-apt-repository", "-y", "ppa:saltstack/salt-daily"] }, apt.refresh()]);
  });
  registry.registerFor({ phase: "install", distro: "ubuntu", mode: "daily" }, (ctx) => installSaltPackages(ctx, apt));
}
