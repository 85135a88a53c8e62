// RPM recipes: the RHEL rebuilds, Amazon Linux and Fedora.
import type { HandlerRegistry } from "../../dispatch/registry.js";
import type { HandlerContext } from "../../types/context.js";
import type { InstallType } from "../../types/install.js";
import { LATEST } from "../../types/install.js";
import { YumPackageManager } from "../../packages/yum.js";
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
  runAll,
  systemdCheckServices,
  systemdEnableDaemons,
  systemdRestartDaemons,
  writeRepoFile,
} from "../common.js";

/** Distros that install from the Salt RHEL repository, and the path segment they use there. */
const EL_DISTROS: Readonly<Record<string, string>> = {
  centos: "redhat",
  red_hat_enterprise_linux: "redhat",
  red_hat_enterprise_server: "redhat",
  red_hat_enterprise_workstation: "redhat",
  oracle_linux: "redhat",
  scientific_linux: "redhat",
  amazon_linux_ami: "amazon",
};

/** Package channels and the repository path below the release for each. */
const CHANNELS: readonly (readonly [InstallType, (ctx: HandlerContext) => string[]])[] = [
  ["stable", (ctx) => [channelVersion(ctx.mode)]],
  ["onedir", (ctx) => ["onedir", channelVersion(ctx.mode)]],
  ["testing", () => [LATEST]],
];

const REPO_FILE = "/etc/yum.repos.d/salt.repo";
const GPG_KEY = "/etc/pki/rpm-gpg/SALT-PROJECT-GPG-PUBKEY-2023.pub";

const BASE_PACKAGES = ["yum-utils", "curl", "python3", "procps-ng"];
const GIT_PACKAGES = ["git", "gcc", "python3-devel", "python3-pip"];

function packageManager(ctx: HandlerContext, enableRepos: readonly string[] = []): YumPackageManager {
  const { distroNameNormalized: distro, majorVersion } = ctx.identity;
  const major = Number(majorVersion ?? "0");
  let dnf = major >= 8;
  if (distro === "fedora") dnf = major >= 22;
  if (distro === "amazon_linux_ami") dnf = false;
  return new YumPackageManager({ tool: dnf ? "dnf" : "yum", enableRepos });
}

/** Repository definition with the testing channel present but disabled. */
export function saltRepoDefinition(stableUrl: string, testingUrl: string): string {
  return [
    "[salt-repo]",
    "name=Salt repo for RHEL/CentOS $releasever",
    `baseurl=${stableUrl}`,
    "enabled=1",
    "gpgcheck=1",
    `gpgkey=file://${GPG_KEY}`,
    "",
    "[salt-testing]",
    "name=Salt testing repo for RHEL/CentOS $releasever",
    `baseurl=${testingUrl}`,
    "enabled=0",
    "gpgcheck=1",
    `gpgkey=file://${GPG_KEY}`,
    "",
  ].join("\n");
}

async function addSaltRepository(ctx: HandlerContext, segment: string, channel: string[]): Promise<void> {
  if (ctx.config.packages.disable_repos) {
    logger.info("Repository configuration disabled; using the repositories already configured");
    return;
  }
  const release = ctx.identity.majorVersion ?? LATEST;
  const stable = repoUrl(ctx.config, segment, release, "$basearch", ...channel);
  const testing = repoUrl(ctx.config, segment, release, "$basearch", "testing");

  await executeOrThrow(ctx.executor, { argv: ["mkdir", "-p", "/etc/pki/rpm-gpg"] });
  await executeOrThrow(ctx.executor, fetchUrl(ctx.config, repoUrl(ctx.config, segment, release, "SALT-PROJECT-GPG-PUBKEY-2023.pub"), GPG_KEY));
  await writeRepoFile(ctx.config, REPO_FILE, saltRepoDefinition(stable, testing));
}

function registerElDistro(registry: HandlerRegistry, distro: string, segment: string): void {
  for (const [mode, channel] of CHANNELS) {
    const repos = mode === "testing" ? ["salt-testing"] : [];
    registry.registerFor({ phase: "dependencies", distro, mode }, async (ctx) => {
      await addSaltRepository(ctx, segment, channel(ctx));
      await installDependencies(ctx, packageManager(ctx, repos), BASE_PACKAGES);
    });
    registry.registerFor({ phase: "install", distro, mode }, (ctx) => installSaltPackages(ctx, packageManager(ctx, repos)));
    // RPMs install the units disabled.
    registry.registerFor({ phase: "post-install", distro, mode }, systemdEnableDaemons);
  }

  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, async (ctx) => {
    await installDependencies(ctx, packageManager(ctx), [...BASE_PACKAGES, ...GIT_PACKAGES]);
  });
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });
  registry.registerFor({ phase: "post-install", distro, mode: "git" }, (ctx) => installCheckoutUnits(ctx, "/usr/lib/systemd/system"));

  registry.registerFor({ phase: "restart-daemons", distro }, systemdRestartDaemons);
  registry.registerFor({ phase: "check-services", distro }, systemdCheckServices);
}

/** Fedora ships Salt in its own repositories. */
function registerFedora(registry: HandlerRegistry): void {
  const distro = "fedora";
  registry.registerFor({ phase: "dependencies", distro }, async (ctx) => {
    await installDependencies(ctx, packageManager(ctx), ["curl", "python3", "procps-ng"]);
  });
  registry.registerFor({ phase: "dependencies", distro, mode: "git" }, async (ctx) => {
    await installDependencies(ctx, packageManager(ctx), ["curl", "python3", "procps-ng", ...GIT_PACKAGES]);
  });
  registry.registerFor({ phase: "install", distro, mode: "stable" }, (ctx) => installSaltPackages(ctx, packageManager(ctx)));
  registry.registerFor({ phase: "install", distro, mode: "git" }, async (ctx) => {
    await runAll(ctx, [...checkoutRequirements(ctx.config), installFromCheckout(ctx.config)]);
  });
  registry.registerFor({ phase: "post-install", distro, mode: "stable" }, systemdEnableDaemons);
  registry.registerFor({ phase: "post-install", distro, mode: "git" }, (ctx) => installCheckoutUnits(ctx, "/usr/lib/systemd/system"));
  registry.registerFor({ phase: "restart-daemons", distro }, systemdRestartDaemons);
  registry.registerFor({ phase: "check-services", distro }, systemdCheckServices);
}

export function registerRhelHandlers(registry: HandlerRegistry): void {
  for (const [distro, segment] of Object.entries(EL_DISTROS)) {
    registerElDistro(registry, distro, segment);
  }
  registerFedora(registry);
}
