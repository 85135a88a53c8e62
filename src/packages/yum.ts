import type { Command } from "../types/command.js";
import type { PackageManager } from "./interface.js";

export interface YumOptions {
  /** `yum` on older releases, `dnf` from Fedora 22 and EL 8. */
  readonly tool?: "yum" | "dnf";
  /** Extra repositories enabled for installs only. */
  readonly enableRepos?: readonly string[];
}

/** RHEL family, Fedora and Amazon Linux. */
export class YumPackageManager implements PackageManager {
  readonly name: string;
  private readonly enableRepos: readonly string[];

  constructor(options: YumOptions = {}) {
    this.name = options.tool ?? "yum";
    this.enableRepos = options.enableRepos ?? [];
  }

  refresh(): Command {
    return { argv: [this.name, "makecache"] };
  }

  install(packages: readonly string[]): Command {
    const argv = [this.name, "install", "-y"];
    for (const repo of this.enableRepos) argv.push(`--enablerepo=${repo}`);
    argv.push(...packages);
    return { argv };
  }

  upgradeAll(): Command {
    return { argv: [this.name, "-y", "update"] };
  }
}
