import type { Command } from "../types/command.js";
import type { PackageManager } from "./interface.js";

/** FreeBSD pkgng. */
export class PkgPackageManager implements PackageManager {
  readonly name = "pkg";

  constructor(private readonly repository: string | null = null) {}

  refresh(): Command {
    return { argv: ["pkg", "update", "-f"] };
  }

  install(packages: readonly string[]): Command {
    const argv = ["pkg", "install", "-y"];
    if (this.repository) argv.push("-r", this.repository);
    argv.push(...packages);
    return { argv };
  }

  upgradeAll(): Command {
    return { argv: ["pkg", "upgrade", "-y"] };
  }
}
