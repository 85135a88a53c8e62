import type { Command } from "../types/command.js";
import type { PackageManager } from "./interface.js";

/** openSUSE and SLES. */
export class ZypperPackageManager implements PackageManager {
  readonly name = "zypper";

  refresh(): Command {
    return { argv: ["zypper", "--non-interactive", "--gpg-auto-import-keys", "refresh"] };
  }

  install(packages: readonly string[]): Command {
    return { argv: ["zypper", "--non-interactive", "install", "--auto-agree-with-licenses", ...packages] };
  }

  upgradeAll(): Command {
    return { argv: ["zypper", "--non-interactive", "--gpg-auto-import-keys", "update"] };
  }

  addRepo(url: string, alias: string): Command {
    return { argv: ["zypper", "--non-interactive", "addrepo", "--refresh", url, alias] };
  }
}
