import type { Command } from "../types/command.js";
import type { PackageManager } from "./interface.js";

/** Arch Linux. `-Sy` refreshes as part of every install. */
export class PacmanPackageManager implements PackageManager {
  readonly name = "pacman";

  refresh(): null {
    return null;
  }

  install(packages: readonly string[]): Command {
    return { argv: ["pacman", "-Sy", "--noconfirm", "--needed", ...packages] };
  }

  upgradeAll(): Command {
    return { argv: ["pacman", "-Syyu", "--noconfirm", "--needed"] };
  }
}
