import type { Command } from "../types/command.js";
import type { PackageManager } from "./interface.js";

/** Debian/Ubuntu. */
export class AptPackageManager implements PackageManager {
  readonly name = "apt-get";
  // No prompts, including the libc6 service-restart question.
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  refresh(): Command {
    return { argv: ["apt-get", "update"], env: this.env };
  }

  install(packages: readonly string[]): Command {
    return {
      argv: ["apt-get", "install", "-y", "--no-install-recommends", "-o", "DPkg::Options::=--force-confold", ...packages],
      env: this.env,
    };
  }

  upgradeAll(): Command {
    return { argv: ["apt-get", "upgrade", "-y", "-o", "DPkg::Options::=--force-confold"], env: this.env };
  }
}
