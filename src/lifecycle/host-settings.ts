// Settings the run writes directly after install, whatever the distro.
import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BootstrapConfig } from "../types/config.js";
import { logger } from "../logger.js";

/** Create the minion cache directory and drop the master address and minion id. */
export async function applyHostSettings(config: BootstrapConfig): Promise<void> {
  const { salt_etc_dir: etc, salt_cache_dir: cache } = config.paths;

  if (config.targets.minion) {
    await mkdir(join(cache, "minion", "proc"), { recursive: true });
  }

  if (config.minion.master_address !== null) {
    const dropIn = join(etc, "minion.d");
    await mkdir(dropIn, { recursive: true });
    await writeFile(join(dropIn, "99-master-address.conf"), `master: ${config.minion.master_address}\n`, "utf-8");
    logger.info({ master: config.minion.master_address }, "Configured master address");
  }

  if (config.minion.minion_id !== null) {
    await mkdir(etc, { recursive: true });
    await writeFile(join(etc, "minion_id"), `${config.minion.minion_id}\n`, "utf-8");
    logger.info({ minionId: config.minion.minion_id }, "Configured minion id");
  }
}
