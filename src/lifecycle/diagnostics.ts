// What gets logged when a daemon failed to come up.
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import type { HandlerContext } from "../types/context.js";
import { selectedDaemons } from "../handlers/common.js";
import { logger } from "../logger.js";

const FOREGROUND_TIMEOUT_MS = 30_000;

export async function dumpDaemonDiagnostics(ctx: HandlerContext, logDir = "/var/log/salt"): Promise<void> {
  const debug = ctx.config.output.debug;

  for (const daemon of selectedDaemons(ctx.config)) {
    if (!debug) {
      logger.error(`salt-${daemon} was not found running. Pass '-D' when bootstrapping for additional debugging information...`);
      continue;
    }

    const configFile = join(ctx.config.paths.salt_etc_dir, daemon);
    if (daemon !== "syndic" && !existsSync(configFile)) {
      logger.debug({ configFile }, "Daemon configuration file does not exist");
    }

    const foreground = await ctx.executor.execute({ argv: [`salt-${daemon}`, "-l", "debug"] }, FOREGROUND_TIMEOUT_MS);
    logger.debug({ daemon, stdout: foreground.stdout, stderr: foreground.stderr }, `Running salt-${daemon} by hand`);

    const logFile = join(logDir, daemon);
    if (!existsSync(logFile)) {
      logger.debug({ logFile }, "Daemon log does not exist");
      continue;
    }
    logger.debug({ daemon, log: await readFile(logFile, "utf-8") }, `Daemon log for ${daemon}`);
  }

  const processes = await ctx.executor.execute({ argv: ["ps", "auxwww"] });
  logger.debug({ processes: processes.stdout }, "Running processes");
}
