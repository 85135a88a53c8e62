#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

import { attachConsole, attachLogFile, closeLogFile, logger, setLogLevel } from "./logger.js";
import { parseArguments } from "./config/arguments.js";
import { loadConfig } from "./config/loader.js";
import { runBootstrap } from "./bootstrap.js";
import { BootstrapError, BootstrapErrorCode, describeError } from "./shared/errors.js";
import { Teardown, installSignalHandlers } from "./shared/teardown.js";

const packageManifest = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf-8"));
  return packageManifest.parse(raw).version;
}

function requireRoot(): void {
  if (typeof process.getuid === "function" && process.getuid() !== 0) {
    throw new BootstrapError(
      BootstrapErrorCode.INVALID_ARGUMENTS,
      "Salt requires root privileges to install. Please re-run this script as root.",
    );
  }
}

async function main(argv: readonly string[]): Promise<number> {
  const teardown = new Teardown();
  installSignalHandlers(teardown);
  let consoleAttached = false;

  try {
    // ── Phase 1: Parse arguments ──────────────────────────────────
    const parsed = parseArguments(argv, readVersion());
    if (!parsed) return 0;

    // ── Phase 2: Load config ──────────────────────────────────────
    const { config, defaultsFile } = loadConfig({ defaultsFile: parsed.defaultsFile, overrides: parsed.overrides });

    // ── Phase 3: Attach log sinks ─────────────────────────────────
    attachConsole({ color: config.output.color });
    consoleAttached = true;
    attachLogFile(config.output.log_file);
    teardown.register("close log file", closeLogFile);
    if (config.output.debug && process.env.BS_LOG_LEVEL === undefined) setLogLevel("debug");
    logger.debug({ defaultsFile, logFile: config.output.log_file }, "Configuration loaded");

    // ── Phase 4: Bootstrap ────────────────────────────────────────
    const outcome = await runBootstrap({ config, mode: parsed.mode, teardown, checkPrivileges: requireRoot });
    if (outcome) logger.debug({ status: outcome.status, executed: outcome.executed }, "Run finished");
    return await teardown.run(0);
  } catch (err) {
    if (!consoleAttached) attachConsole({ color: true });
    const code = err instanceof BootstrapError ? err.code : undefined;
    const context = err instanceof BootstrapError ? err.context : undefined;
    logger.error({ code, ...context }, describeError(err));
    return teardown.run(1);
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    logger.fatal({ error: describeError(err) }, "Fatal error");
    process.exit(1);
  },
);
