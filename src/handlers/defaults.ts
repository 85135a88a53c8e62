// Distro-agnostic handlers. Each is the last candidate of its phase, so any
// recipe can override it by registering a more specific name.
import { chmod, copyFile, mkdir, readdir, rename, stat } from "node:fs/promises";
import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import type { HandlerContext } from "../types/context.js";
import type { HandlerResult } from "../types/phase.js";
import type { HandlerRegistry } from "../dispatch/registry.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import type { Daemon } from "./common.js";
import { selectedDaemons } from "./common.js";

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function ensurePrivateDir(path: string): Promise<void> {
  if (existsSync(path)) return;
  await mkdir(path, { recursive: true });
  await chmod(path, 0o700);
}

/**
 * Move (or copy, when temporary files are kept) `source` to `destination`.
 * A destination directory receives the file under its own name. An existing
 * target is left alone unless overwriting was forced.
 */
export async function placeFile(ctx: HandlerContext, source: string, destination: string): Promise<string> {
  const target = (await isDirectory(destination)) ? join(destination, basename(source)) : destination;
  if (existsSync(target) && !ctx.config.lifecycle.force_overwrite) {
    logger.warn({ target }, "Not overwriting existing file");
    return target;
  }
  if (ctx.config.lifecycle.keep_temp_files) {
    await copyFile(source, target);
  } else {
    try {
      await rename(source, target);
    } catch (err) {
      // Temporary directories often live on another filesystem.
      if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) throw err;
      await copyFile(source, target);
    }
  }
  logger.debug({ source, target }, "Placed file");
  return target;
}

interface ProvidedFile {
  readonly name: string;
  readonly destination: (pki: string, etc: string) => string;
  readonly mode?: number;
}

const MINION_FILES: readonly ProvidedFile[] = [
  { name: "minion", destination: (_pki, etc) => etc },
  { name: "minion.pem", destination: (pki) => join(pki, "minion", "minion.pem"), mode: 0o400 },
  { name: "minion.pub", destination: (pki) => join(pki, "minion", "minion.pub"), mode: 0o664 },
  // multi-master PKI
  { name: "master_sign.pub", destination: (pki) => join(pki, "minion", "master_sign.pub"), mode: 0o664 },
];

const MASTER_FILES: readonly ProvidedFile[] = [
  { name: "master", destination: (_pki, etc) => etc },
  { name: "master.pem", destination: (pki) => join(pki, "master", "master.pem"), mode: 0o400 },
  { name: "master.pub", destination: (pki) => join(pki, "master", "master.pub"), mode: 0o664 },
];

async function placeProvided(ctx: HandlerContext, configDir: string, files: readonly ProvidedFile[]): Promise<boolean> {
  const { salt_etc_dir: etc, salt_pki_dir: pki } = ctx.config.paths;
  let placed = false;
  for (const file of files) {
    const source = join(configDir, file.name);
    if (!existsSync(source)) continue;
    const target = await placeFile(ctx, source, file.destination(pki, etc));
    if (file.mode !== undefined) await chmod(target, file.mode);
    placed = true;
  }
  return placed;
}

/** Copy configuration, grains and keys from the configuration directory. */
export async function configSalt(ctx: HandlerContext): Promise<HandlerResult> {
  const configDir = ctx.config.paths.config_dir;
  if (configDir === null) return;
  const { salt_etc_dir: etc, salt_pki_dir: pki } = ctx.config.paths;

  await mkdir(etc, { recursive: true });
  await ensurePrivateDir(pki);

  let configured = false;
  if (existsSync(join(configDir, "grains"))) {
    await placeFile(ctx, join(configDir, "grains"), join(etc, "grains"));
    configured = true;
  }

  if (ctx.config.targets.minion) {
    await ensurePrivateDir(join(pki, "minion"));
    configured = (await placeProvided(ctx, configDir, MINION_FILES)) || configured;
  }

  if (ctx.config.targets.master || ctx.config.targets.syndic) {
    await ensurePrivateDir(join(pki, "master"));
    configured = (await placeProvided(ctx, configDir, MASTER_FILES)) || configured;
  }

  if (ctx.config.lifecycle.config_only && !configured) {
    logger.warn("No configuration or keys were copied over. No configuration was done!");
    return { halt: true, reason: "nothing to configure" };
  }
}

/** Pre-seed accepted minion keys on the master. */
export async function preseedMaster(ctx: HandlerContext): Promise<HandlerResult> {
  const keysDir = ctx.config.paths.keys_dir;
  if (keysDir === null) return;

  const entries = await readdir(keysDir, { withFileTypes: true });
  const keyFiles = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  if (keyFiles.length === 0) {
    throw new BootstrapError(BootstrapErrorCode.HANDLER_FAILED, "No minion keys were uploaded. Unable to pre-seed master", { keysDir });
  }

  const seedDest = join(ctx.config.paths.salt_pki_dir, "master", "minions");
  await ensurePrivateDir(seedDest);
  for (const name of keyFiles) {
    const target = await placeFile(ctx, join(keysDir, name), join(seedDest, name));
    await chmod(target, 0o664);
  }
  logger.info({ count: keyFiles.length, seedDest }, "Pre-seeded minion keys");
}

async function daemonRunning(ctx: HandlerContext, daemon: Daemon, processList: string): Promise<boolean> {
  if (ctx.identity.distroName === "SmartOS") {
    const state = await ctx.executor.execute({ argv: ["svcs", "-Ho", "STA", `salt-${daemon}`] });
    return state.stdout.trim() === "ON";
  }
  return processList.split("\n").some((line) => line.includes(`salt-${daemon}`));
}

/** Fails when any selected daemon is not running. */
export async function daemonsRunning(ctx: HandlerContext): Promise<HandlerResult> {
  if (!ctx.config.lifecycle.start_daemons) return;
  const processes = await ctx.executor.execute({ argv: ["ps", "wwwaux"] });

  const missing: Daemon[] = [];
  for (const daemon of selectedDaemons(ctx.config)) {
    if (!(await daemonRunning(ctx, daemon, processes.stdout))) {
      logger.error({ daemon }, `salt-${daemon} was not found running`);
      missing.push(daemon);
    }
  }
  if (missing.length > 0) {
    throw new BootstrapError(BootstrapErrorCode.DAEMONS_NOT_RUNNING, `${missing.length} daemon(s) not running`, { missing });
  }
}

export function registerDefaultHandlers(registry: HandlerRegistry): void {
  registry.register("config_salt", configSalt);
  registry.register("preseed_master", preseedMaster);
  registry.register("daemons_running", daemonsRunning);
}
