// Config loader: built-in defaults, then an optional YAML defaults file, then
// BS_* environment variables, then explicit command-line flags. Each layer is
// deep-merged over the previous one and the result is validated once.
import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import type { BootstrapConfig, ConfigOverrides } from "../types/config.js";
import { BootstrapError, BootstrapErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";
import { SALTSTACK_REPO_URL, configSchema } from "./schema.js";

export const DEFAULT_LOG_FILE = "/tmp/bootstrap-salt.log";
export const DEFAULT_REPO_BASE_URL = "https://repo.saltproject.io/salt/py3";

export const DEFAULT_CONFIG: z.input<typeof configSchema> = {
  output: { color: true, debug: false, log_file: DEFAULT_LOG_FILE },
  targets: { minion: true, master: false, syndic: false },
  lifecycle: {
    config_only: false,
    no_deps: false,
    start_daemons: true,
    disable_checks: false,
    sleep_seconds: 3,
    force_overwrite: false,
    keep_temp_files: false,
    upgrade_system: false,
    pip_allowed: false,
  },
  paths: { config_dir: null, keys_dir: null, salt_etc_dir: "/etc/salt", salt_cache_dir: "/var/cache/salt" },
  minion: { master_address: null, minion_id: null },
  network: { http_proxy: null, insecure_downloads: false },
  packages: { extra: [], disable_repos: false, repo_base_url: DEFAULT_REPO_BASE_URL },
  git: { repo_url: SALTSTACK_REPO_URL, upstream_url: SALTSTACK_REPO_URL, checkout_dir: "/tmp/git/salt" },
};

export interface LoadConfigOptions {
  /** YAML file of defaults; falls back to BS_DEFAULTS_FILE. */
  readonly defaultsFile?: string | null;
  readonly env?: NodeJS.ProcessEnv;
  /** Explicit command-line flags; highest precedence. */
  readonly overrides?: ConfigOverrides;
}

export interface ConfigResult {
  readonly config: BootstrapConfig;
  readonly defaultsFile: string | null;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const defaultsFile = options.defaultsFile ?? env.BS_DEFAULTS_FILE ?? null;

  let merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  if (defaultsFile) {
    merged = deepMerge(merged, readDefaultsFile(defaultsFile));
  }
  merged = deepMerge(merged, readEnvironment(env));
  merged = deepMerge(merged, options.overrides ?? {});

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return { config: parsed.data, defaultsFile };
}

function readDefaultsFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Defaults file not found: ${path}`);
  }
  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Failed to parse defaults file ${path}: ${describeError(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `Defaults file ${path} must contain a mapping`);
  }
  logger.debug({ path }, "Loaded defaults file");
  return parsed;
}

const TRUE_VALUES = new Set(["1", "true", "yes"]);
const FALSE_VALUES = new Set(["0", "false", "no"]);

/** `1`/`true`/`yes` or `0`/`false`/`no`, case-insensitively. Unset is undefined. */
export function parseEnvBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new BootstrapError(BootstrapErrorCode.CONFIG_INVALID, `${name} must be a boolean, got "${value}"`);
}

function envString(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/** The configuration subset set through BS_* variables. */
export function readEnvironment(env: NodeJS.ProcessEnv): ConfigOverrides {
  const bool = (name: string): boolean | undefined => parseEnvBoolean(name, env[name]);
  return {
    output: {
      color: bool("BS_COLORS"),
      debug: bool("BS_ECHO_DEBUG"),
      log_file: envString(env.BS_LOG_FILE),
    },
    lifecycle: {
      keep_temp_files: bool("BS_KEEP_TEMP_FILES"),
      force_overwrite: bool("BS_FORCE_OVERWRITE"),
      upgrade_system: bool("BS_UPGRADE_SYS"),
      pip_allowed: bool("BS_PIP_ALLOWED"),
    },
    paths: {
      salt_etc_dir: envString(env.BS_SALT_ETC_DIR),
      salt_pki_dir: envString(env.BS_SALT_PKI_DIR),
    },
    minion: {
      master_address: envString(env.BS_SALT_MASTER_ADDRESS),
    },
    network: {
      http_proxy: envString(env.BS_HTTP_PROXY),
      insecure_downloads: bool("BS_INSECURE_DL"),
    },
    packages: {
      repo_base_url: envString(env.BS_REPO_BASE_URL),
    },
    git: {
      checkout_dir: envString(env.BS_SALT_GIT_CHECKOUT_DIR),
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). Undefined in b keeps a. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
