// Command-line parsing. Only flags the user actually passed become overrides,
// so environment variables and the defaults file still apply underneath.
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { ConfigOverrides } from "../types/config.js";
import type { InstallMode } from "../types/install.js";
import { INSTALL_TYPES, LATEST } from "../types/install.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { SALTSTACK_REPO_URL } from "./schema.js";

/** `latest`, or a release number such as `3006`, `3006.9` or `2015.8.8`. */
const STABLE_VERSION = /^(latest|[0-9]{1,4}(\.[0-9]{1,2}){0,2})$/;

const DEFAULT_GIT_REVISION = "develop";

type CliOptions = {
  color: boolean;
  debug?: boolean;
  configDir?: string;
  repoUrl?: string;
  httpsUpstream?: boolean;
  keysDir?: string;
  sleep?: number;
  master?: boolean;
  syndic?: boolean;
  minion: boolean;
  startDaemons: boolean;
  configOnly?: boolean;
  pipAllowed?: boolean;
  forceOverwrite?: boolean;
  upgradeSystem?: boolean;
  keepTempFiles?: boolean;
  insecure?: boolean;
  masterAddress?: string;
  minionId?: string;
  package?: string[];
  disableChecks?: boolean;
  httpProxy?: string;
  disableRepos?: boolean;
  repoBaseUrl?: string;
  deps: boolean;
  defaultsFile?: string;
};

export interface ParsedArguments {
  readonly mode: InstallMode;
  readonly overrides: ConfigOverrides;
  readonly defaultsFile: string | null;
}

function parseSeconds(value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new InvalidArgumentError("Expected a whole number of seconds.");
  }
  return Number(value);
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function buildProgram(version: string): Command {
  return new Command("bootstrap-salt")
    .description("Install Salt (minion, master or syndic) on the detected platform")
    .version(version, "-v, --version", "Display script version")
    .argument("[install-type]", `one of ${INSTALL_TYPES.join(", ")} (default: stable)`)
    .argument("[revision]", "stable/onedir version, or git branch, tag or commit")
    .option("-n, --no-color", "No colours")
    .option("-D, --debug", "Show debug output")
    .option("-c, --config-dir <dir>", "Temporary configuration directory")
    .option("-g, --repo-url <url>", "Salt repository URL to clone from")
    .option("-G, --https-upstream", `Clone from and fetch tags from ${SALTSTACK_REPO_URL}, replacing any git:// URL set in the defaults file`)
    .option("-k, --keys-dir <dir>", "Temporary directory holding the minion keys to pre-seed on the master")
    .option("-s, --sleep <seconds>", "Sleep time used when waiting for daemons to start, restart and to check them", parseSeconds)
    .option("-M, --master", "Also install salt-master")
    .option("-S, --syndic", "Also install salt-syndic")
    .option("-N, --no-minion", "Do not install salt-minion")
    .option("-X, --no-start-daemons", "Do not start daemons after installation")
    .option("-C, --config-only", "Only run the configuration function (requires -c)")
    .option("-P, --pip-allowed", "Allow pip based installations")
    .option("-F, --force-overwrite", "Allow copied files to overwrite existing ones")
    .option("-U, --upgrade-system", "Fully upgrade the system prior to bootstrapping Salt")
    .option("-K, --keep-temp-files", "Keep the temporary files (configuration directory, git checkout)")
    .option("-I, --insecure", "Skip certificate checks when downloading")
    .option("-A, --master-address <address>", "Salt master address for the minion")
    .option("-i, --minion-id <id>", "Salt minion id")
    .option("-p, --package <name>", "Extra package to install while installing dependencies (repeatable)", collect)
    .option("-d, --disable-checks", "Skip the post-install service checks")
    .option("-H, --http-proxy <url>", "Use the given HTTP proxy for the installation")
    .option("-r, --disable-repos", "Do not configure any package repositories")
    .option("-R, --repo-base-url <url>", "Base URL of the Salt package repository")
    .option("-b, --no-deps", "Assume dependencies are already installed")
    .option("--defaults-file <path>", "YAML file of default settings")
    .allowExcessArguments(false)
    .exitOverride();
}

/** Turn the positional arguments into an install mode. */
export function parseInstallMode(installType: string = "stable", revision?: string): InstallMode {
  switch (installType) {
    case "stable":
    case "onedir": {
      const version = revision ?? LATEST;
      if (!STABLE_VERSION.test(version)) {
        throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, `Unknown ${installType} version: ${version}`);
      }
      return { type: installType, version };
    }
    case "git":
      return { type: "git", revision: revision ?? DEFAULT_GIT_REVISION };
    case "testing":
    case "daily":
      if (revision !== undefined) {
        throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, "Too many arguments.");
      }
      return { type: installType };
    default:
      throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, `Installation type "${installType}" is not known...`);
  }
}

/**
 * Parse `argv` (without the node and script entries). Returns null when help
 * or the version was printed.
 */
export function parseArguments(argv: readonly string[], version: string, program: Command = buildProgram(version)): ParsedArguments | null {
  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") return null;
      throw new BootstrapError(BootstrapErrorCode.INVALID_ARGUMENTS, err.message, { code: err.code });
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const explicit = <K extends keyof CliOptions>(key: K): CliOptions[K] | undefined =>
    program.getOptionValueSource(key) === "cli" ? opts[key] : undefined;
  const deps = explicit("deps");

  const [installType, revision] = program.args;
  const mode = parseInstallMode(installType, revision);

  const httpsUpstream = explicit("httpsUpstream") === true;
  const repoUrl = explicit("repoUrl") ?? (httpsUpstream ? SALTSTACK_REPO_URL : undefined);

  const overrides: ConfigOverrides = {
    output: { color: explicit("color"), debug: explicit("debug") },
    targets: { minion: explicit("minion"), master: explicit("master"), syndic: explicit("syndic") },
    lifecycle: {
      config_only: explicit("configOnly"),
      no_deps: deps === undefined ? undefined : !deps,
      start_daemons: explicit("startDaemons"),
      disable_checks: explicit("disableChecks"),
      sleep_seconds: explicit("sleep"),
      force_overwrite: explicit("forceOverwrite"),
      keep_temp_files: explicit("keepTempFiles"),
      upgrade_system: explicit("upgradeSystem"),
      pip_allowed: explicit("pipAllowed"),
    },
    paths: { config_dir: explicit("configDir"), keys_dir: explicit("keysDir") },
    minion: { master_address: explicit("masterAddress"), minion_id: explicit("minionId") },
    network: { http_proxy: explicit("httpProxy"), insecure_downloads: explicit("insecure") },
    packages: { extra: explicit("package"), disable_repos: explicit("disableRepos"), repo_base_url: explicit("repoBaseUrl") },
    git: { repo_url: repoUrl, upstream_url: httpsUpstream ? SALTSTACK_REPO_URL : undefined },
  };

  return { mode, overrides, defaultsFile: explicit("defaultsFile") ?? null };
}
