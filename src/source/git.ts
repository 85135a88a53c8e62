// Source retrieval for `git` installs: clone or update a working copy of Salt
// at the requested revision. Release tags get a shallow clone first, with a
// full clone as the fallback. Once a working copy exists, any failure is fatal
// and the copy is left in place.
import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type { Executor, ExecResult } from "../execution/executor.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { parseVersionString } from "../distro/version.js";

const RELEASE_TAG = /v[0-9]{1,4}\.[0-9]{1,2}(\.[0-9]{1,2})?/;
const CANONICAL_UPSTREAM = /((git|https):\/\/github\.com\/|git@github\.com:)saltstack\/salt\.git/;

/** `--single-branch` shallow clones work from git 1.7.10 on. */
const MIN_SHALLOW_GIT: readonly [number, number, number] = [1, 7, 10];

export function isReleaseTag(revision: string): boolean {
  return RELEASE_TAG.test(revision);
}

export function isCanonicalUpstream(url: string): boolean {
  return CANONICAL_UPSTREAM.test(url);
}

/** Parse `git --version` output and compare against the shallow-clone minimum. */
export function supportsShallowClone(gitVersionOutput: string): boolean {
  const match = /([0-9]+)\.([0-9]+)(?:\.([0-9]+))?/.exec(gitVersionOutput);
  if (!match) return false;
  const actual = [Number(match[1]), Number(match[2]), Number(match[3] ?? "0")];
  for (let i = 0; i < MIN_SHALLOW_GIT.length; i++) {
    const have = actual[i] ?? 0;
    const need = MIN_SHALLOW_GIT[i] ?? 0;
    if (have !== need) return have > need;
  }
  return true;
}

export interface CheckoutResult {
  readonly path: string;
  readonly revision: string;
  /** True when an existing working copy was updated in place. */
  readonly updated: boolean;
  readonly shallow: boolean;
}

export interface SourceRetrieverOptions {
  readonly repoUrl: string;
  readonly upstreamUrl: string;
  readonly checkoutDir: string;
  readonly pathExists?: (path: string) => boolean;
  readonly ensureDir?: (path: string) => Promise<void>;
}

export interface SourceRetriever {
  retrieve(revision: string): Promise<CheckoutResult>;
}

export class GitSourceRetriever implements SourceRetriever {
  private readonly pathExists: (path: string) => boolean;
  private readonly ensureDir: (path: string) => Promise<void>;

  constructor(
    private readonly executor: Executor,
    private readonly options: SourceRetrieverOptions,
  ) {
    this.pathExists = options.pathExists ?? existsSync;
    this.ensureDir = options.ensureDir ?? (async (path) => void (await mkdir(path, { recursive: true })));
  }

  async retrieve(revision: string): Promise<CheckoutResult> {
    const version = await this.git(["--version"]);
    logger.debug({ gitVersion: parseVersionString(version.stdout) }, "Installed git version");

    const result = this.pathExists(this.options.checkoutDir)
      ? await this.update(revision)
      : await this.cloneFresh(revision, version.exitCode === 0 && supportsShallowClone(version.stdout));
    logger.info({ path: result.path, revision, shallow: result.shallow }, "Cloning Salt's git repository succeeded");
    return result;
  }

  private async update(revision: string): Promise<CheckoutResult> {
    const cwd = this.options.checkoutDir;
    logger.debug({ path: cwd }, "Found a checked out Salt repository");

    await this.gitOrThrow(["fetch"], cwd, "Failed to fetch git changes");
    // Salt derives its version from tags, so they are always needed.
    await this.gitOrThrow(["fetch", "--tags"], cwd, "Failed to fetch git tags");

    const remotes = await this.gitOrThrow(["remote", "-v"], cwd, "Failed to list git remotes");
    if (!remotes.stdout.includes(this.options.upstreamUrl)) {
      logger.info({ upstream: this.options.upstreamUrl }, "Adding SaltStack's Salt repository as a remote");
      await this.gitOrThrow(["remote", "add", "upstream", this.options.upstreamUrl], cwd, "Failed to add the upstream remote");
    }
    await this.gitOrThrow(["fetch", "--tags", "upstream"], cwd, "Failed to fetch upstream git tags");

    logger.debug({ revision }, "Hard resetting the cloned repository");
    await this.gitOrThrow(["reset", "--hard", revision], cwd, `Failed to reset the repository to ${revision}`);

    // Resetting onto a branch name leaves the local branch where it was; pull
    // to move it to the remote tip.
    const branches = await this.gitOrThrow(["branch", "-r"], cwd, "Failed to list remote branches");
    const isBranch = branches.stdout.split("\n").some((line) => line.trim() === `origin/${revision}`);
    if (isBranch) {
      logger.debug({ branch: revision }, "Fast-forwarding the cloned repository branch");
      await this.gitOrThrow(["pull", "--ff-only"], cwd, `Failed to fast-forward branch ${revision}`);
    }

    return { path: cwd, revision, updated: true, shallow: false };
  }

  private async cloneFresh(revision: string, shallowSupported: boolean): Promise<CheckoutResult> {
    const { repoUrl, upstreamUrl, checkoutDir } = this.options;
    const parent = dirname(checkoutDir);
    const repoName = basename(checkoutDir);
    await this.ensureDir(parent);

    let shallow = false;
    if (!isReleaseTag(revision)) {
      logger.warn({ revision }, "The git revision being installed does not match a Salt version tag. Shallow cloning disabled");
    } else if (!shallowSupported) {
      logger.debug("Shallow cloning not possible. Required git version not met.");
    } else {
      logger.info({ revision, repoUrl }, "Attempting to shallow clone");
      const attempt = await this.git(["clone", "--depth", "1", "--branch", revision, repoUrl, repoName], parent);
      if (attempt.exitCode === 0) {
        shallow = true;
      } else {
        logger.warn({ revision, stderr: attempt.stderr }, "Failed to shallow clone; resuming regular git clone");
      }
    }

    if (!shallow) {
      await this.gitOrThrow(["clone", repoUrl, repoName], parent, `Failed to clone ${repoUrl}`);
    }

    if (!isCanonicalUpstream(repoUrl)) {
      logger.info({ upstream: upstreamUrl }, "Adding SaltStack's Salt repository as a remote");
      await this.gitOrThrow(["remote", "add", "upstream", upstreamUrl], checkoutDir, "Failed to add the upstream remote");
      await this.gitOrThrow(["fetch", "--tags", "upstream"], checkoutDir, "Failed to fetch upstream git tags");
    }

    if (!shallow) {
      logger.debug({ revision }, "Checking out revision");
      await this.gitOrThrow(["checkout", revision], checkoutDir, `Failed to check out ${revision}`);
    }

    return { path: checkoutDir, revision, updated: false, shallow };
  }

  private git(args: string[], cwd?: string): Promise<ExecResult> {
    return this.executor.execute({ argv: ["git", ...args], ...(cwd ? { cwd } : {}) });
  }

  private async gitOrThrow(args: string[], cwd: string, message: string): Promise<ExecResult> {
    const result = await this.git(args, cwd);
    if (result.exitCode !== 0) {
      throw new BootstrapError(BootstrapErrorCode.SOURCE_RETRIEVAL_FAILED, message, {
        command: `git ${args.join(" ")}`,
        cwd,
        stderr: result.stderr,
      });
    }
    return result;
  }
}
