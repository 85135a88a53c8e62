import type { Command } from '../../src/types/command.js';
import type { ConfigOverrides } from '../../src/types/config.js';
import type { HandlerContext } from '../../src/types/context.js';
import type { Identity } from '../../src/types/identity.js';
import type { InstallMode } from '../../src/types/install.js';
import type { Executor, ExecResult } from '../../src/execution/executor.js';
import type { SystemProbe } from '../../src/system/probe.js';
import { loadConfig } from '../../src/config/loader.js';

/** Config built from the defaults plus the given overrides, ignoring the real environment. */
export function makeConfig(overrides: ConfigOverrides = {}) {
  return loadConfig({ env: {}, overrides }).config;
}

export function makeIdentity(partial: Partial<Identity> = {}): Identity {
  return {
    distroName: 'Ubuntu',
    distroNameNormalized: 'ubuntu',
    version: '20.04',
    majorVersion: '20',
    minorVersion: '04',
    codename: 'focal',
    translatedFrom: null,
    ...partial,
  };
}

type Reply = Partial<ExecResult>;

/**
 * Records every command. Replies are matched on the joined argv prefix; the
 * first matching rule wins and unmatched commands succeed with empty output.
 */
export class RecordingExecutor implements Executor {
  readonly commands: Command[] = [];
  private readonly rules: { prefix: string; reply: Reply }[] = [];

  reply(prefix: string, reply: Reply): this {
    this.rules.push({ prefix, reply });
    return this;
  }

  async execute(command: Command): Promise<ExecResult> {
    this.commands.push(command);
    const line = command.argv.join(' ');
    const rule = this.rules.find((r) => line.startsWith(r.prefix));
    return { stdout: '', stderr: '', exitCode: 0, durationMs: 0, ...rule?.reply };
  }

  lines(): string[] {
    return this.commands.map((c) => c.argv.join(' '));
  }
}

export function makeContext(
  options: { config?: ConfigOverrides; identity?: Partial<Identity>; mode?: InstallMode; executor?: Executor } = {},
): HandlerContext {
  return {
    config: makeConfig(options.config),
    identity: makeIdentity(options.identity),
    mode: options.mode ?? { type: 'stable', version: 'latest' },
    executor: options.executor ?? new RecordingExecutor(),
  };
}

/** In-memory host: files, directory listings, symlinks and command output. */
export class FakeProbe implements SystemProbe {
  constructor(
    private readonly files: Record<string, string> = {},
    private readonly commands: Record<string, string> = {},
    private readonly symlinks: readonly string[] = [],
  ) {}

  readFile(path: string): string | null {
    return this.files[path] ?? null;
  }

  listDir(path: string): string[] {
    const prefix = path.endsWith('/') ? path : `${path}/`;
    return Object.keys(this.files)
      .filter((file) => file.startsWith(prefix) && !file.slice(prefix.length).includes('/'))
      .map((file) => file.slice(prefix.length));
  }

  isFile(path: string): boolean {
    return path in this.files;
  }

  isSymlink(path: string): boolean {
    return this.symlinks.includes(path);
  }

  exec(command: string, args: string[]): string | null {
    return this.commands[[command, ...args].join(' ')] ?? null;
  }
}
