// Command execution layer. Every recipe command passes through this module.
// LocalExecutor is the boundary between handler code and the host; tests swap
// in a recording executor instead.
import execa from "execa";
import type { Command } from "../types/command.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs?: number): Promise<ExecResult>;
}

export class LocalExecutor implements Executor {
  constructor(private readonly baseEnv: Record<string, string> = {}) {}

  async execute(command: Command, timeoutMs?: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (!cmd) {
      throw new BootstrapError(BootstrapErrorCode.COMMAND_FAILED, "Refusing to execute an empty command");
    }
    logger.debug({ argv: command.argv, cwd: command.cwd }, "Executing command");

    try {
      const result = await execa(cmd, args, {
        cwd: command.cwd,
        env: { ...this.baseEnv, ...command.env },
        input: command.stdin,
        timeout: timeoutMs,
        reject: false,
      });
      return {
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        exitCode: result.exitCode ?? (result.timedOut || result.killed ? 124 : 1),
        durationMs: Math.round(performance.now() - start),
      };
    } catch (err) {
      throw new BootstrapError(BootstrapErrorCode.COMMAND_FAILED, `Command failed to spawn: ${cmd}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/** Execute and reject on a non-zero exit status. */
export async function executeOrThrow(executor: Executor, command: Command, timeoutMs?: number): Promise<ExecResult> {
  const result = await executor.execute(command, timeoutMs);
  if (result.exitCode !== 0) {
    throw new BootstrapError(
      BootstrapErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${command.argv.join(" ")}`,
      { stdout: result.stdout, stderr: result.stderr },
    );
  }
  return result;
}
