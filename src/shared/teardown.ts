// Exit-time cleanup. Everything registered here runs exactly once, on normal
// completion, on failure and on SIGINT/SIGTERM, before the process exits.
// The exit code is decided before cleanups run and a failing cleanup never
// replaces it.
import { logger } from "../logger.js";
import { describeError } from "./errors.js";

export type Cleanup = () => void | Promise<void>;

const SIGNAL_EXIT_CODES: Readonly<Record<"SIGINT" | "SIGTERM", number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

export class Teardown {
  private readonly cleanups: { name: string; run: Cleanup }[] = [];
  private finished = false;

  register(name: string, run: Cleanup): void {
    this.cleanups.push({ name, run });
  }

  /** Run every cleanup, newest first. Returns the exit code it was given. */
  async run(exitCode: number): Promise<number> {
    if (this.finished) return exitCode;
    this.finished = true;
    for (const cleanup of [...this.cleanups].reverse()) {
      try {
        await cleanup.run();
      } catch (err) {
        logger.error({ cleanup: cleanup.name, exitCode, error: describeError(err) }, "Cleanup failed; keeping original exit code");
      }
    }
    return exitCode;
  }

  get size(): number {
    return this.cleanups.length;
  }
}

/** Route SIGINT/SIGTERM through the teardown before exiting. */
export function installSignalHandlers(teardown: Teardown, exit: (code: number) => void = (code) => process.exit(code)): void {
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.warn({ signal }, "Interrupted");
      void teardown.run(SIGNAL_EXIT_CODES[signal]).then(exit);
    });
  }
}
