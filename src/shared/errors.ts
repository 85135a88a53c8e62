export enum BootstrapErrorCode {
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
  CONFIG_INVALID = "CONFIG_INVALID",
  UNSUPPORTED_KERNEL = "UNSUPPORTED_KERNEL",
  UNSUPPORTED_DISTRO = "UNSUPPORTED_DISTRO",
  UNSUPPORTED_VERSION = "UNSUPPORTED_VERSION",
  UNSUPPORTED_INSTALL_TYPE = "UNSUPPORTED_INSTALL_TYPE",
  HANDLER_NOT_FOUND = "HANDLER_NOT_FOUND",
  HANDLER_FAILED = "HANDLER_FAILED",
  COMMAND_FAILED = "COMMAND_FAILED",
  SOURCE_RETRIEVAL_FAILED = "SOURCE_RETRIEVAL_FAILED",
  DAEMONS_NOT_RUNNING = "DAEMONS_NOT_RUNNING",
}

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BootstrapErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BootstrapError";
    this.code = code;
    this.context = context;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
