import type { HandlerContext } from "./context.js";

/** Lifecycle phases, in the order the orchestrator runs them. */
export const PHASES = [
  "dependencies",
  "configure",
  "preseed-keys",
  "install",
  "post-install",
  "check-services",
  "restart-daemons",
  "daemons-running",
] as const;

export type Phase = (typeof PHASES)[number];

/** Returned by a handler that wants the run to stop successfully. */
export interface HaltRun {
  readonly halt: true;
  readonly reason: string;
}

export type HandlerResult = void | HaltRun;

export function isHalt(result: HandlerResult): result is HaltRun {
  return typeof result === "object" && result.halt;
}

/** An opaque, fallible installation step. Failure is signalled by rejecting. */
export type Handler = (ctx: HandlerContext) => Promise<HandlerResult>;

/** Outcome of looking up the handler for one phase. */
export type Resolution =
  | { readonly kind: "resolved"; readonly name: string; readonly handler: Handler }
  | { readonly kind: "unresolved"; readonly candidates: readonly string[] }
  | { readonly kind: "not-applicable"; readonly reason: string };

export type ResolvedPlan = ReadonlyMap<Phase, Resolution>;
