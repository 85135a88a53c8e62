// Runs the resolved plan. Every phase's handler is looked up once, before
// anything executes; a run that cannot install never touches the host.
import { setTimeout as delay } from "node:timers/promises";
import type { HandlerContext } from "../types/context.js";
import type { HandlerResult, Phase, ResolvedPlan } from "../types/phase.js";
import { PHASES, isHalt } from "../types/phase.js";
import type { HandlerRegistry } from "../dispatch/registry.js";
import type { PlanOptions } from "../dispatch/resolver.js";
import { resolvePlan } from "../dispatch/resolver.js";
import { PHASE_TEMPLATES } from "../dispatch/phases.js";
import type { CheckoutResult, SourceRetriever } from "../source/git.js";
import { BootstrapError, BootstrapErrorCode, describeError } from "../shared/errors.js";
import { describeMode } from "../types/install.js";
import { logger } from "../logger.js";
import { applyHostSettings } from "./host-settings.js";
import { dumpDaemonDiagnostics } from "./diagnostics.js";

export type RunStatus = "installed" | "configured" | "halted";

export interface RunOutcome {
  readonly status: RunStatus;
  /** Handler names in the order they ran. */
  readonly executed: readonly string[];
  readonly checkout: CheckoutResult | null;
}

export interface OrchestratorOptions {
  readonly registry: HandlerRegistry;
  readonly context: HandlerContext;
  /** Required for git installs. */
  readonly sourceRetriever?: SourceRetriever;
  readonly planOptions?: PlanOptions;
  readonly sleep?: (seconds: number) => Promise<void>;
  readonly applyHostSettings?: (ctx: HandlerContext) => Promise<void>;
  readonly diagnostics?: (ctx: HandlerContext) => Promise<void>;
}

/** Phases that wait for the settle time before running. */
const SETTLE_BEFORE: ReadonlySet<Phase> = new Set<Phase>(["restart-daemons", "daemons-running"]);

const PHASE_LABELS: Readonly<Record<Phase, string>> = {
  dependencies: "dependencies installation",
  configure: "configuration",
  "preseed-keys": "master key pre-seeding",
  install: "installation",
  "post-install": "post install",
  "check-services": "service check",
  "restart-daemons": "daemon restart",
  "daemons-running": "running daemons check",
};

export class LifecycleOrchestrator {
  private readonly sleep: (seconds: number) => Promise<void>;
  private readonly hostSettings: (ctx: HandlerContext) => Promise<void>;
  private readonly diagnostics: (ctx: HandlerContext) => Promise<void>;

  constructor(private readonly options: OrchestratorOptions) {
    this.sleep = options.sleep ?? ((seconds) => delay(seconds * 1000));
    this.hostSettings = options.applyHostSettings ?? ((ctx) => applyHostSettings(ctx.config));
    this.diagnostics = options.diagnostics ?? ((ctx) => dumpDaemonDiagnostics(ctx));
  }

  /** Resolve every phase and fail if a mandatory one has no handler. */
  plan(): ResolvedPlan {
    const { registry, context, planOptions } = this.options;
    const plan = resolvePlan(registry, context.identity, context.mode, context.config, planOptions);

    for (const phase of PHASES) {
      const resolution = plan.get(phase);
      if (resolution?.kind !== "unresolved" || !PHASE_TEMPLATES[phase].mandatory) continue;
      const { identity } = context;
      throw new BootstrapError(
        BootstrapErrorCode.HANDLER_NOT_FOUND,
        `No ${PHASE_LABELS[phase]} function found for ${identity.distroName} ${identity.version} (${describeMode(context.mode)})`,
        { phase, candidates: resolution.candidates },
      );
    }
    return plan;
  }

  async run(): Promise<RunOutcome> {
    const plan = this.plan();
    const ctx = this.options.context;
    const executed: string[] = [];
    let checkout: CheckoutResult | null = null;

    for (const phase of PHASES) {
      if (phase === "configure") {
        checkout = await this.retrieveSource();
      }
      if (phase === "post-install") {
        await this.hostSettings(ctx);
      }

      const result = await this.runPhase(phase, plan, executed);
      if (isHalt(result)) {
        logger.info({ phase, reason: result.reason }, "Stopping early");
        return { status: "halted", executed, checkout };
      }
    }

    const configOnly = ctx.config.lifecycle.config_only;
    logger.info(configOnly ? "Salt configured" : "Salt installed!");
    return { status: configOnly ? "configured" : "installed", executed, checkout };
  }

  private async retrieveSource(): Promise<CheckoutResult | null> {
    const { mode, config } = this.options.context;
    if (mode.type !== "git" || config.lifecycle.config_only) return null;
    const retriever = this.options.sourceRetriever;
    if (!retriever) {
      throw new BootstrapError(BootstrapErrorCode.SOURCE_RETRIEVAL_FAILED, "git install requested without a source retriever");
    }
    return retriever.retrieve(mode.revision);
  }

  private async runPhase(phase: Phase, plan: ResolvedPlan, executed: string[]): Promise<HandlerResult> {
    const resolution = plan.get(phase);
    if (!resolution || resolution.kind === "not-applicable") {
      logger.debug({ phase, reason: resolution?.reason }, "Phase skipped");
      return;
    }
    if (resolution.kind === "unresolved") {
      logger.warn({ phase, candidates: resolution.candidates }, `No ${PHASE_LABELS[phase]} function found; skipping`);
      return;
    }

    const ctx = this.options.context;
    if (SETTLE_BEFORE.has(phase)) {
      const seconds = ctx.config.lifecycle.sleep_seconds;
      logger.debug({ seconds }, "Waiting for processes to settle");
      await this.sleep(seconds);
    }

    logger.info({ phase }, `Running ${resolution.name}()`);
    try {
      const result = await resolution.handler(ctx);
      executed.push(resolution.name);
      return result;
    } catch (err) {
      logger.error({ phase, handler: resolution.name, error: describeError(err) }, `Failed to run ${resolution.name}()!!!`);
      if (phase === "daemons-running") {
        await this.diagnostics(ctx);
        throw new BootstrapError(BootstrapErrorCode.DAEMONS_NOT_RUNNING, `Failed to run ${resolution.name}()`, {
          handler: resolution.name,
          cause: describeError(err),
        });
      }
      throw new BootstrapError(BootstrapErrorCode.HANDLER_FAILED, `Failed to run ${resolution.name}()`, {
        phase,
        handler: resolution.name,
        cause: describeError(err),
      });
    }
  }
}
