// Handler existence probing and per-run plan resolution. The plan is computed
// once, before the first handler runs, and is never recomputed.
import type { BootstrapConfig } from "../types/config.js";
import type { Identity } from "../types/identity.js";
import type { InstallMode } from "../types/install.js";
import type { Phase, Resolution, ResolvedPlan } from "../types/phase.js";
import { PHASES } from "../types/phase.js";
import { logger } from "../logger.js";
import { generateCandidates } from "./candidates.js";
import type { HandlerRegistry } from "./registry.js";

/** First registered candidate, probed strictly in list order. */
export function resolveHandler(registry: HandlerRegistry, candidates: readonly string[]): Resolution {
  for (const name of candidates) {
    const handler = registry.get(name);
    if (handler) {
      logger.info({ handler: name }, `Found handler ${name}`);
      return { kind: "resolved", name, handler };
    }
    logger.debug({ handler: name }, `${name} not found`);
  }
  return { kind: "unresolved", candidates };
}

export interface PlanOptions {
  /** Set when /tmp/disable_salt_checks exists on the host. */
  readonly checksDisabledByMarker?: boolean;
}

/**
 * Why a phase is skipped for this run, or null when it applies.
 * Not-applicable phases are never probed.
 */
export function notApplicableReason(phase: Phase, config: BootstrapConfig, options: PlanOptions = {}): string | null {
  const { lifecycle, paths } = config;
  switch (phase) {
    case "dependencies":
      if (lifecycle.config_only) return "configuration-only run";
      if (lifecycle.no_deps) return "dependencies assumed installed";
      return null;
    case "install":
      return lifecycle.config_only ? "configuration-only run" : null;
    case "configure":
      return paths.config_dir === null ? "no configuration directory given" : null;
    case "preseed-keys":
      return paths.keys_dir === null ? "no keys directory given" : null;
    case "post-install":
      return lifecycle.config_only ? "configuration-only run" : null;
    case "check-services":
      if (lifecycle.config_only) return "configuration-only run";
      if (lifecycle.disable_checks) return "service checks disabled";
      if (options.checksDisabledByMarker) return "service checks disabled by /tmp/disable_salt_checks";
      return null;
    case "restart-daemons":
    case "daemons-running":
      return lifecycle.start_daemons ? null : "daemons will not be started";
  }
}

export function resolvePlan(
  registry: HandlerRegistry,
  identity: Identity,
  mode: InstallMode,
  config: BootstrapConfig,
  options: PlanOptions = {},
): ResolvedPlan {
  const plan = new Map<Phase, Resolution>();
  for (const phase of PHASES) {
    const reason = notApplicableReason(phase, config, options);
    plan.set(phase, reason !== null ? { kind: "not-applicable", reason } : resolveHandler(registry, generateCandidates(phase, identity, mode)));
  }
  logger.debug({ plan: summarizePlan(plan) }, "Resolved handler plan");
  return plan;
}

/** `phase → handler name | "none" | "skipped (reason)"`, for logs. */
export function summarizePlan(plan: ResolvedPlan): Record<string, string> {
  const summary: Record<string, string> = {};
  for (const [phase, resolution] of plan) {
    summary[phase] =
      resolution.kind === "resolved" ? resolution.name : resolution.kind === "unresolved" ? "none" : `skipped (${resolution.reason})`;
  }
  return summary;
}
