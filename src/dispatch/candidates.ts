// Candidate name generation. Pure: the same (phase, identity, mode) always
// yields the same ordered list, most specific first.
import type { Identity } from "../types/identity.js";
import type { InstallMode } from "../types/install.js";
import type { Phase } from "../types/phase.js";
import { PHASE_TEMPLATES } from "./phases.js";

/** The identity fields a handler name can carry. */
export interface HandlerKey {
  readonly phase: Phase;
  readonly distro: string;
  readonly major?: string | null;
  readonly minor?: string | null;
  readonly mode?: string | null;
}

interface Tier {
  readonly major: boolean;
  readonly minor: boolean;
  readonly mode: boolean;
}

/** Most specific first. */
const TIERS: readonly Tier[] = [
  { major: true, minor: true, mode: true },
  { major: true, minor: true, mode: false },
  { major: true, minor: false, mode: true },
  { major: true, minor: false, mode: false },
  { major: false, minor: false, mode: true },
  { major: false, minor: false, mode: false },
];

/**
 * Format a handler name. Empty components are left out entirely, and a minor
 * version without a major is dropped with it.
 */
export function formatHandlerName(key: HandlerKey): string {
  const { prefix, suffix } = PHASE_TEMPLATES[key.phase];
  const parts = [key.distro];
  if (key.major) {
    parts.push(key.major);
    if (key.minor) parts.push(key.minor);
  }
  if (key.mode) parts.push(key.mode);
  return `${prefix}${parts.join("_")}${suffix}`;
}

/** Order-preserving de-duplication. */
export function stripDuplicates(names: readonly string[]): string[] {
  return [...new Set(names)];
}

export function generateCandidates(phase: Phase, identity: Identity, mode: InstallMode): string[] {
  const template = PHASE_TEMPLATES[phase];
  const names = TIERS.filter((tier) => tier.mode || !template.modeRequired).map((tier) =>
    formatHandlerName({
      phase,
      distro: identity.distroNameNormalized,
      major: tier.major ? identity.majorVersion : null,
      minor: tier.minor ? identity.minorVersion : null,
      mode: tier.mode ? mode.type : null,
    }),
  );
  if (template.fallback) names.push(template.fallback);
  return stripDuplicates(names);
}
