// src/serving/tiers.ts
// Tier resolution as a lookup: each requested tier has an ordered fallback list and
// ends in "unavailable". Pure; it only decides which loaded artifact answers.

import type { QueryFailure } from "./results.js";
import type { ServedSnapshot } from "./snapshot.js";

export type Tier = "curated" | "expanded" | "genome-wide" | "derived";

export const TIER_FALLBACKS: Readonly<Record<Tier, readonly Tier[]>> = {
  curated: ["curated"],
  expanded: ["expanded", "curated"],
  "genome-wide": ["genome-wide"],
  derived: ["derived"],
};

// Query-string spelling -> tier
export const TIER_PARAMS = {
  curated: "curated",
  expanded: "expanded",
  genome: "genome-wide",
} as const satisfies Record<string, Tier>;

export type TierParam = keyof typeof TIER_PARAMS;

const TIER_LABEL: Record<Tier, string> = {
  curated: "Curated",
  expanded: "Expanded",
  "genome-wide": "Genome-wide",
  derived: "Derived",
};

// What is reported once a request runs off the end of its fallback list
const UNAVAILABLE: Record<Tier, { error: string; hint?: string }> = {
  curated: {
    error: "Curated data not loaded",
    hint: "Run the curated pipeline so that output/sources.json exists under CURATED_ROOT",
  },
  expanded: { error: "No gene data available" },
  "genome-wide": {
    error: "Genome-wide data not available",
    hint: "Run: npm run derive (needs the HGNC bulk set)",
  },
  derived: {
    error: "Gap candidates not available",
    hint: "Run: npm run derive",
  },
};

export type TierResolution =
  | { kind: "served"; requested: Tier; tier: Tier; fallback: boolean; reason?: string }
  | { kind: "unavailable"; requested: Tier; error: string; hint?: string };

function isTierParam(value: string): value is TierParam {
  return Object.prototype.hasOwnProperty.call(TIER_PARAMS, value);
}

export function parseTierParam(value: string): { ok: true; tier: Tier } | { ok: false; failure: QueryFailure } {
  if (isTierParam(value)) return { ok: true, tier: TIER_PARAMS[value] };
  return {
    ok: false,
    failure: { kind: "unknown_parameter", error: `Unknown tier: ${value}`, valid: Object.keys(TIER_PARAMS) },
  };
}

export function hasTier(s: ServedSnapshot, tier: Tier): boolean {
  switch (tier) {
    case "curated":
      return Object.keys(s.curated).length > 0;
    case "expanded":
      return s.expanded.length > 0;
    case "genome-wide":
      return s.genomeWide !== null;
    case "derived":
      return s.candidates !== null;
  }
}

export function resolveTier(requested: Tier, s: ServedSnapshot): TierResolution {
  const tier = TIER_FALLBACKS[requested].find(t => hasTier(s, t));
  if (tier === undefined) {
    return { kind: "unavailable", requested, ...UNAVAILABLE[requested] };
  }
  if (tier === requested) return { kind: "served", requested, tier, fallback: false };
  return {
    kind: "served",
    requested,
    tier,
    fallback: true,
    reason: `${TIER_LABEL[requested]} data not available, serving ${tier}`,
  };
}

export function tierUnavailable(tier: Tier): QueryFailure {
  const { error, hint } = UNAVAILABLE[tier];
  return { kind: "missing_artifact", error, ...(hint ? { hint } : {}) };
}

export function unavailableFailure(r: Extract<TierResolution, { kind: "unavailable" }>): QueryFailure {
  return tierUnavailable(r.requested);
}
