// src/gaps/scoring.ts
import type { AggregatedGeneRecord, EvidenceCounts, ScoreBand } from "./types.js";

/**
 * Confidence formula for gap candidates. Earlier revisions used linear and
 * capped-linear weights with other band cut-offs; this is the one in force.
 * Expect this constant, and the bands below, to change before anything else.
 */
export const SCORING_FORMULA = {
  version: "log2-v3",
  formula:
    "log2(hpo_terms + 1) + 3 * log2(orphanet_disorders + 1) + (2 + log2(omim_syndromes + 1) if OMIM entry); " +
    "each term 0 when its evidence is absent; rounded to 1 decimal",
} as const;

export const SCORE_BANDS = { high: 12, medium: 6 } as const;

const RARE_DISEASE_WEIGHT = 3;
const DISEASE_ENTRY_BASE = 2;

function nonNegative(n: number): number {
  return Number.isFinite(n) && n > 0 ? n : 0;
}

export function round1(x: number): number {
  return Math.round(x * 10) / 10;
}

export function scoreEvidence(counts: EvidenceCounts): number {
  const hpo = nonNegative(counts.hpoTermCount);
  const rare = nonNegative(counts.rareDiseaseCount);
  const syndromes = nonNegative(counts.diseaseEntrySyndromeCount);

  let s = 0;
  if (hpo > 0) s += Math.log2(hpo + 1);
  if (rare > 0) s += Math.log2(rare + 1) * RARE_DISEASE_WEIGHT;
  if (counts.hasDiseaseEntry) s += DISEASE_ENTRY_BASE + Math.log2(syndromes + 1);
  return round1(s);
}

export function evidenceCounts(record: AggregatedGeneRecord): EvidenceCounts {
  const { hpo, orphanet, omim } = record.evidence;
  return {
    hpoTermCount: hpo.count,
    rareDiseaseCount: orphanet.count,
    hasDiseaseEntry: omim.present,
    diseaseEntrySyndromeCount: omim.count,
  };
}

export function scoreRecord(record: AggregatedGeneRecord): number {
  return scoreEvidence(evidenceCounts(record));
}

export function scoreBand(score: number): ScoreBand {
  if (score >= SCORE_BANDS.high) return "high";
  if (score >= SCORE_BANDS.medium) return "medium";
  return "low";
}
