// src/gaps/select_candidates.ts
import type { CandidateRecordT, CandidateSnapshotT, ScoreDistributionT } from "./schemas.js";
import { makeProvenance } from "./provenance.js";
import { SCORING_FORMULA, scoreBand, scoreRecord } from "./scoring.js";
import type { AggregatedGeneRecord } from "./types.js";

export const HPO_TOP_TERMS = 10;
export const ORPHANET_TOP_DISORDERS = 5;

export const CANDIDATE_NON_CANON = [
  "Confidence scoring formula",
  "ZNF exclusion rule",
  "Gene group matching heuristic",
];

export type SelectOptions = {
  worker: string;
  now: Date;
  canonSources?: string[];
};

/** Score descending, then symbol ascending. */
export function compareCandidates(
  a: Pick<CandidateRecordT, "symbol" | "confidence_score">,
  b: Pick<CandidateRecordT, "symbol" | "confidence_score">
): number {
  if (a.confidence_score !== b.confidence_score) return b.confidence_score - a.confidence_score;
  return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
}

export function scoreDistribution(candidates: Pick<CandidateRecordT, "confidence_score">[]): ScoreDistributionT {
  const dist: ScoreDistributionT = { "high (12+)": 0, "medium (6-11.9)": 0, "low (<6)": 0 };
  for (const c of candidates) {
    const band = scoreBand(c.confidence_score);
    if (band === "high") dist["high (12+)"]++;
    else if (band === "medium") dist["medium (6-11.9)"]++;
    else dist["low (<6)"]++;
  }
  return dist;
}

export function toCandidateRecord(r: AggregatedGeneRecord, score: number): CandidateRecordT {
  const { hpo, orphanet, omim } = r.evidence;
  return {
    symbol: r.symbol,
    name: r.name,
    hgnc_source: r.hgncSource,
    gene_group: r.geneGroups,
    location: r.location,
    confidence_score: score,
    score_band: scoreBand(score),
    evidence: {
      hpo_phenotype_count: hpo.count,
      hpo_top_terms: hpo.detail.slice(0, HPO_TOP_TERMS),
      orphanet_disorder_count: orphanet.count,
      orphanet_disorders: orphanet.detail.slice(0, ORPHANET_TOP_DISORDERS),
      has_omim: omim.present,
      omim_title: omim.present ? omim.label ?? "" : "",
      omim_syndrome_count: omim.count,
    },
    cross_references: { ...r.crossReferences },
  };
}

/**
 * Full recomputation of the derived tier: uncurated genes with a nonzero score,
 * sorted, banded and stamped with provenance.
 */
export function selectCandidates(records: AggregatedGeneRecord[], opts: SelectOptions): CandidateSnapshotT {
  const candidates: CandidateRecordT[] = [];
  for (const r of records) {
    if (r.isCurated) continue;
    const score = scoreRecord(r);
    if (score <= 0) continue;
    candidates.push(toCandidateRecord(r, score));
  }
  candidates.sort(compareCandidates);

  return {
    _provenance: makeProvenance({
      worker: opts.worker,
      now: opts.now,
      canonSources: opts.canonSources,
      nonCanonElements: CANDIDATE_NON_CANON,
      description: "Genes with disease signal not in curated set; candidates for literature review",
      scoring: SCORING_FORMULA,
    }),
    curated_count: records.filter(r => r.isCurated).length,
    expanded_count: records.filter(r => r.inUniverse).length,
    candidate_count: candidates.length,
    score_distribution: scoreDistribution(candidates),
    candidates,
  };
}
