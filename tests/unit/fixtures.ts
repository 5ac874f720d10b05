// Shared builders for unit tests.
import { mkdtemp, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { makeProvenance } from "../../src/gaps/provenance.js";
import type { CandidateRecordT, CandidateSnapshotT } from "../../src/gaps/schemas.js";
import { scoreDistribution } from "../../src/gaps/select_candidates.js";
import { scoreBand } from "../../src/gaps/scoring.js";
import type { EvidenceSource, ExpandedGene, SourceEvidence } from "../../src/gaps/types.js";
import { deepFreeze, type ServedSnapshot } from "../../src/serving/snapshot.js";
import type { QueryContext } from "../../src/serving/results.js";

export const FIXED_NOW = new Date("2026-03-02T10:00:00.000Z");

export function gene(symbol: string, extra: Partial<ExpandedGene> = {}): ExpandedGene {
  return {
    symbol,
    name: "",
    hgnc_id: "",
    ncbi_id: "",
    ensembl_id: "",
    uniprot_id: "",
    omim_id: "",
    locus_type: "gene with protein product",
    gene_group: [],
    location: "",
    source: "",
    role: "",
    ...extra,
  };
}

export function ev(source: EvidenceSource, count: number, extra: Partial<SourceEvidence> = {}): SourceEvidence {
  const detail = Array.from({ length: count }, (_, i) => `${source} item ${i + 1}`);
  return { source, present: count > 0, count, detail, ...extra };
}

export function candidate(symbol: string, score: number, extra: Partial<CandidateRecordT> = {}): CandidateRecordT {
  return {
    symbol,
    name: `${symbol} protein`,
    hgnc_source: "group:Forkhead boxes",
    gene_group: ["Forkhead boxes"],
    location: "6p25.3",
    confidence_score: score,
    score_band: scoreBand(score),
    evidence: {
      hpo_phenotype_count: 0,
      hpo_top_terms: [],
      orphanet_disorder_count: 0,
      orphanet_disorders: [],
      has_omim: false,
      omim_title: "",
      omim_syndrome_count: 0,
    },
    cross_references: { ncbi_id: "", uniprot_id: "", omim_id: "", ensembl_id: "" },
    ...extra,
  };
}

export function candidateSnapshot(candidates: CandidateRecordT[]): CandidateSnapshotT {
  return {
    _provenance: makeProvenance({ worker: "test", now: FIXED_NOW, nonCanonElements: ["Confidence scoring formula"] }),
    curated_count: 0,
    expanded_count: candidates.length,
    candidate_count: candidates.length,
    score_distribution: scoreDistribution(candidates),
    candidates,
  };
}

export function snapshot(partial: Partial<ServedSnapshot> = {}): ServedSnapshot {
  return deepFreeze({
    curated: {},
    curatedGaps: null,
    expanded: [],
    genomeWide: null,
    candidates: null,
    enrichment: null,
    provenance: [],
    loadedAt: FIXED_NOW.toISOString(),
    ...partial,
  });
}

export function context(s: ServedSnapshot): QueryContext {
  return { snapshot: s, serviceName: "gene-gap-atlas", now: () => FIXED_NOW };
}

export async function tmpDir(prefix: string): Promise<string> {
  return mkdtemp(path.join(tmpdir(), `${prefix}-`));
}

export async function writeJson(file: string, value: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, JSON.stringify(value), "utf8");
}

export async function writeText(file: string, text: string): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, text, "utf8");
}
