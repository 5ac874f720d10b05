// src/gaps/types.ts

export type GeneSymbol = string;

export type EvidenceSource = "hpo" | "orphanet" | "omim" | "curated";

export const EVIDENCE_SOURCES: readonly EvidenceSource[] = ["hpo", "orphanet", "omim", "curated"];

/** One (gene, source) pair, reduced to a count / presence signal. */
export interface SourceEvidence {
  source: EvidenceSource;
  present: boolean;
  count: number;
  detail: string[];
  label?: string;
}

export type EvidenceMap = Map<GeneSymbol, SourceEvidence>;

export interface CrossReferences {
  ncbi_id: string;
  uniprot_id: string;
  omim_id: string;
  ensembl_id: string;
}

export interface HgncGene extends CrossReferences {
  symbol: GeneSymbol;
  name: string;
  hgnc_id: string;
  locus_type: string;
  gene_group: string[];
  location: string;
}

/**
 * `source` is "curated", "group:<name>" or "name:<term>". `role` is the
 * developmental role derived from it; empty for curated genes.
 */
export interface ExpandedGene extends HgncGene {
  source: string;
  role: string;
}

/** Coverage flags plus whatever metadata the curated pipeline attaches (lists, nested objects). */
export type CuratedFlags = Record<string, unknown>;

export type CuratedSources = Record<GeneSymbol, CuratedFlags>;

export interface AggregatedGeneRecord {
  symbol: GeneSymbol;
  name: string;
  hgncSource: string;
  geneGroups: string[];
  location: string;
  crossReferences: CrossReferences;
  evidence: Record<EvidenceSource, SourceEvidence>;
  contributingSources: EvidenceSource[];
  isCurated: boolean;
  isExpandedOnly: boolean;
  /** false for the placeholder of a curated gene the universe lacks */
  inUniverse: boolean;
}

export interface EvidenceCounts {
  hpoTermCount: number;
  rareDiseaseCount: number;
  hasDiseaseEntry: boolean;
  diseaseEntrySyndromeCount: number;
}

export type ScoreBand = "high" | "medium" | "low";

export function emptyEvidence(source: EvidenceSource): SourceEvidence {
  return { source, present: false, count: 0, detail: [] };
}

export function normalizeSymbol(raw: string): GeneSymbol {
  return raw.trim().toUpperCase();
}
