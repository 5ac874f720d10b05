// src/gaps/schemas.ts
// Shapes of the artifacts the batch stage writes and the API serves.

import { z } from 'zod';

/* =========================
 * Provenance
 * ========================= */

export const ProvenanceBlock = z.object({
  worker: z.string(),
  generated: z.string(),              // ISO-8601, UTC
  canon_purity: z.string(),           // 'derived' for everything this repo writes
  canon_sources: z.array(z.string()),
  non_canon_elements: z.array(z.string()),
  description: z.string().optional(),
  scoring: z.object({ version: z.string(), formula: z.string() }).optional(),
}).passthrough();

export type ProvenanceBlockT = z.infer<typeof ProvenanceBlock>;

/* =========================
 * Tier 1 / 2 inputs
 * ========================= */

// Values are only ever tested for truthiness, so metadata fields of any shape pass
export const CuratedSourcesArtifact = z.record(z.record(z.unknown()));

export const CrossReferencesSchema = z.object({
  ncbi_id: z.string().default(''),
  uniprot_id: z.string().default(''),
  omim_id: z.string().default(''),
  ensembl_id: z.string().default(''),
});

export const ExpandedGeneSchema = z.object({
  symbol: z.string().min(1),
  name: z.string().default(''),
  hgnc_id: z.string().default(''),
  ncbi_id: z.string().default(''),
  ensembl_id: z.string().default(''),
  uniprot_id: z.string().default(''),
  omim_id: z.string().default(''),
  locus_type: z.string().default(''),
  gene_group: z.array(z.string()).default([]),
  location: z.string().default(''),
  source: z.string().default(''),
  role: z.string().default(''),
});

export const ExpandedArtifact = z.array(ExpandedGeneSchema);

/* =========================
 * Tier 3: genome-wide
 * ========================= */

export const GenomeWideSummary = z.object({
  total_genes: z.number().int().nonnegative(),
  in_hpo: z.number().int().nonnegative(),
  in_orphanet: z.number().int().nonnegative(),
  in_omim: z.number().int().nonnegative(),
  in_curated: z.number().int().nonnegative(),
  with_phenotypes_and_no_curated: z.number().int().nonnegative(),
  disease_genes_not_curated: z.number().int().nonnegative(),
  _provenance: ProvenanceBlock.optional(),
}).passthrough();

export type GenomeWideSummaryT = z.infer<typeof GenomeWideSummary>;

// One row per HGNC protein-coding gene; the summary above is counted from these
export const GenomeWideGene = z.object({
  symbol: z.string(),
  name: z.string(),
  ncbi_id: z.string(),
  uniprot_id: z.string(),
  ensembl_id: z.string(),
  omim_id: z.string(),
  location: z.string(),
  in_hpo: z.boolean(),
  hpo_phenotype_count: z.number().int().nonnegative(),
  in_orphanet: z.boolean(),
  orphanet_disorder_count: z.number().int().nonnegative(),
  in_omim: z.boolean(),
  omim_title: z.string(),
  omim_syndrome_count: z.number().int().nonnegative(),
  in_curated: z.boolean(),
  curated_source_count: z.number().int().nonnegative(),
  expanded_source: z.string(),             // tag from the expanded list, '' when not expanded
});

export type GenomeWideGeneT = z.infer<typeof GenomeWideGene>;

export const GenomeWideGenes = z.object({
  _provenance: ProvenanceBlock,
  gene_count: z.number().int().nonnegative(),
  genes: z.array(GenomeWideGene),
});

export type GenomeWideGenesT = z.infer<typeof GenomeWideGenes>;

/* =========================
 * Tier 4: derived candidates
 * ========================= */

export const ScoreBandSchema = z.enum(['high', 'medium', 'low']);

export const CandidateRecord = z.object({
  symbol: z.string(),
  name: z.string(),
  hgnc_source: z.string(),
  gene_group: z.array(z.string()),
  location: z.string(),
  confidence_score: z.number().nonnegative(),
  score_band: ScoreBandSchema,
  evidence: z.object({
    hpo_phenotype_count: z.number().int().nonnegative(),
    hpo_top_terms: z.array(z.string()),
    orphanet_disorder_count: z.number().int().nonnegative(),
    orphanet_disorders: z.array(z.string()),
    has_omim: z.boolean(),
    omim_title: z.string(),
    omim_syndrome_count: z.number().int().nonnegative(),
  }),
  cross_references: CrossReferencesSchema,
});

export type CandidateRecordT = z.infer<typeof CandidateRecord>;

export const ScoreDistribution = z.object({
  'high (12+)': z.number().int().nonnegative(),
  'medium (6-11.9)': z.number().int().nonnegative(),
  'low (<6)': z.number().int().nonnegative(),
});

export type ScoreDistributionT = z.infer<typeof ScoreDistribution>;

export const CandidateSnapshot = z.object({
  _provenance: ProvenanceBlock,
  curated_count: z.number().int().nonnegative(),
  expanded_count: z.number().int().nonnegative(),
  candidate_count: z.number().int().nonnegative(),
  score_distribution: ScoreDistribution,
  candidates: z.array(CandidateRecord),
});

export type CandidateSnapshotT = z.infer<typeof CandidateSnapshot>;

/* =========================
 * Enrichment + pipeline status
 * ========================= */

export const EnrichedCandidate = z.object({
  symbol: z.string(),
  confidence_score: z.number(),
  ncbi_id: z.string(),
  uniprot_id: z.string(),
  gene_summary: z.string(),
  pubmed_context_count: z.number().int().nonnegative(),
  uniprot_function: z.string(),
  hpo_phenotype_count: z.number().int().nonnegative(),
  orphanet_disorder_count: z.number().int().nonnegative(),
  hgnc_source: z.string(),
});

export type EnrichedCandidateT = z.infer<typeof EnrichedCandidate>;

export const EnrichmentSnapshot = z.object({
  enriched_count: z.number().int().nonnegative(),
  candidates: z.array(EnrichedCandidate),
  errors: z.array(z.object({ symbol: z.string(), call: z.string() })),
  _provenance: ProvenanceBlock,
});

export type EnrichmentSnapshotT = z.infer<typeof EnrichmentSnapshot>;

export const PhaseOutcome = z.enum(['ok', 'failed', 'skipped']);

export type PhaseOutcomeT = z.infer<typeof PhaseOutcome>;

export const PipelineStatus = z.object({
  last_run: z.string(),
  duration_seconds: z.number().nonnegative(),
  phases: z.record(PhaseOutcome),
  files: z.record(z.number().int().nonnegative()),
});

export type PipelineStatusT = z.infer<typeof PipelineStatus>;
