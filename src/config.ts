// src/config.ts
// Environment-driven settings for the API server and the batch pipeline.
// Relative paths resolve against the working directory.

import path from "node:path";
import { z } from "zod";

const intFrom = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  PORT: intFrom(5000, 1),
  HOST: z.string().min(1).default("0.0.0.0"),
  SERVICE_NAME: z.string().min(1).default("gene-gap-atlas"),
  CURATED_ROOT: z.string().min(1).default("../curated"),
  EXPANDED_DIR: z.string().min(1).default("./expanded"),
  DERIVED_DIR: z.string().min(1).default("./derived"),
  EXPANSION_RULES_PATH: z.string().min(1).default("./data/expansion_rules.json"),
  EMAIL: z.string().min(1).default("student@example.edu"),
  USER_AGENT: z.string().min(1).optional(),
  ENRICH_TOP: intFrom(20, 1),
  ENRICH_DELAY_MS: intFrom(400),
  ENRICH_RETRIES: intFrom(3, 1),
  ENRICH_BACKOFF_MS: intFrom(1000),
  ENRICH_TIMEOUT_MS: intFrom(15_000, 1),
  ENRICH_PUBMED_CONTEXT: z.string().min(1).default('(craniofacial OR "neural crest")'),
});

export interface ArtifactPaths {
  curatedSources: string;
  curatedGaps: string;
  hgncBulk: string;
  hpo: string;
  orphanet: string;
  omim: string;
  expanded: string;
  derivedDir: string;
  genomeWide: string;
  genomeWideGenes: string;
  candidates: string;
  enrichment: string;
  pipelineStatus: string;
  expansionRules: string;
}

export interface EnrichmentSettings {
  top: number;
  delayMs: number;
  retries: number;
  backoffMs: number;
  timeoutMs: number;
  pubmedContext: string;
  userAgent: string;
  email: string;
}

export interface AppConfig {
  port: number;
  host: string;
  serviceName: string;
  paths: ArtifactPaths;
  enrichment: EnrichmentSettings;
}

export function artifactPaths(curatedRoot: string, expandedDir: string, derivedDir: string, rulesPath: string, cwd = process.cwd()): ArtifactPaths {
  const curated = path.resolve(cwd, curatedRoot);
  const expanded = path.resolve(cwd, expandedDir);
  const derived = path.resolve(cwd, derivedDir);
  return {
    curatedSources: path.join(curated, "output", "sources.json"),
    curatedGaps: path.join(curated, "output", "gap_report.json"),
    hgncBulk: path.join(curated, "data", "hgnc", "hgnc_protein_coding.json"),
    hpo: path.join(curated, "data", "hpo", "genes_to_phenotype.txt"),
    orphanet: path.join(curated, "data", "orphanet", "orphanet_cache.json"),
    omim: path.join(curated, "data", "omim", "omim_subset.json"),
    expanded: path.join(expanded, "hgnc_expanded.json"),
    derivedDir: derived,
    genomeWide: path.join(derived, "genome_wide_summary.json"),
    genomeWideGenes: path.join(derived, "genome_wide_genes.json"),
    candidates: path.join(derived, "gap_candidates.json"),
    enrichment: path.join(derived, "candidate_enrichment.json"),
    pipelineStatus: path.join(derived, "pipeline_status.json"),
    expansionRules: path.resolve(cwd, rulesPath),
  };
}

/** Parse settings from an environment object; throws a ZodError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    port: e.PORT,
    host: e.HOST,
    serviceName: e.SERVICE_NAME,
    paths: artifactPaths(e.CURATED_ROOT, e.EXPANDED_DIR, e.DERIVED_DIR, e.EXPANSION_RULES_PATH, cwd),
    enrichment: {
      top: e.ENRICH_TOP,
      delayMs: e.ENRICH_DELAY_MS,
      retries: e.ENRICH_RETRIES,
      backoffMs: e.ENRICH_BACKOFF_MS,
      timeoutMs: e.ENRICH_TIMEOUT_MS,
      pubmedContext: e.ENRICH_PUBMED_CONTEXT,
      userAgent: e.USER_AGENT ?? `${e.SERVICE_NAME}/0.1 (${e.EMAIL})`,
      email: e.EMAIL,
    },
  };
}
