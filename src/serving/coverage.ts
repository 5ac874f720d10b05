// src/serving/coverage.ts
import { round1 } from "../gaps/scoring.js";
import type { CuratedFlags, CuratedSources } from "../gaps/types.js";

// Coverage flags written by the curated pipeline, as `in_<key>`
export const COVERAGE_SOURCES = [
  "go", "omim", "hpo", "uniprot", "facebase", "clinvar",
  "pubmed", "gnomad", "nih_reporter", "gtex", "clinicaltrials",
  "string", "orphanet", "opentargets", "models", "structures",
] as const;

export type CoverageSource = (typeof COVERAGE_SOURCES)[number];

export interface SourceCoverage {
  count: number;
  total: number;
  percent: number;
}

export interface CoverageSummary {
  total_genes: number;
  sources: Record<string, SourceCoverage>;
}

export interface CoverageMatrix {
  sources: CoverageSource[];
  genes: string[];
  matrix: Record<string, Record<string, boolean>>;
}

export function hasFlag(flags: CuratedFlags, src: CoverageSource): boolean {
  return Boolean(flags[`in_${src}`]);
}

function perSource<V>(fn: (src: CoverageSource) => V): Record<string, V> {
  return Object.fromEntries(COVERAGE_SOURCES.map(src => [src, fn(src)]));
}

/** Per-source gene counts over the curated set; null when nothing is curated. */
export function coverageSummary(curated: Readonly<CuratedSources>): CoverageSummary | null {
  const genes = Object.values(curated);
  const total = genes.length;
  if (!total) return null;
  return {
    total_genes: total,
    sources: perSource(src => {
      const count = genes.filter(flags => hasFlag(flags, src)).length;
      return { count, total, percent: round1((100 * count) / total) };
    }),
  };
}

export function coverageMatrix(curated: Readonly<CuratedSources>): CoverageMatrix {
  const genes = Object.keys(curated).sort();
  const matrix: CoverageMatrix["matrix"] = {};
  for (const [sym, flags] of Object.entries(curated)) matrix[sym] = perSource(src => hasFlag(flags, src));
  return { sources: [...COVERAGE_SOURCES], genes, matrix };
}
