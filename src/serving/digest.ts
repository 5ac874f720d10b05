// src/serving/digest.ts
// Weekly markdown digest: what each tier holds, curated source coverage, and the
// strongest gap candidates. Built from the loaded snapshot only.

import { coverageSummary } from "./coverage.js";
import type { ServedSnapshot } from "./snapshot.js";

export const DIGEST_TOP_CANDIDATES = 10;

export function digestDate(now: Date): string {
  return now.toISOString().slice(0, 10);
}

function tierLines(s: ServedSnapshot): string[] {
  const curated = Object.keys(s.curated).length;
  const lines = [
    curated ? `- Curated: ${curated} genes` : "- Curated: not loaded",
    s.expanded.length ? `- Expanded: ${s.expanded.length} genes` : "- Expanded: not available",
  ];

  const g = s.genomeWide;
  lines.push(g
    ? `- Genome-wide: ${g.total_genes} genes, ${g.disease_genes_not_curated} disease genes not curated`
    : "- Genome-wide: not available");

  const c = s.candidates;
  if (c) {
    const d = c.score_distribution;
    lines.push(`- Derived: ${c.candidate_count} gap candidates (high ${d["high (12+)"]}, medium ${d["medium (6-11.9)"]}, low ${d["low (<6)"]})`);
  } else {
    lines.push("- Derived: not available");
  }
  return lines;
}

export function buildDigest(s: ServedSnapshot, serviceName: string, now: Date): string {
  const out = [`## ${serviceName} Digest (${digestDate(now)})`, "", "### Tiers", ...tierLines(s)];

  const coverage = coverageSummary(s.curated);
  if (coverage) {
    out.push("", "### Source Coverage", "| Source | Genes | Coverage |", "|---|---|---|");
    for (const [src, c] of Object.entries(coverage.sources)) {
      out.push(`| ${src} | ${c.count}/${c.total} | ${c.percent.toFixed(1)}% |`);
    }
  }

  const top = s.candidates?.candidates.slice(0, DIGEST_TOP_CANDIDATES) ?? [];
  if (top.length) {
    out.push("", "### Top Gap Candidates", "| Gene | Score | HPO | Orphanet | OMIM |", "|---|---|---|---|---|");
    for (const c of top) {
      const e = c.evidence;
      out.push(`| ${c.symbol} | ${c.confidence_score.toFixed(1)} | ${e.hpo_phenotype_count} | ${e.orphanet_disorder_count} | ${e.has_omim ? "yes" : "no"} |`);
    }
  }

  return out.join("\n") + "\n";
}
