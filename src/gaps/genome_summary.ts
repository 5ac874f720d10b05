// src/gaps/genome_summary.ts
import type { GenomeWideGeneT, GenomeWideGenesT, GenomeWideSummaryT } from "./schemas.js";
import { makeProvenance } from "./provenance.js";
import type { AggregatedGeneRecord } from "./types.js";

// "has phenotypes" for the uncurated count means more than this many HPO terms
export const PHENOTYPE_COUNT_THRESHOLD = 5;

const GENOME_NON_CANON = ["Cross-reference join logic", "Phenotype count thresholds"];

/** Per-gene join over the whole universe, by symbol. */
export function genomeWideRows(
  records: AggregatedGeneRecord[],
  expandedSources: ReadonlyMap<string, string> = new Map()
): GenomeWideGeneT[] {
  return records
    .map(r => {
      const { hpo, orphanet, omim, curated } = r.evidence;
      return {
        symbol: r.symbol,
        name: r.name,
        ...r.crossReferences,
        location: r.location,
        in_hpo: hpo.count > 0,
        hpo_phenotype_count: hpo.count,
        in_orphanet: orphanet.count > 0,
        orphanet_disorder_count: orphanet.count,
        in_omim: omim.present,
        omim_title: omim.present ? omim.label ?? "" : "",
        omim_syndrome_count: omim.count,
        in_curated: r.isCurated,
        curated_source_count: r.isCurated ? curated.count : 0,
        expanded_source: expandedSources.get(r.symbol) ?? "",
      };
    })
    .sort((a, b) => (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0));
}

export function genomeWideGenes(rows: GenomeWideGeneT[], opts: { worker: string; now: Date }): GenomeWideGenesT {
  return {
    _provenance: makeProvenance({ worker: opts.worker, now: opts.now, nonCanonElements: GENOME_NON_CANON }),
    gene_count: rows.length,
    genes: rows,
  };
}

export function summarizeGenomeWide(
  rows: GenomeWideGeneT[],
  opts: { worker: string; now: Date }
): GenomeWideSummaryT {
  const count = (pred: (r: GenomeWideGeneT) => boolean) => rows.filter(pred).length;
  return {
    total_genes: rows.length,
    in_hpo: count(r => r.in_hpo),
    in_orphanet: count(r => r.in_orphanet),
    in_omim: count(r => r.in_omim),
    in_curated: count(r => r.in_curated),
    with_phenotypes_and_no_curated: count(r => r.hpo_phenotype_count > PHENOTYPE_COUNT_THRESHOLD && !r.in_curated),
    disease_genes_not_curated: count(r => r.in_omim && !r.in_curated),
    _provenance: makeProvenance({ worker: opts.worker, now: opts.now, nonCanonElements: GENOME_NON_CANON }),
  };
}
