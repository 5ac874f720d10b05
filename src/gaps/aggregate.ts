// src/gaps/aggregate.ts
import type {
  AggregatedGeneRecord, CuratedSources, EvidenceMap, EvidenceSource, HgncGene, SourceEvidence,
} from "./types.js";
import { EVIDENCE_SOURCES, emptyEvidence, normalizeSymbol } from "./types.js";

export const DEFAULT_EXCLUDE_SOURCE_PATTERNS = ["Zinc fingers C2H2"];

export type UniverseGene = HgncGene & { source?: string };

export interface AggregateInput {
  /** Base gene universe (the expanded list, or the full HGNC set for genome-wide runs). */
  universe: UniverseGene[];
  curated: CuratedSources;
  evidence: Partial<Record<EvidenceSource, EvidenceMap>>;
  /** Universe members whose source tag contains one of these are dropped unless curated. */
  excludeSourcePatterns?: string[];
  /** Add a minimal record for curated genes the universe lacks (default true). */
  includeCuratedOutsideUniverse?: boolean;
}

function rekey(map: EvidenceMap | undefined): EvidenceMap {
  const out: EvidenceMap = new Map();
  if (!map) return out;
  for (const [sym, ev] of map) out.set(normalizeSymbol(sym), ev);
  return out;
}

export function isExcludedSource(source: string | undefined, patterns: string[]): boolean {
  const s = source ?? "";
  return patterns.some(p => s.includes(p));
}

function placeholderGene(symbol: string): UniverseGene {
  return {
    symbol, name: "", hgnc_id: "", ncbi_id: "", ensembl_id: "", uniprot_id: "", omim_id: "",
    locus_type: "", gene_group: [], location: "", source: "curated",
  };
}

/**
 * Join per-source evidence onto the gene universe: one record per normalized symbol.
 * Curated genes are always present and always flagged curated, whether or not the
 * universe lists them.
 */
export function aggregateGenes(input: AggregateInput): AggregatedGeneRecord[] {
  const patterns = input.excludeSourcePatterns ?? DEFAULT_EXCLUDE_SOURCE_PATTERNS;
  const curatedSymbols = new Set(Object.keys(input.curated).map(normalizeSymbol));
  const maps = new Map<EvidenceSource, EvidenceMap>(
    EVIDENCE_SOURCES.map(src => [src, rekey(input.evidence[src])])
  );

  const genes = new Map<string, UniverseGene>();
  for (const g of input.universe) {
    const symbol = normalizeSymbol(g.symbol);
    if (!symbol || genes.has(symbol)) continue;
    const curated = curatedSymbols.has(symbol);
    if (!curated && isExcludedSource(g.source, patterns)) continue;
    genes.set(symbol, { ...g, symbol });
  }
  const fromUniverse = new Set(genes.keys());
  if (input.includeCuratedOutsideUniverse ?? true) {
    for (const symbol of [...curatedSymbols].sort()) {
      if (!genes.has(symbol)) genes.set(symbol, placeholderGene(symbol));
    }
  }

  const records: AggregatedGeneRecord[] = [];
  for (const [symbol, g] of genes) {
    const pick = (src: EvidenceSource): SourceEvidence => maps.get(src)?.get(symbol) ?? emptyEvidence(src);
    const evidence: Record<EvidenceSource, SourceEvidence> = {
      hpo: pick("hpo"),
      orphanet: pick("orphanet"),
      omim: pick("omim"),
      curated: pick("curated"),
    };
    const isCurated = curatedSymbols.has(symbol);
    records.push({
      symbol,
      name: g.name,
      hgncSource: isCurated ? "curated" : g.source ?? "",
      geneGroups: g.gene_group,
      location: g.location,
      crossReferences: {
        ncbi_id: g.ncbi_id,
        uniprot_id: g.uniprot_id,
        omim_id: g.omim_id,
        ensembl_id: g.ensembl_id,
      },
      evidence,
      contributingSources: EVIDENCE_SOURCES.filter(src => evidence[src].present),
      isCurated,
      isExpandedOnly: !isCurated,
      inUniverse: fromUniverse.has(symbol),
    });
  }
  return records;
}
