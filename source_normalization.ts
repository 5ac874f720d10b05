// source_normalization.ts
// Source-boundary normalization: every raw per-source shape (HGNC docs, HPO rows,
// Orphanet cache entries, OMIM subset entries, curated coverage flags) is reduced
// here to one tagged SourceEvidence / HgncGene before it reaches the aggregator.

import { z } from 'zod';
import type { CuratedFlags, EvidenceMap, HgncGene, SourceEvidence } from './src/gaps/types.js';
import { emptyEvidence, normalizeSymbol } from './src/gaps/types.js';

/* =========================
 * Zod Schemas (raw)
 * ========================= */

const IdLike = z.union([z.string(), z.number()]);

// One document of the HGNC complete set (response.docs[])
export const HgncDoc = z.object({
  symbol: z.string(),
  name: z.string().optional(),
  hgnc_id: z.string().optional(),
  status: z.string().optional(),
  locus_group: z.string().optional(),
  locus_type: z.string().optional(),
  entrez_id: IdLike.optional(),
  ensembl_gene_id: z.string().optional(),
  uniprot_ids: z.array(z.string()).optional(),
  omim_id: z.array(IdLike).optional(),
  gene_group: z.array(z.string()).optional(),
  location: z.string().optional(),
}).passthrough();

export type HgncDocT = z.infer<typeof HgncDoc>;

export const HgncCompleteSet = z.object({
  response: z.object({ docs: z.array(z.unknown()) }),
});

const NamedItem = z.union([
  z.string(),
  z.object({ name: z.string().optional() }).passthrough(),
]);

// Orphanet cache entries come either as a bare disorder list or wrapped in { disorders }
export const OrphanetEntry = z.union([
  z.array(NamedItem),
  z.object({ disorders: z.array(NamedItem).default([]) }).passthrough(),
]);

export const OmimEntry = z.object({
  title: z.string().optional(),
  syndromes: z.array(NamedItem).optional(),
  inheritance: z.unknown().optional(),
}).passthrough();

export const OmimSubset = z.object({
  genes: z.record(z.unknown()).default({}),
}).passthrough();

/* =========================
 * Utilities
 * ========================= */

function first<T>(a: T[] | undefined): T | undefined {
  return Array.isArray(a) && a.length ? a[0] : undefined;
}

function idString(x: string | number | undefined): string {
  return x === undefined ? '' : String(x);
}

function itemName(item: z.infer<typeof NamedItem>): string {
  if (typeof item === 'string') return item;
  return item.name ?? JSON.stringify(item);
}

/* =========================
 * Normalizers
 * ========================= */

export function normalizeHgncDoc(doc: HgncDocT): HgncGene {
  return {
    symbol: normalizeSymbol(doc.symbol),
    name: doc.name ?? '',
    hgnc_id: doc.hgnc_id ?? '',
    ncbi_id: idString(doc.entrez_id),
    ensembl_id: doc.ensembl_gene_id ?? '',
    uniprot_id: first(doc.uniprot_ids) ?? '',
    omim_id: idString(first(doc.omim_id)),
    locus_type: doc.locus_type ?? '',
    gene_group: doc.gene_group ?? [],
    location: doc.location ?? '',
  };
}

export function isApprovedProteinCoding(doc: HgncDocT): boolean {
  return doc.locus_group === 'protein-coding gene' && doc.status === 'Approved';
}

/**
 * Parse HPO genes_to_phenotype rows: ncbi_gene_id, gene_symbol, hpo_id, hpo_term_name, ...
 * Duplicate terms per gene collapse; detail is sorted.
 */
export function parseHpoAssociations(text: string): EvidenceMap {
  const terms = new Map<string, Set<string>>();
  for (const line of text.split(/\r?\n/)) {
    if (!line || line.startsWith('#')) continue;
    const parts = line.trim().split('\t');
    if (parts.length < 4) continue;
    const sym = normalizeSymbol(parts[1]);
    if (!sym) continue;
    const set = terms.get(sym) ?? new Set<string>();
    set.add(parts[3]);
    terms.set(sym, set);
  }
  const out: EvidenceMap = new Map();
  for (const [sym, set] of terms) {
    const detail = [...set].sort();
    out.set(sym, { source: 'hpo', present: detail.length > 0, count: detail.length, detail });
  }
  return out;
}

export function normalizeOrphanetEntry(entry: z.infer<typeof OrphanetEntry>): SourceEvidence {
  const disorders = Array.isArray(entry) ? entry : entry.disorders;
  const detail = disorders.map(itemName);
  return { source: 'orphanet', present: detail.length > 0, count: detail.length, detail };
}

export function normalizeOmimEntry(entry: z.infer<typeof OmimEntry>): SourceEvidence {
  // An entry with any content counts as a disease entry, even with zero syndromes
  const present = Object.keys(entry).length > 0;
  if (!present) return emptyEvidence('omim');
  const detail = (entry.syndromes ?? []).map(itemName);
  return { source: 'omim', present, count: detail.length, detail, label: entry.title ?? '' };
}

export function normalizeCuratedFlags(flags: CuratedFlags): SourceEvidence {
  const detail = Object.entries(flags).filter(([, v]) => Boolean(v)).map(([k]) => k).sort();
  return { source: 'curated', present: Object.keys(flags).length > 0, count: detail.length, detail };
}
