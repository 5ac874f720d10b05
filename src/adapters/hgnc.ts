// src/adapters/hgnc.ts
// HGNC bulk gene set + the expanded gene list built from it.
// Both return [] when the backing file is absent.

import { z } from "zod";
import { HgncCompleteSet, HgncDoc, isApprovedProteinCoding, normalizeHgncDoc } from "../../source_normalization.js";
import { ExpandedArtifact, ExpandedGeneSchema } from "../gaps/schemas.js";
import type { ExpandedGene, HgncGene } from "../gaps/types.js";
import { normalizeSymbol } from "../gaps/types.js";
import { readJsonArtifact } from "./files.js";

// Either the raw complete set, or a list that was already filtered to protein-coding genes
const HgncFile = z.union([HgncCompleteSet, z.array(z.unknown())]);

const HgncRow = ExpandedGeneSchema.omit({ source: true, role: true });

/** Approved protein-coding genes from raw HGNC docs; unparseable docs are skipped. */
export function filterProteinCoding(docs: unknown[]): HgncGene[] {
  const out: HgncGene[] = [];
  for (const raw of docs) {
    const doc = HgncDoc.safeParse(raw);
    if (doc.success && isApprovedProteinCoding(doc.data)) out.push(normalizeHgncDoc(doc.data));
  }
  return out;
}

export class HgncAdapter {
  name = "HGNC" as const;

  async load(file: string): Promise<HgncGene[]> {
    const data = await readJsonArtifact(file, "hgnc", HgncFile);
    if (!data) return [];
    if (!Array.isArray(data)) return filterProteinCoding(data.response.docs);

    const out: HgncGene[] = [];
    let skipped = 0;
    for (const raw of data) {
      const row = HgncRow.safeParse(raw);
      if (row.success) out.push({ ...row.data, symbol: normalizeSymbol(row.data.symbol) });
      else skipped++;
    }
    if (skipped) console.warn(`  [hgnc] Skipped ${skipped} malformed rows`);
    return out;
  }
}

export class ExpandedAdapter {
  name = "expanded" as const;

  async load(file: string): Promise<ExpandedGene[]> {
    const data = await readJsonArtifact(file, "expanded", ExpandedArtifact);
    return (data ?? []).map(g => ({ ...g, symbol: normalizeSymbol(g.symbol) }));
  }
}
