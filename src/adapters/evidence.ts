// src/adapters/evidence.ts
// Per-source evidence adapters (HPO flat file, Orphanet cache, OMIM subset).
// Each returns an empty map when its file is missing or unusable.

import { z } from "zod";
import {
  OmimEntry,
  OmimSubset,
  OrphanetEntry,
  normalizeOmimEntry,
  normalizeOrphanetEntry,
  parseHpoAssociations,
} from "../../source_normalization.js";
import type { EvidenceMap, SourceEvidence } from "../gaps/types.js";
import { normalizeSymbol } from "../gaps/types.js";
import { readJsonArtifact, readTextArtifact } from "./files.js";

function collect<S extends z.ZodTypeAny>(
  label: string,
  entries: Record<string, unknown>,
  schema: S,
  normalize: (entry: z.output<S>) => SourceEvidence
): EvidenceMap {
  const out: EvidenceMap = new Map();
  let skipped = 0;
  for (const [sym, raw] of Object.entries(entries)) {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    out.set(normalizeSymbol(sym), normalize(parsed.data));
  }
  if (skipped) console.warn(`  [${label}] Skipped ${skipped} malformed entries`);
  return out;
}

export class HpoAdapter {
  name = "HPO" as const;

  async load(file: string): Promise<EvidenceMap> {
    const text = await readTextArtifact(file, "hpo");
    return text === null ? new Map() : parseHpoAssociations(text);
  }
}

export class OrphanetAdapter {
  name = "Orphanet" as const;

  async load(file: string): Promise<EvidenceMap> {
    const cache = await readJsonArtifact(file, "orphanet", z.record(z.unknown()));
    return cache ? collect("orphanet", cache, OrphanetEntry, normalizeOrphanetEntry) : new Map();
  }
}

export class OmimAdapter {
  name = "OMIM" as const;

  async load(file: string): Promise<EvidenceMap> {
    const subset = await readJsonArtifact(file, "omim", OmimSubset);
    return subset ? collect("omim", subset.genes, OmimEntry, normalizeOmimEntry) : new Map();
  }
}
