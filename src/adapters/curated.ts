// src/adapters/curated.ts
// Curated reference set: symbol -> per-source coverage flags from the curated pipeline.

import { normalizeCuratedFlags } from "../../source_normalization.js";
import { CuratedSourcesArtifact } from "../gaps/schemas.js";
import type { CuratedSources, EvidenceMap } from "../gaps/types.js";
import { normalizeSymbol } from "../gaps/types.js";
import { readJsonArtifact } from "./files.js";

export interface CuratedSet {
  sources: CuratedSources;
  symbols: Set<string>;
  evidence: EvidenceMap;
}

export function buildCuratedSet(raw: CuratedSources): CuratedSet {
  const sources: CuratedSources = {};
  const evidence: EvidenceMap = new Map();
  for (const [sym, flags] of Object.entries(raw)) {
    const key = normalizeSymbol(sym);
    sources[key] = flags;
    evidence.set(key, normalizeCuratedFlags(flags));
  }
  return { sources, symbols: new Set(Object.keys(sources)), evidence };
}

export class CuratedAdapter {
  name = "curated" as const;

  async load(file: string): Promise<CuratedSet> {
    const raw = await readJsonArtifact(file, "curated", CuratedSourcesArtifact);
    return buildCuratedSet(raw ?? {});
  }
}
