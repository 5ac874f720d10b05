// src/gaps/provenance.ts
import type { ProvenanceBlockT } from "./schemas.js";

export const CANON_SOURCES = ["HGNC", "HPO", "Orphanet", "OMIM"];

export function makeProvenance(opts: {
  worker: string;
  now: Date;
  canonSources?: string[];
  nonCanonElements: string[];
  description?: string;
  scoring?: { version: string; formula: string };
}): ProvenanceBlockT {
  return {
    worker: opts.worker,
    generated: opts.now.toISOString(),
    canon_purity: "derived",
    canon_sources: opts.canonSources ?? CANON_SOURCES,
    non_canon_elements: opts.nonCanonElements,
    ...(opts.description ? { description: opts.description } : {}),
    ...(opts.scoring ? { scoring: { version: opts.scoring.version, formula: opts.scoring.formula } } : {}),
  };
}
