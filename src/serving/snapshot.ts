// src/serving/snapshot.ts
// Everything the API serves, read once at startup. Each artifact loads on its own;
// a missing or malformed one leaves its tier empty and the rest still serve.
// The snapshot is frozen: there is no mutation path while requests run.

import { readdir } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { readJsonArtifact } from "../adapters/files.js";
import type { ArtifactPaths } from "../config.js";
import { DEFAULT_EXCLUDE_SOURCE_PATTERNS, isExcludedSource } from "../gaps/aggregate.js";
import {
  CandidateSnapshot,
  CuratedSourcesArtifact,
  EnrichmentSnapshot,
  ExpandedArtifact,
  GenomeWideSummary,
  ProvenanceBlock,
  type CandidateSnapshotT,
  type EnrichmentSnapshotT,
  type GenomeWideSummaryT,
  type ProvenanceBlockT,
} from "../gaps/schemas.js";
import type { CuratedSources, ExpandedGene } from "../gaps/types.js";
import { normalizeSymbol } from "../gaps/types.js";

const GapReport = z.union([z.record(z.unknown()), z.array(z.unknown())]);
const WithProvenance = z.object({ _provenance: ProvenanceBlock }).passthrough();

export interface DerivationRecord {
  file: string;
  provenance: ProvenanceBlockT;
}

export interface ServedSnapshot {
  readonly curated: Readonly<CuratedSources>;
  readonly curatedGaps: unknown;
  readonly expanded: readonly ExpandedGene[];
  readonly genomeWide: GenomeWideSummaryT | null;
  readonly candidates: CandidateSnapshotT | null;
  readonly enrichment: EnrichmentSnapshotT | null;
  readonly provenance: readonly DerivationRecord[];
  readonly loadedAt: string;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

function isEmptyReport(report: z.infer<typeof GapReport>): boolean {
  return Array.isArray(report) ? report.length === 0 : Object.keys(report).length === 0;
}

/** `_provenance` blocks of every JSON file in the derived directory, by file name. */
export async function collectProvenance(derivedDir: string): Promise<DerivationRecord[]> {
  let names: string[];
  try {
    names = (await readdir(derivedDir)).filter(n => n.endsWith(".json")).sort();
  } catch (err) {
    console.log(`  [provenance] No derived directory at ${derivedDir}: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }

  const out: DerivationRecord[] = [];
  for (const name of names) {
    const data = await readJsonArtifact(path.join(derivedDir, name), "provenance", z.unknown());
    const parsed = WithProvenance.safeParse(data);
    if (parsed.success) out.push({ file: name, provenance: parsed.data._provenance });
  }
  return out;
}

export async function loadServedSnapshot(
  paths: ArtifactPaths,
  opts: { now?: () => Date; excludeSourcePatterns?: string[] } = {}
): Promise<ServedSnapshot> {
  const now = opts.now ?? (() => new Date());
  const exclude = opts.excludeSourcePatterns ?? DEFAULT_EXCLUDE_SOURCE_PATTERNS;
  console.log("[api] Loading data tiers...");

  const [curatedRaw, gaps, expandedRaw, genomeWide, candidates, enrichment, provenance] = await Promise.all([
    readJsonArtifact(paths.curatedSources, "curated", CuratedSourcesArtifact),
    readJsonArtifact(paths.curatedGaps, "gaps", GapReport),
    readJsonArtifact(paths.expanded, "expanded", ExpandedArtifact),
    readJsonArtifact(paths.genomeWide, "genome", GenomeWideSummary),
    readJsonArtifact(paths.candidates, "derived", CandidateSnapshot),
    readJsonArtifact(paths.enrichment, "enrichment", EnrichmentSnapshot),
    collectProvenance(paths.derivedDir),
  ]);

  const curated: CuratedSources = {};
  for (const [sym, flags] of Object.entries(curatedRaw ?? {})) curated[normalizeSymbol(sym)] = flags;

  const expanded = (expandedRaw ?? [])
    .filter(g => !isExcludedSource(g.source, exclude))
    .map(g => ({ ...g, symbol: normalizeSymbol(g.symbol) }));
  if (expandedRaw) console.log(`  [expanded] After ZNF filter: ${expanded.length} genes`);

  const snapshot: ServedSnapshot = {
    curated,
    curatedGaps: gaps && !isEmptyReport(gaps) ? gaps : null,
    expanded,
    genomeWide,
    candidates,
    enrichment,
    provenance,
    loadedAt: now().toISOString(),
  };

  const ready = Object.entries(tierAvailability(snapshot))
    .filter(([, t]) => t.available)
    .map(([name]) => name);
  console.log(`  Ready: ${ready.join(", ") || "no data loaded"}`);
  return deepFreeze(snapshot);
}

export function tierAvailability(s: ServedSnapshot) {
  const curatedCount = Object.keys(s.curated).length;
  return {
    curated: { available: curatedCount > 0, genes: curatedCount },
    expanded: { available: s.expanded.length > 0, genes: s.expanded.length },
    genome: { available: s.genomeWide !== null, summary: s.genomeWide },
    derived: {
      available: s.candidates !== null,
      candidates: s.candidates?.candidate_count ?? 0,
      generated: s.candidates?._provenance.generated ?? null,
    },
    enrichment: { available: s.enrichment !== null, enriched: s.enrichment?.enriched_count ?? 0 },
  };
}
