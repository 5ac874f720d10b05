// src/integrations/run_derivation_stage.ts
// Offline derivation pass, in phases:
// 1) expand: HGNC bulk set -> expanded gene list
// 2) genome: HGNC universe x all evidence -> per-gene rows + genome-wide summary
// 3) candidates: expanded universe x evidence -> scored gap candidates
// 4) status: pipeline_status.json
// A failed phase is logged and recorded; later phases still run. Each artifact is
// written only once it is complete, so a failure leaves the previous one in place.

import { stat } from "node:fs/promises";
import { CuratedAdapter, type CuratedSet } from "../adapters/curated.js";
import { HpoAdapter, OmimAdapter, OrphanetAdapter } from "../adapters/evidence.js";
import { ExpandedAdapter, HgncAdapter } from "../adapters/hgnc.js";
import type { ArtifactPaths } from "../config.js";
import { aggregateGenes } from "../gaps/aggregate.js";
import { expansionStats, loadExpansionRules, roleStats, selectExpandedGenes } from "../gaps/expansion.js";
import { genomeWideGenes, genomeWideRows, summarizeGenomeWide } from "../gaps/genome_summary.js";
import type { PhaseOutcomeT, PipelineStatusT } from "../gaps/schemas.js";
import { selectCandidates } from "../gaps/select_candidates.js";
import type { EvidenceMap, EvidenceSource, HgncGene } from "../gaps/types.js";
import { writeArtifactAtomic } from "./snapshot_writer.js";

export const PHASES = ["expand", "genome", "candidates"] as const;
export type PhaseName = (typeof PHASES)[number];

export const WORKER = "gene-gap-atlas derive";

export type TimedFn = <T>(phase: string, fn: () => Promise<T>) => Promise<T>;

export const timedPhase: TimedFn = async (phase, fn) => {
  const t0 = Date.now();
  console.log(`[derive] === Phase ${phase} ===`);
  try {
    return await fn();
  } finally {
    console.log(`[derive] === Phase ${phase} done (${((Date.now() - t0) / 1000).toFixed(1)}s) ===`);
  }
};

export interface SourceInputs {
  hgnc: HgncGene[];
  curated: CuratedSet;
  evidence: Partial<Record<EvidenceSource, EvidenceMap>>;
}

export async function loadSourceInputs(paths: ArtifactPaths): Promise<SourceInputs> {
  console.log("[derive] Loading sources...");
  const [hgnc, curated, hpo, orphanet, omim] = await Promise.all([
    new HgncAdapter().load(paths.hgncBulk),
    new CuratedAdapter().load(paths.curatedSources),
    new HpoAdapter().load(paths.hpo),
    new OrphanetAdapter().load(paths.orphanet),
    new OmimAdapter().load(paths.omim),
  ]);
  console.log(`  HGNC: ${hgnc.length} genes`);
  console.log(`  Curated: ${curated.symbols.size} genes`);
  console.log(`  HPO: ${hpo.size} genes with phenotypes`);
  console.log(`  Orphanet: ${orphanet.size} genes with disorders`);
  console.log(`  OMIM subset: ${omim.size} genes`);
  return { hgnc, curated, evidence: { hpo, orphanet, omim, curated: curated.evidence } };
}

export async function runExpandPhase(paths: ArtifactPaths, inputs: SourceInputs): Promise<PhaseOutcomeT> {
  if (!inputs.hgnc.length) {
    console.warn("[derive] No HGNC bulk set; keeping the existing expanded list");
    return "skipped";
  }
  const rules = await loadExpansionRules(paths.expansionRules);
  const expanded = selectExpandedGenes(inputs.hgnc, inputs.curated.symbols, rules);
  await writeArtifactAtomic(paths.expanded, expanded);
  console.log(`[derive] ${expanded.length} expanded genes -> ${paths.expanded}`);
  for (const [kind, n] of Object.entries(expansionStats(expanded))) console.log(`    ${kind}: ${n}`);
  for (const [role, n] of Object.entries(roleStats(expanded)).sort(([a], [b]) => a.localeCompare(b))) {
    console.log(`    role ${role}: ${n}`);
  }
  return "ok";
}

export async function runGenomePhase(paths: ArtifactPaths, inputs: SourceInputs, now: Date): Promise<PhaseOutcomeT> {
  if (!inputs.hgnc.length) {
    console.warn("[derive] No HGNC bulk set; genome-wide summary not rebuilt");
    return "skipped";
  }
  const records = aggregateGenes({
    universe: inputs.hgnc,
    curated: inputs.curated.sources,
    evidence: inputs.evidence,
    excludeSourcePatterns: [],
    includeCuratedOutsideUniverse: false,
  });
  // Tags from whatever expanded list is on disk, fresh from the expand phase or not
  const expanded = await new ExpandedAdapter().load(paths.expanded);
  const rows = genomeWideRows(records, new Map(expanded.map(g => [g.symbol, g.source])));
  const provenance = { worker: `${WORKER}:genome`, now };

  await writeArtifactAtomic(paths.genomeWideGenes, genomeWideGenes(rows, provenance));
  console.log(`[derive] ${rows.length} genome-wide gene rows -> ${paths.genomeWideGenes}`);
  const summary = summarizeGenomeWide(rows, provenance);
  await writeArtifactAtomic(paths.genomeWide, summary);
  console.log(`[derive] Genome-wide summary over ${summary.total_genes} genes -> ${paths.genomeWide}`);
  return "ok";
}

export async function runCandidatePhase(
  paths: ArtifactPaths,
  inputs: SourceInputs,
  now: Date
): Promise<PhaseOutcomeT> {
  const universe = await new ExpandedAdapter().load(paths.expanded);
  if (!universe.length) {
    throw new Error(`No expanded gene data at ${paths.expanded}; run the expand phase with an HGNC bulk set first`);
  }
  const records = aggregateGenes({
    universe,
    curated: inputs.curated.sources,
    evidence: inputs.evidence,
  });
  const snapshot = selectCandidates(records, { worker: `${WORKER}:candidates`, now });
  await writeArtifactAtomic(paths.candidates, snapshot);

  const dist = snapshot.score_distribution;
  console.log(`[derive] Wrote ${snapshot.candidate_count} candidates to ${paths.candidates}`);
  console.log(`  High (12+): ${dist["high (12+)"]}  Medium (6-11.9): ${dist["medium (6-11.9)"]}  Low (<6): ${dist["low (<6)"]}`);
  for (const c of snapshot.candidates.slice(0, 10)) {
    const e = c.evidence;
    console.log(`  ${c.symbol.padEnd(10)} score=${c.confidence_score.toFixed(1).padStart(5)}  HPO=${e.hpo_phenotype_count}  Orphanet=${e.orphanet_disorder_count}  ${e.has_omim ? "OMIM" : ""}`);
  }
  return "ok";
}

async function fileSize(file: string): Promise<number> {
  try {
    return (await stat(file)).size;
  } catch {
    return 0;
  }
}

export async function runDerivation(
  paths: ArtifactPaths,
  opts: { now?: () => Date; timed?: TimedFn } = {}
): Promise<PipelineStatusT> {
  const now = opts.now ?? (() => new Date());
  const timed = opts.timed ?? timedPhase;
  const started = now();
  const phases: Record<string, PhaseOutcomeT> = {};

  const inputs = await loadSourceInputs(paths);
  const steps: Record<PhaseName, () => Promise<PhaseOutcomeT>> = {
    expand: () => runExpandPhase(paths, inputs),
    genome: () => runGenomePhase(paths, inputs, now()),
    candidates: () => runCandidatePhase(paths, inputs, now()),
  };

  for (const phase of PHASES) {
    try {
      phases[phase] = await timed(phase, steps[phase]);
    } catch (err) {
      console.error(`[derive] Phase ${phase} failed: ${err instanceof Error ? err.message : String(err)}`);
      phases[phase] = "failed";
    }
  }

  const finished = now();
  const status: PipelineStatusT = {
    last_run: finished.toISOString(),
    duration_seconds: Math.max(0, Math.round((finished.getTime() - started.getTime()) / 1000)),
    phases,
    files: {
      hgnc_expanded: await fileSize(paths.expanded),
      genome_wide_genes: await fileSize(paths.genomeWideGenes),
      genome_wide_summary: await fileSize(paths.genomeWide),
      gap_candidates: await fileSize(paths.candidates),
    },
  };
  await writeArtifactAtomic(paths.pipelineStatus, status);
  return status;
}
