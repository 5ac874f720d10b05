// src/integrations/run_enrichment_stage.ts
// Quick lookups for the top gap candidates (NCBI gene summary, PubMed context
// count, UniProt function). Calls run one at a time with a pause between
// candidates; a call that still fails after its retries leaves an empty value
// and an entry in `errors`, never an aborted run.

import { readJsonArtifact } from "../adapters/files.js";
import type { ArtifactPaths, EnrichmentSettings } from "../config.js";
import { fetchGeneSummary, fetchPubmedCount } from "../gaps/clients/ncbi_client.js";
import { sleep, type FetchLike, type RetryOpts, type Sleep } from "../gaps/clients/fetch_retry.js";
import { fetchUniprotFunction } from "../gaps/clients/uniprot_client.js";
import { makeProvenance } from "../gaps/provenance.js";
import {
  CandidateSnapshot,
  type CandidateRecordT,
  type EnrichedCandidateT,
  type EnrichmentSnapshotT,
} from "../gaps/schemas.js";
import { writeArtifactAtomic } from "./snapshot_writer.js";

export const MAX_TEXT = 500;

export type EnrichmentDeps = {
  fetchImpl?: FetchLike;
  sleepImpl?: Sleep;
  now?: () => Date;
};

/** Highest score first; more HPO terms breaks ties. */
export function pickTopCandidates(candidates: CandidateRecordT[], top: number): CandidateRecordT[] {
  return [...candidates]
    .sort((a, b) =>
      b.confidence_score - a.confidence_score ||
      b.evidence.hpo_phenotype_count - a.evidence.hpo_phenotype_count
    )
    .slice(0, top);
}

export async function enrichCandidates(
  candidates: CandidateRecordT[],
  settings: EnrichmentSettings,
  deps: EnrichmentDeps = {}
): Promise<EnrichmentSnapshotT> {
  const wait = deps.sleepImpl ?? sleep;
  const now = deps.now ?? (() => new Date());
  const retry: RetryOpts = {
    retries: settings.retries,
    backoffMs: settings.backoffMs,
    timeoutMs: settings.timeoutMs,
    headers: { "User-Agent": settings.userAgent },
    fetchImpl: deps.fetchImpl,
    sleepImpl: wait,
  };

  const enriched: EnrichedCandidateT[] = [];
  const errors: EnrichmentSnapshotT["errors"] = [];

  for (const [i, c] of candidates.entries()) {
    const xref = c.cross_references;
    console.log(`[enrich] [${i + 1}/${candidates.length}] ${c.symbol}`);

    const summary = await fetchGeneSummary(xref.ncbi_id, retry);
    if (summary === null) errors.push({ symbol: c.symbol, call: "ncbi.gene_summary" });
    const pubCount = await fetchPubmedCount(c.symbol, settings.pubmedContext, retry);
    if (pubCount === null) errors.push({ symbol: c.symbol, call: "pubmed.count" });
    const fn = await fetchUniprotFunction(xref.uniprot_id, retry);
    if (fn === null) errors.push({ symbol: c.symbol, call: "uniprot.function" });

    enriched.push({
      symbol: c.symbol,
      confidence_score: c.confidence_score,
      ncbi_id: xref.ncbi_id,
      uniprot_id: xref.uniprot_id,
      gene_summary: (summary ?? "").slice(0, MAX_TEXT),
      pubmed_context_count: pubCount ?? 0,
      uniprot_function: (fn ?? "").slice(0, MAX_TEXT),
      hpo_phenotype_count: c.evidence.hpo_phenotype_count,
      orphanet_disorder_count: c.evidence.orphanet_disorder_count,
      hgnc_source: c.hgnc_source,
    });

    if (i < candidates.length - 1) await wait(settings.delayMs);
  }

  return {
    enriched_count: enriched.length,
    candidates: enriched,
    errors,
    _provenance: makeProvenance({
      worker: "gene-gap-atlas enrich",
      now: now(),
      canonSources: ["NCBI Gene", "PubMed", "UniProt"],
      nonCanonElements: ["Gene summary truncation", "PubMed context search term"],
    }),
  };
}

export async function runEnrichmentStage(
  paths: ArtifactPaths,
  settings: EnrichmentSettings,
  deps: EnrichmentDeps = {}
): Promise<EnrichmentSnapshotT> {
  const snapshot = await readJsonArtifact(paths.candidates, "candidates", CandidateSnapshot);
  if (!snapshot) {
    throw new Error(`gap candidates not found at ${paths.candidates}; run the derive pipeline first`);
  }
  const top = pickTopCandidates(snapshot.candidates, settings.top);
  console.log(`[enrich] Enriching top ${top.length} gap candidates...`);

  const out = await enrichCandidates(top, settings, deps);
  await writeArtifactAtomic(paths.enrichment, out);

  const withPubs = out.candidates.filter(e => e.pubmed_context_count > 0).length;
  console.log(`[enrich] Wrote ${out.enriched_count} enriched candidates to ${paths.enrichment}`);
  console.log(`  ${withPubs}/${out.enriched_count} have context publications; ${out.errors.length} calls failed`);
  return out;
}
