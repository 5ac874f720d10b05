// src/serving/queries.ts
// Read-only query operations over the served snapshot. None of them touch disk,
// network or scoring; they pick (or fall back from) a loaded artifact.

import { z } from "zod";
import { compareCandidates } from "../gaps/select_candidates.js";
import { normalizeSymbol } from "../gaps/types.js";
import { coverageMatrix, coverageSummary } from "./coverage.js";
import { buildDigest, digestDate } from "./digest.js";
import { failureResult, ok, type ApiResult, type QueryContext } from "./results.js";
import { tierAvailability, type ServedSnapshot } from "./snapshot.js";
import { parseTierParam, resolveTier, tierUnavailable, unavailableFailure, type Tier } from "./tiers.js";

/* =========================
 * Input schemas
 * ========================= */

export const GenesQuery = z.object({
  tier: z.coerce.string().default("curated"),
});

const intParam = (field: string) =>
  z.number({ invalid_type_error: `${field} must be an integer` }).int({ message: `${field} must be an integer` });

export const CandidatesQuery = z.object({
  min_score: intParam("min_score").min(0, { message: "min_score must be >= 0" }).default(0),
  limit: intParam("limit").positive({ message: "limit must be > 0" }).optional(),
});

export const DigestQuery = z.object({
  format: z.enum(["json", "md"], { errorMap: () => ({ message: "format must be json or md" }) }).default("json"),
});

export const NoInput = z.object({});

/* =========================
 * Operations
 * ========================= */

export function statusQuery(ctx: QueryContext): ApiResult {
  return ok({
    service: ctx.serviceName,
    loaded_at: ctx.snapshot.loadedAt,
    tiers: tierAvailability(ctx.snapshot),
  });
}

function geneSymbols(s: ServedSnapshot, tier: Tier): string[] {
  return tier === "expanded" ? s.expanded.map(g => g.symbol) : Object.keys(s.curated).sort();
}

export function listGenes(ctx: QueryContext, args: z.output<typeof GenesQuery>): ApiResult {
  const parsed = parseTierParam(args.tier);
  if (!parsed.ok) return failureResult(parsed.failure);

  const s = ctx.snapshot;
  const r = resolveTier(parsed.tier, s);
  if (r.kind === "unavailable") return failureResult(unavailableFailure(r));

  if (r.tier === "genome-wide") return ok({ tier: "genome", summary: s.genomeWide });

  const genes = geneSymbols(s, r.tier);
  const body = { tier: r.tier, count: genes.length, genes };
  return ok(r.fallback ? { ...body, _fallback: true, _reason: r.reason } : body);
}

/** Curated first; an expanded-only gene gets a reduced record with no source data. */
export function geneDetail(ctx: QueryContext, rawSymbol: string): ApiResult {
  const s = ctx.snapshot;
  const symbol = normalizeSymbol(rawSymbol);
  const curated = resolveTier("curated", s);
  if (curated.kind === "unavailable") return failureResult(unavailableFailure(curated));

  const sources = s.curated[symbol];
  if (sources) return ok({ symbol, tier: "curated", sources });

  const hgnc = s.expanded.find(g => g.symbol === symbol);
  if (hgnc) {
    return ok({
      symbol,
      tier: "expanded",
      role: hgnc.role,
      hgnc,
      curated_sources: null,
      candidate: s.candidates?.candidates.find(c => c.symbol === symbol) ?? null,
      _note: "Gene is in expanded set but not yet curated. No source data available.",
    });
  }
  return failureResult({ kind: "not_found", error: `Gene ${symbol} not found in any tier` });
}

export function gapReport(ctx: QueryContext): ApiResult {
  if (ctx.snapshot.curatedGaps === null) {
    return failureResult({
      kind: "missing_artifact",
      error: "Gap report not available",
      hint: "Run the curated pipeline so that output/gap_report.json exists under CURATED_ROOT",
    });
  }
  return ok(ctx.snapshot.curatedGaps);
}

export function coverageQuery(ctx: QueryContext): ApiResult {
  const summary = coverageSummary(ctx.snapshot.curated);
  return summary ? ok(summary) : failureResult({ kind: "missing_artifact", error: "No curated data" });
}

export function coverageMatrixQuery(ctx: QueryContext): ApiResult {
  return ok(coverageMatrix(ctx.snapshot.curated));
}

/** Filters apply to the stored scores; nothing is rescored. */
export function candidateList(ctx: QueryContext, args: z.output<typeof CandidatesQuery>): ApiResult {
  const r = resolveTier("derived", ctx.snapshot);
  const snap = ctx.snapshot.candidates;
  if (r.kind === "unavailable" || snap === null) return failureResult(tierUnavailable("derived"));

  const filtered = snap.candidates
    .filter(c => c.confidence_score >= args.min_score)
    .sort(compareCandidates);
  const candidates = args.limit === undefined ? filtered : filtered.slice(0, args.limit);

  return ok({
    tier: "derived",
    _provenance: snap._provenance,
    candidate_count: snap.candidate_count,
    returned_count: candidates.length,
    filters: { min_score: args.min_score, limit: args.limit ?? null },
    score_distribution: snap.score_distribution,
    candidates,
  });
}

export function enrichedList(ctx: QueryContext): ApiResult {
  if (ctx.snapshot.enrichment === null) {
    return failureResult({
      kind: "missing_artifact",
      error: "Candidate enrichment not available",
      hint: "Run: npm run enrich",
    });
  }
  return ok(ctx.snapshot.enrichment);
}

export function provenanceAudit(ctx: QueryContext): ApiResult {
  const derivations = ctx.snapshot.provenance.map(d => ({ file: d.file, ...d.provenance }));
  return ok({ derivation_count: derivations.length, derivations });
}

export function digestQuery(ctx: QueryContext, args: z.output<typeof DigestQuery>): ApiResult {
  const now = ctx.now();
  const digest = buildDigest(ctx.snapshot, ctx.serviceName, now);
  if (args.format === "md") {
    return { status: 200, contentType: "text/markdown; charset=utf-8", text: digest };
  }
  return ok({ date: digestDate(now), digest });
}
