import { describe, expect, it } from "vitest";
import { z } from "zod";
import { coerceValue, defineRoute, parseQuery, runRoute, type QueryRoute } from "../../registerQueryRoutes.js";
import { ROUTES } from "../../src/serving/app.js";
import type { ApiResult } from "../../src/serving/results.js";
import type { ServedSnapshot } from "../../src/serving/snapshot.js";
import { candidate, candidateSnapshot, context, gene, snapshot } from "./fixtures.js";

function route(path: string): QueryRoute {
  const r = ROUTES.find(x => x.path === path);
  if (!r) throw new Error(`no route ${path}`);
  return r;
}

function get(s: ServedSnapshot, path: string, query: Record<string, unknown> = {}, params: Record<string, string> = {}): ApiResult {
  return runRoute(route(path), context(s), query, params);
}

function body(r: ApiResult): unknown {
  if ("text" in r) throw new Error("expected a JSON result");
  return r.body;
}

const full = snapshot({
  curated: { SOX9: { in_go: true, in_hpo: true }, FOXC1: { in_go: true } },
  curatedGaps: { summary: { total: 2 } },
  expanded: [gene("SOX9", { source: "curated" }), gene("PAX3", { source: "group:Paired box genes", role: "border_spec" })],
  genomeWide: {
    total_genes: 19000,
    in_hpo: 5000,
    in_orphanet: 4000,
    in_omim: 3000,
    in_curated: 2,
    with_phenotypes_and_no_curated: 2500,
    disease_genes_not_curated: 2900,
  },
  candidates: candidateSnapshot([candidate("PAX3", 14.2), candidate("TWIST1", 8), candidate("MSX1", 14.2), candidate("DLX5", 2)]),
});

const curatedOnly = snapshot({ curated: { SOX9: { in_go: true } } });

describe("GET /api/genes", () => {
  it("lists curated symbols by default", () => {
    const r = get(full, "/api/genes");
    expect(r.status).toBe(200);
    expect(body(r)).toEqual({ tier: "curated", count: 2, genes: ["FOXC1", "SOX9"] });
  });

  it("lists expanded symbols in stored order", () => {
    expect(body(get(full, "/api/genes", { tier: "expanded" }))).toEqual({ tier: "expanded", count: 2, genes: ["SOX9", "PAX3"] });
  });

  it("marks a fallback to curated", () => {
    const r = get(curatedOnly, "/api/genes", { tier: "expanded" });
    expect(r.status).toBe(200);
    expect(body(r)).toEqual({
      tier: "curated",
      count: 1,
      genes: ["SOX9"],
      _fallback: true,
      _reason: "Expanded data not available, serving curated",
    });
  });

  it("returns 503 when no tier can answer", () => {
    expect(get(snapshot(), "/api/genes", { tier: "expanded" })).toEqual({
      status: 503,
      body: { error: "No gene data available" },
    });
  });

  it("serves the genome-wide summary", () => {
    const b = body(get(full, "/api/genes", { tier: "genome" }));
    expect(b).toMatchObject({ tier: "genome", summary: { total_genes: 19000 } });
  });

  it("reports a missing genome-wide tier with a hint", () => {
    const r = get(curatedOnly, "/api/genes", { tier: "genome" });
    expect(r).toEqual({
      status: 503,
      body: { error: "Genome-wide data not available", hint: "Run: npm run derive (needs the HGNC bulk set)" },
    });
  });

  it("rejects an unknown tier", () => {
    expect(get(full, "/api/genes", { tier: "bogus" })).toEqual({
      status: 400,
      body: { error: "Unknown tier: bogus", valid: ["curated", "expanded", "genome"] },
    });
  });
});

describe("GET /api/genes/:symbol", () => {
  it("finds curated genes case-insensitively", () => {
    expect(body(get(full, "/api/genes/:symbol", {}, { symbol: "sox9" }))).toEqual({
      symbol: "SOX9",
      tier: "curated",
      sources: { in_go: true, in_hpo: true },
    });
  });

  it("returns a reduced record for expanded-only genes", () => {
    const b = body(get(full, "/api/genes/:symbol", {}, { symbol: "pax3" }));
    expect(b).toMatchObject({ symbol: "PAX3", tier: "expanded", role: "border_spec", curated_sources: null, candidate: { confidence_score: 14.2 } });
  });

  it("returns 404 for unknown genes", () => {
    expect(get(full, "/api/genes/:symbol", {}, { symbol: "zzzznotreal" })).toEqual({
      status: 404,
      body: { error: "Gene ZZZZNOTREAL not found in any tier" },
    });
  });

  it("returns 503 when curated data is not loaded", () => {
    expect(get(snapshot(), "/api/genes/:symbol", {}, { symbol: "SOX9" }).status).toBe(503);
  });
});

describe("GET /api/enrichment/gap-candidates", () => {
  it("returns every candidate by default, score then symbol", () => {
    const b = body(get(full, "/api/enrichment/gap-candidates"));
    expect(b).toMatchObject({
      tier: "derived",
      candidate_count: 4,
      returned_count: 4,
      filters: { min_score: 0, limit: null },
    });
  });

  it("filters by stored score and limits", () => {
    const r = get(full, "/api/enrichment/gap-candidates", { min_score: "12", limit: "1" });
    expect(r.status).toBe(200);
    const b = z.object({ returned_count: z.number(), candidates: z.array(z.object({ symbol: z.string() })) }).parse(body(r));
    expect(b.returned_count).toBe(1);
    expect(b.candidates.map(c => c.symbol)).toEqual(["MSX1"]);
  });

  it("rejects a non-positive limit", () => {
    expect(get(full, "/api/enrichment/gap-candidates", { limit: "0" })).toEqual({
      status: 400,
      body: { error: "limit must be > 0" },
    });
  });

  it("rejects a non-numeric min_score", () => {
    expect(get(full, "/api/enrichment/gap-candidates", { min_score: "high" })).toEqual({
      status: 400,
      body: { error: "min_score must be an integer" },
    });
  });

  it("returns 503 without a candidate snapshot", () => {
    expect(get(curatedOnly, "/api/enrichment/gap-candidates")).toEqual({
      status: 503,
      body: { error: "Gap candidates not available", hint: "Run: npm run derive" },
    });
  });
});

describe("coverage", () => {
  it("summarizes curated coverage per source", () => {
    const b = z.object({
      total_genes: z.number(),
      sources: z.record(z.object({ count: z.number(), total: z.number(), percent: z.number() })),
    }).parse(body(get(full, "/api/coverage")));
    expect(b.total_genes).toBe(2);
    expect(Object.keys(b.sources)).toHaveLength(16);
    expect(b.sources.go).toEqual({ count: 2, total: 2, percent: 100 });
    expect(b.sources.hpo).toEqual({ count: 1, total: 2, percent: 50 });
    expect(b.sources.structures).toEqual({ count: 0, total: 2, percent: 0 });
  });

  it("needs curated data for the summary", () => {
    expect(get(snapshot(), "/api/coverage")).toEqual({ status: 503, body: { error: "No curated data" } });
  });

  it("builds the matrix, empty when nothing is curated", () => {
    const b = z.object({
      sources: z.array(z.string()),
      genes: z.array(z.string()),
      matrix: z.record(z.record(z.boolean())),
    }).parse(body(get(full, "/api/enrichment/coverage-matrix")));
    expect(b.genes).toEqual(["FOXC1", "SOX9"]);
    expect(b.matrix.FOXC1.go).toBe(true);
    expect(b.matrix.FOXC1.hpo).toBe(false);

    expect(body(get(snapshot(), "/api/enrichment/coverage-matrix"))).toMatchObject({ genes: [], matrix: {} });
  });
});

describe("other routes", () => {
  it("passes the gap report through", () => {
    expect(body(get(full, "/api/gaps"))).toEqual({ summary: { total: 2 } });
    expect(get(curatedOnly, "/api/gaps").status).toBe(503);
  });

  it("reports enrichment as unavailable until it has run", () => {
    expect(get(full, "/api/enrichment/enriched")).toEqual({
      status: 503,
      body: { error: "Candidate enrichment not available", hint: "Run: npm run enrich" },
    });
  });

  it("always answers the provenance audit", () => {
    expect(get(snapshot(), "/api/enrichment/provenance")).toEqual({
      status: 200,
      body: { derivation_count: 0, derivations: [] },
    });
  });

  it("reports tier availability", () => {
    expect(body(get(curatedOnly, "/api/status"))).toMatchObject({
      service: "gene-gap-atlas",
      tiers: {
        curated: { available: true, genes: 1 },
        expanded: { available: false, genes: 0 },
        genome: { available: false, summary: null },
        derived: { available: false, candidates: 0 },
      },
    });
  });

  it("documents every route on the index", () => {
    const b = z.object({ service: z.string(), endpoints: z.record(z.string()) }).parse(body(get(full, "/")));
    expect(b.service).toBe("gene-gap-atlas");
    expect(Object.keys(b.endpoints)).toEqual(ROUTES.filter(r => r.path !== "/").map(r => r.path));
    expect(b.endpoints["/api/digest"]).toBe("Weekly digest (format=json|md)");
  });

  it("serves the digest as JSON or markdown", () => {
    expect(body(get(full, "/api/digest"))).toMatchObject({ date: "2026-03-02" });

    const md = get(full, "/api/digest", { format: "md" });
    expect(md.status).toBe(200);
    if (!("text" in md)) throw new Error("expected markdown");
    expect(md.contentType).toBe("text/markdown; charset=utf-8");
    expect(md.text.split("\n")[0]).toBe("## gene-gap-atlas Digest (2026-03-02)");
    expect(md.text).toContain("### Source Coverage");
  });

  it("rejects an unknown digest format", () => {
    expect(get(full, "/api/digest", { format: "pdf" })).toEqual({
      status: 400,
      body: { error: "format must be json or md" },
    });
  });
});

describe("runRoute", () => {
  it("turns an unexpected exception into a 500", () => {
    const broken = defineRoute({
      path: "/broken",
      description: "always throws",
      inputSchema: z.object({}),
      handler: () => {
        throw new Error("boom");
      },
    });
    expect(runRoute(broken, context(full))).toEqual({ status: 500, body: { error: "Internal error" } });
  });
});

describe("query coercion", () => {
  it("coerces numbers, booleans and lists", () => {
    expect(coerceValue("12")).toBe(12);
    expect(coerceValue("-1.5")).toBe(-1.5);
    expect(coerceValue("TRUE")).toBe(true);
    expect(coerceValue(" md ")).toBe("md");
    expect(coerceValue("a,2")).toEqual(["a", 2]);
  });

  it("strips the [] suffix from array keys", () => {
    expect(parseQuery({ "ids[]": ["1", "x"], limit: "5" })).toEqual({ ids: [1, "x"], limit: 5 });
  });
});
