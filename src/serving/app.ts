// src/serving/app.ts
import cors from "cors";
import express, { type Express } from "express";
import { defineRoute, registerQueryRoutes, type QueryRoute } from "../../registerQueryRoutes.js";
import {
  CandidatesQuery,
  DigestQuery,
  GenesQuery,
  NoInput,
  candidateList,
  coverageMatrixQuery,
  coverageQuery,
  digestQuery,
  enrichedList,
  gapReport,
  geneDetail,
  listGenes,
  provenanceAudit,
  statusQuery,
} from "./queries.js";
import { ok, type QueryContext } from "./results.js";
import type { ServedSnapshot } from "./snapshot.js";

export const SERVICE_DESCRIPTION = "Gene evidence API: curated, expanded, genome-wide and derived gap-candidate tiers";

export const API_ROUTES: QueryRoute[] = [
  defineRoute({
    path: "/api/status",
    description: "Health check with tier availability",
    inputSchema: NoInput,
    handler: ctx => statusQuery(ctx),
  }),
  defineRoute({
    path: "/api/genes",
    description: "List genes (tier=curated|expanded|genome)",
    inputSchema: GenesQuery,
    handler: (ctx, args) => listGenes(ctx, args),
  }),
  defineRoute({
    path: "/api/genes/:symbol",
    description: "Single gene detail",
    inputSchema: NoInput,
    handler: (ctx, _args, params) => geneDetail(ctx, params.symbol ?? ""),
  }),
  defineRoute({
    path: "/api/gaps",
    description: "Research gap report from the curated pipeline",
    inputSchema: NoInput,
    handler: ctx => gapReport(ctx),
  }),
  defineRoute({
    path: "/api/coverage",
    description: "Per-source coverage over the curated set",
    inputSchema: NoInput,
    handler: ctx => coverageQuery(ctx),
  }),
  defineRoute({
    path: "/api/enrichment/coverage-matrix",
    description: "Curated gene x source coverage matrix",
    inputSchema: NoInput,
    handler: ctx => coverageMatrixQuery(ctx),
  }),
  defineRoute({
    path: "/api/enrichment/gap-candidates",
    description: "Scored gap candidates (min_score, limit)",
    inputSchema: CandidatesQuery,
    handler: (ctx, args) => candidateList(ctx, args),
  }),
  defineRoute({
    path: "/api/enrichment/enriched",
    description: "External lookups for the top gap candidates",
    inputSchema: NoInput,
    handler: ctx => enrichedList(ctx),
  }),
  defineRoute({
    path: "/api/enrichment/provenance",
    description: "Provenance blocks of all derived artifacts",
    inputSchema: NoInput,
    handler: ctx => provenanceAudit(ctx),
  }),
  defineRoute({
    path: "/api/digest",
    description: "Weekly digest (format=json|md)",
    inputSchema: DigestQuery,
    handler: (ctx, args) => digestQuery(ctx, args),
  }),
];

export function indexRoute(routes: QueryRoute[]): QueryRoute {
  return defineRoute({
    path: "/",
    description: "API documentation",
    inputSchema: NoInput,
    handler: ctx => ok({
      service: ctx.serviceName,
      description: SERVICE_DESCRIPTION,
      endpoints: Object.fromEntries(routes.map(r => [r.path, r.description])),
    }),
  });
}

export const ROUTES: QueryRoute[] = [indexRoute(API_ROUTES), ...API_ROUTES];

export function createApp(
  snapshot: ServedSnapshot,
  opts: { serviceName: string; now?: () => Date }
): Express {
  const ctx: QueryContext = { snapshot, serviceName: opts.serviceName, now: opts.now ?? (() => new Date()) };
  const app = express();
  app.use(cors());
  registerQueryRoutes(app, ROUTES, ctx);
  return app;
}
