/*
 * registerQueryRoutes.ts
 *
 * Attaches the read-only query routes to an Express app. Query parameters are
 * coerced (numeric strings to numbers, "true"/"false" to booleans, comma-separated
 * values and `key[]` to arrays), validated against the route's Zod schema, and
 * handed to a pure handler that returns an ApiResult. Handlers never see Express,
 * so `runRoute` is all a test needs.
 *
 * Usage:
 *   registerQueryRoutes(app, routes, { snapshot, serviceName, now: () => new Date() });
 *   // GET /api/enrichment/gap-candidates?min_score=12&limit=5
 */

import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { failureResult, type ApiResult, type QueryContext } from './src/serving/results.js';

export type RouteParams = Record<string, string>;

export interface QueryRoute {
  path: string;
  description: string;
  run: (ctx: QueryContext, rawArgs: Record<string, unknown>, params: RouteParams) => ApiResult;
}

/** Bind a handler to its input schema; validation failures become 400s. */
export function defineRoute<S extends z.ZodTypeAny>(def: {
  path: string;
  description: string;
  inputSchema: S;
  handler: (ctx: QueryContext, args: z.output<S>, params: RouteParams) => ApiResult;
}): QueryRoute {
  return {
    path: def.path,
    description: def.description,
    run: (ctx, rawArgs, params) => {
      const parsed = def.inputSchema.safeParse(rawArgs);
      if (!parsed.success) {
        const error = parsed.error.issues.map(issue => issue.message).join('; ');
        return failureResult({ kind: 'invalid_input', error });
      }
      return def.handler(ctx, parsed.data, params);
    },
  };
}

// Coerce query parameter values into numbers, booleans, arrays, or strings.
export function coerceValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(coerceValue);
  }
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(v => coerceValue(v));
  }
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  return trimmed;
}

export function parseQuery(query: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(query)) {
    result[key.endsWith('[]') ? key.slice(0, -2) : key] = coerceValue(value);
  }
  return result;
}

/** Run one route against a raw query; an unexpected exception is a 500. */
export function runRoute(
  route: QueryRoute,
  ctx: QueryContext,
  query: Record<string, unknown> = {},
  params: RouteParams = {}
): ApiResult {
  try {
    return route.run(ctx, parseQuery(query), params);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`[api] ${route.path} failed: ${message}`);
    return { status: 500, body: { error: 'Internal error' } };
  }
}

function send(res: Response, result: ApiResult): void {
  if ('text' in result) {
    res.status(result.status).type(result.contentType).send(result.text);
  } else {
    res.status(result.status).json(result.body);
  }
}

export function registerQueryRoutes(app: Express, routes: QueryRoute[], ctx: QueryContext): void {
  for (const route of routes) {
    app.get(route.path, (req: Request, res: Response) => {
      send(res, runRoute(route, ctx, req.query, req.params));
    });
  }
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.path}` });
  });
}
