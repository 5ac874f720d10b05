// src/serving/results.ts
// Query results are plain values; Express only writes them out.

import type { ServedSnapshot } from "./snapshot.js";

export type ApiResult =
  | { status: number; body: unknown }
  | { status: number; contentType: string; text: string };

export interface QueryContext {
  snapshot: ServedSnapshot;
  serviceName: string;
  now: () => Date;
}

export type QueryFailure =
  | { kind: "missing_artifact"; error: string; hint?: string }
  | { kind: "unknown_parameter"; error: string; valid: readonly string[] }
  | { kind: "invalid_input"; error: string }
  | { kind: "not_found"; error: string };

const FAILURE_STATUS: Record<QueryFailure["kind"], number> = {
  missing_artifact: 503,
  unknown_parameter: 400,
  invalid_input: 400,
  not_found: 404,
};

export function ok(body: unknown): ApiResult {
  return { status: 200, body };
}

export function failureResult(f: QueryFailure): ApiResult {
  const status = FAILURE_STATUS[f.kind];
  switch (f.kind) {
    case "missing_artifact":
      return { status, body: f.hint ? { error: f.error, hint: f.hint } : { error: f.error } };
    case "unknown_parameter":
      return { status, body: { error: f.error, valid: [...f.valid] } };
    default:
      return { status, body: { error: f.error } };
  }
}
