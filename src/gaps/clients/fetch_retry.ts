// src/gaps/clients/fetch_retry.ts
// JSON GET with a small, fixed retry budget. Final failure yields null so a batch
// can record the gap and move on.

export type FetchLike = (url: string, init?: { headers?: Record<string, string>; signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOpts {
  retries: number;      // total attempts
  backoffMs: number;    // attempt n (1-based) waits n * backoffMs before the next one
  timeoutMs: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
  sleepImpl?: Sleep;
}

export async function fetchJsonWithRetry(url: string, opts: RetryOpts): Promise<unknown | null> {
  const doFetch: FetchLike = opts.fetchImpl ?? fetch;
  const wait = opts.sleepImpl ?? sleep;
  const attempts = Math.max(1, opts.retries);

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const res = await doFetch(url, {
        headers: { Accept: "application/json", ...(opts.headers ?? {}) },
        signal: AbortSignal.timeout(opts.timeoutMs),
      });
      if (!res.ok) throw new Error(`HTTP ${res.status}`);
      return await res.json();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      if (attempt < attempts) {
        console.warn(`  [fetch] attempt ${attempt}/${attempts} failed for ${url}: ${msg}`);
        await wait(attempt * opts.backoffMs);
      } else {
        console.warn(`  [fetch] giving up on ${url}: ${msg}`);
      }
    }
  }
  return null;
}
