// src/gaps/clients/uniprot_client.ts
import { z } from "zod";
import { fetchJsonWithRetry, type RetryOpts } from "./fetch_retry.js";

const UniProtEntry = z.object({
  comments: z.array(z.object({
    commentType: z.string().optional(),
    texts: z.array(z.object({ value: z.string().optional() }).passthrough()).optional(),
  }).passthrough()).default([]),
}).passthrough();

/** First FUNCTION comment of a UniProtKB entry; "" when there is none, null when the call failed. */
export async function fetchUniprotFunction(accession: string, opts: RetryOpts): Promise<string | null> {
  if (!accession) return "";
  const json = await fetchJsonWithRetry(`https://rest.uniprot.org/uniprotkb/${encodeURIComponent(accession)}.json`, opts);
  if (json === null) return null;
  const parsed = UniProtEntry.safeParse(json);
  if (!parsed.success) return "";
  const fn = parsed.data.comments.find(c => c.commentType === "FUNCTION");
  return fn?.texts?.[0]?.value ?? "";
}
