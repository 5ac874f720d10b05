// src/gaps/clients/ncbi_client.ts
// NCBI E-utilities: gene summary (esummary) and PubMed hit counts (esearch).
import { z } from "zod";
import { fetchJsonWithRetry, type RetryOpts } from "./fetch_retry.js";

const EUTILS = "https://eutils.ncbi.nlm.nih.gov/entrez/eutils";

const ESummary = z.object({
  result: z.record(z.unknown()).default({}),
});

const GeneSummary = z.object({ summary: z.string().default("") }).passthrough();

const ESearch = z.object({
  esearchresult: z.object({ count: z.coerce.number().int().nonnegative().default(0) }).passthrough(),
});

export async function fetchGeneSummary(ncbiId: string, opts: RetryOpts): Promise<string | null> {
  if (!ncbiId) return "";
  const url = new URL(`${EUTILS}/esummary.fcgi`);
  url.searchParams.set("db", "gene");
  url.searchParams.set("id", ncbiId);
  url.searchParams.set("retmode", "json");

  const json = await fetchJsonWithRetry(url.toString(), opts);
  if (json === null) return null;
  const parsed = ESummary.safeParse(json);
  if (!parsed.success) return "";
  const gene = GeneSummary.safeParse(parsed.data.result[ncbiId]);
  return gene.success ? gene.data.summary : "";
}

/** Count of PubMed records for `<symbol> AND <context>`. */
export async function fetchPubmedCount(symbol: string, context: string, opts: RetryOpts): Promise<number | null> {
  const url = new URL(`${EUTILS}/esearch.fcgi`);
  url.searchParams.set("db", "pubmed");
  url.searchParams.set("term", `${symbol} AND ${context}`);
  url.searchParams.set("retmode", "json");
  url.searchParams.set("retmax", "0");

  const json = await fetchJsonWithRetry(url.toString(), opts);
  if (json === null) return null;
  const parsed = ESearch.safeParse(json);
  return parsed.success ? parsed.data.esearchresult.count : 0;
}
