import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { z } from "zod";
import { CuratedAdapter } from "../../src/adapters/curated.js";
import { HpoAdapter, OmimAdapter, OrphanetAdapter } from "../../src/adapters/evidence.js";
import { readJsonArtifact, readJsonArtifactDetailed } from "../../src/adapters/files.js";
import { ExpandedAdapter, HgncAdapter } from "../../src/adapters/hgnc.js";
import { tmpDir, writeJson, writeText } from "./fixtures.js";

let dir: string;
const at = (name: string) => path.join(dir, name);

beforeAll(async () => {
  dir = await tmpDir("adapters");
  await writeText(
    at("genes_to_phenotype.txt"),
    [
      "#ncbi_gene_id\tgene_symbol\thpo_id\thpo_name",
      "2296\tfoxc1\tHP:0000175\tCleft palate\tP",
      "2296\tFOXC1\tHP:0000356\tAbnormality of the outer ear",
      "2296\tFOXC1\tHP:0000175\tCleft palate",
      "6662\tSOX9",
      "",
    ].join("\n")
  );
  await writeJson(at("orphanet.json"), {
    foxc1: ["Axenfeld-Rieger syndrome", { name: "Iridogoniodysgenesis" }],
    SOX9: { disorders: ["Campomelic dysplasia"] },
    BAD: 5,
  });
  await writeJson(at("omim.json"), {
    genes: {
      FOXC1: { title: "Forkhead box C1", syndromes: ["Axenfeld-Rieger type 3", { name: "Iridogoniodysgenesis 1" }] },
      SOX9: {},
    },
  });
  await writeJson(at("hgnc_complete.json"), {
    response: {
      docs: [
        {
          symbol: "foxc1",
          name: "forkhead box C1",
          hgnc_id: "HGNC:3800",
          status: "Approved",
          locus_group: "protein-coding gene",
          locus_type: "gene with protein product",
          entrez_id: 2296,
          uniprot_ids: ["Q12948"],
          omim_id: ["601090"],
          gene_group: ["Forkhead boxes"],
          location: "6p25.3",
        },
        { symbol: "OLD1", status: "Entry Withdrawn", locus_group: "protein-coding gene" },
        { symbol: "LINC0001", status: "Approved", locus_group: "non-coding RNA" },
      ],
    },
  });
  await writeJson(at("hgnc_filtered.json"), [{ symbol: "sox9", name: "SRY-box 9" }, { name: "no symbol" }]);
  await writeJson(at("expanded.json"), [{ symbol: "pax3", source: "group:Paired box genes" }]);
  await writeJson(at("sources.json"), { sox9: { in_go: true, in_hpo: false, in_omim: 1 } });
  await writeText(at("broken.json"), "{ not json");
});

describe("HpoAdapter", () => {
  it("collapses duplicate terms and skips short rows", async () => {
    const map = await new HpoAdapter().load(at("genes_to_phenotype.txt"));
    expect([...map.keys()]).toEqual(["FOXC1"]);
    expect(map.get("FOXC1")).toEqual({
      source: "hpo",
      present: true,
      count: 2,
      detail: ["Abnormality of the outer ear", "Cleft palate"],
    });
  });

  it("returns an empty map when the file is missing", async () => {
    expect((await new HpoAdapter().load(at("nope.txt"))).size).toBe(0);
  });
});

describe("OrphanetAdapter", () => {
  it("accepts bare lists and wrapped lists, skipping invalid entries", async () => {
    const map = await new OrphanetAdapter().load(at("orphanet.json"));
    expect(map.size).toBe(2);
    expect(map.get("FOXC1")?.detail).toEqual(["Axenfeld-Rieger syndrome", "Iridogoniodysgenesis"]);
    expect(map.get("SOX9")?.count).toBe(1);
  });
});

describe("OmimAdapter", () => {
  it("counts syndromes and keeps the title", async () => {
    const map = await new OmimAdapter().load(at("omim.json"));
    expect(map.get("FOXC1")).toEqual({
      source: "omim",
      present: true,
      count: 2,
      detail: ["Axenfeld-Rieger type 3", "Iridogoniodysgenesis 1"],
      label: "Forkhead box C1",
    });
    expect(map.get("SOX9")?.present).toBe(false);
  });
});

describe("HgncAdapter", () => {
  it("filters the complete set to approved protein-coding genes", async () => {
    const genes = await new HgncAdapter().load(at("hgnc_complete.json"));
    expect(genes).toEqual([
      {
        symbol: "FOXC1",
        name: "forkhead box C1",
        hgnc_id: "HGNC:3800",
        ncbi_id: "2296",
        ensembl_id: "",
        uniprot_id: "Q12948",
        omim_id: "601090",
        locus_type: "gene with protein product",
        gene_group: ["Forkhead boxes"],
        location: "6p25.3",
      },
    ]);
  });

  it("reads an already filtered list", async () => {
    const genes = await new HgncAdapter().load(at("hgnc_filtered.json"));
    expect(genes.map(g => [g.symbol, g.name])).toEqual([["SOX9", "SRY-box 9"]]);
  });

  it("returns nothing for a missing file", async () => {
    expect(await new HgncAdapter().load(at("missing.json"))).toEqual([]);
  });
});

describe("ExpandedAdapter", () => {
  it("normalizes symbols and fills defaults", async () => {
    const [g] = await new ExpandedAdapter().load(at("expanded.json"));
    expect(g.symbol).toBe("PAX3");
    expect(g.source).toBe("group:Paired box genes");
    expect(g.gene_group).toEqual([]);
  });
});

describe("CuratedAdapter", () => {
  it("builds the symbol set and curated evidence", async () => {
    const set = await new CuratedAdapter().load(at("sources.json"));
    expect([...set.symbols]).toEqual(["SOX9"]);
    expect(set.evidence.get("SOX9")?.detail).toEqual(["in_go", "in_omim"]);
    expect(set.evidence.get("SOX9")?.count).toBe(2);
  });

  it("is empty when the curated output is missing", async () => {
    const set = await new CuratedAdapter().load(at("missing.json"));
    expect(set.symbols.size).toBe(0);
  });
});

describe("readJsonArtifact", () => {
  it("treats malformed JSON like a missing file", async () => {
    expect(await readJsonArtifact(at("broken.json"), "test", z.unknown())).toBeNull();
    expect((await readJsonArtifactDetailed(at("broken.json"), "test", z.unknown())).status).toBe("malformed");
    expect((await readJsonArtifactDetailed(at("absent.json"), "test", z.unknown())).status).toBe("missing");
  });

  it("treats a schema mismatch as malformed", async () => {
    const r = await readJsonArtifactDetailed(at("orphanet.json"), "test", z.array(z.string()));
    expect(r.status).toBe("malformed");
  });
});
