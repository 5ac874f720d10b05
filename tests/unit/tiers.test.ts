import { describe, expect, it } from "vitest";
import { TIER_FALLBACKS, parseTierParam, resolveTier, tierUnavailable, unavailableFailure } from "../../src/serving/tiers.js";
import { gene, snapshot } from "./fixtures.js";

const curatedOnly = snapshot({ curated: { SOX9: { in_go: true } } });

describe("resolveTier", () => {
  it("serves a tier that is loaded", () => {
    const s = snapshot({ curated: { SOX9: { in_go: true } }, expanded: [gene("PAX3")] });
    expect(resolveTier("expanded", s)).toEqual({ kind: "served", requested: "expanded", tier: "expanded", fallback: false });
  });

  it("falls back from expanded to curated with a reason", () => {
    expect(resolveTier("expanded", curatedOnly)).toEqual({
      kind: "served",
      requested: "expanded",
      tier: "curated",
      fallback: true,
      reason: "Expanded data not available, serving curated",
    });
  });

  it("is unavailable when neither expanded nor curated is loaded", () => {
    const r = resolveTier("expanded", snapshot());
    expect(r.kind).toBe("unavailable");
    if (r.kind === "unavailable") expect(r.error).toBe("No gene data available");
  });

  it("never degrades the curated tier", () => {
    const r = resolveTier("curated", snapshot({ expanded: [gene("PAX3")] }));
    expect(r.kind).toBe("unavailable");
  });

  it("has no fallback for genome-wide or derived data", () => {
    expect(resolveTier("genome-wide", curatedOnly).kind).toBe("unavailable");
    expect(resolveTier("derived", curatedOnly).kind).toBe("unavailable");
    expect(TIER_FALLBACKS["genome-wide"]).toEqual(["genome-wide"]);
  });
});

describe("tierUnavailable", () => {
  it("reports the same error and hint as a failed resolution", () => {
    const r = resolveTier("derived", curatedOnly);
    expect(r.kind).toBe("unavailable");
    if (r.kind === "unavailable") expect(unavailableFailure(r)).toEqual(tierUnavailable("derived"));
    expect(tierUnavailable("derived")).toEqual({
      kind: "missing_artifact",
      error: "Gap candidates not available",
      hint: "Run: npm run derive",
    });
  });

  it("leaves the hint out when a tier has none", () => {
    expect(tierUnavailable("expanded")).toEqual({ kind: "missing_artifact", error: "No gene data available" });
  });
});

describe("parseTierParam", () => {
  it("maps the query spelling of each tier", () => {
    expect(parseTierParam("genome")).toEqual({ ok: true, tier: "genome-wide" });
    expect(parseTierParam("expanded")).toEqual({ ok: true, tier: "expanded" });
  });

  it("lists the valid names for an unknown tier", () => {
    expect(parseTierParam("bogus")).toEqual({
      ok: false,
      failure: { kind: "unknown_parameter", error: "Unknown tier: bogus", valid: ["curated", "expanded", "genome"] },
    });
    expect(parseTierParam("toString").ok).toBe(false);
  });
});
