import { describe, expect, it } from "vitest";
import {
  capEthicsVerdict,
  cleanDiagnosticText,
  cleanTextBlocks,
  confidenceLabel,
  consolidateEvidence,
  dedupeParagraphs,
  detectMode,
  evidenceStrength,
  feasibilityLabel,
  filterCrossDomain,
  inferMissingScore,
  ivdTimelineCost,
  orNA,
  pluralizeDomains,
  punctuationGuard,
  sentenceCase,
  smoothTiers,
  softenAccuracyClaims,
  tierOf,
} from "../src/report/guards.js";

function record(id: string, relevanceScore: number, qualityScore: number, domain?: string) {
  return { id, title: `Study ${id}`, source: "PubMed", relevanceScore, qualityScore, domain };
}

describe("evidence tiers", () => {
  it("assigns tiers at the threshold boundaries", () => {
    expect(tierOf(0.8, 0.8)).toBe("T1");
    expect(tierOf(0.79, 0.9)).toBe("T2");
    expect(tierOf(0.7, 0.7)).toBe("T2");
    expect(tierOf(0.65, 0.5)).toBe("T3");
    expect(tierOf(0.5, 0.6)).toBe("T3");
    expect(tierOf(0.5, 0.59)).toBe("T4");
  });

  it("moves part of an all-T3 distribution to T2 once there are fifteen records", () => {
    expect(smoothTiers({ T1: 0, T2: 0, T3: 15, T4: 0 })).toEqual({ T1: 0, T2: 2, T3: 13, T4: 0 });
    expect(smoothTiers({ T1: 0, T2: 0, T3: 14, T4: 0 })).toEqual({ T1: 0, T2: 0, T3: 14, T4: 0 });
    expect(smoothTiers({ T1: 1, T2: 0, T3: 20, T4: 0 })).toEqual({ T1: 1, T2: 0, T3: 20, T4: 0 });
  });

  it("weights tiers into a strength", () => {
    expect(evidenceStrength({ T1: 0, T2: 0, T3: 0, T4: 0 })).toBe(0);
    expect(evidenceStrength({ T1: 2, T2: 0, T3: 0, T4: 2 })).toBe(0.6);
    expect(evidenceStrength({ T1: 0, T2: 2, T3: 13, T4: 0 })).toBe(0.44);
  });

  it("consolidates duplicates by id, then by title and source", () => {
    const consolidated = consolidateEvidence([
      record("ev_1", 0.9, 0.9, "literature"),
      record("ev_1", 0.9, 0.9, "literature"),
      record("ev_2", 0.5, 0.5),
      { title: "Untracked", source: "Zenodo", relevanceScore: 0.65, qualityScore: 0.2 },
      { title: "Untracked", source: "Zenodo", relevanceScore: 0.65, qualityScore: 0.2 },
    ]);

    expect(consolidated.total).toBe(3);
    expect(consolidated.tiers).toEqual({ T1: 1, T2: 0, T3: 1, T4: 1 });
    expect(consolidated.domains).toEqual(["Unknown", "literature"]);
  });

  it("reports zero strength for no evidence", () => {
    expect(consolidateEvidence([])).toEqual({
      total: 0,
      tiers: { T1: 0, T2: 0, T3: 0, T4: 0 },
      strength: 0,
      domains: [],
    });
  });
});

describe("labels and inference", () => {
  it("labels feasibility and confidence at their bounds", () => {
    expect(feasibilityLabel(0.8)).toBe("High (Green)");
    expect(feasibilityLabel(0.6)).toBe("Moderate-High (Green)");
    expect(feasibilityLabel(0.4)).toBe("Moderate (Amber)");
    expect(feasibilityLabel(0.39)).toBe("Low (Red)");
    expect(confidenceLabel(0.8)).toBe("High");
    expect(confidenceLabel(0.79)).toBe("Moderate-High");
    expect(confidenceLabel(0.4)).toBe("Moderate");
    expect(confidenceLabel(0.1)).toBe("Low");
  });

  it("clamps present scores and infers missing ones", () => {
    expect(inferMissingScore(1.4, 0.5, 0.8, 0.6)).toBe(1);
    expect(inferMissingScore(0.42, 0.5, 0.8, 0.6)).toBe(0.42);
    expect(inferMissingScore(undefined, 0.5, 0.8, 0.6)).toBeCloseTo(0.6, 10);
    expect(inferMissingScore(undefined, 0, 0, 0)).toBe(0.01);
    expect(inferMissingScore(undefined, 1, 1, 1)).toBe(0.99);
  });

  it("caps a green ethics verdict on weak evidence only", () => {
    expect(capEthicsVerdict(0.44, "green")).toBe("amber");
    expect(capEthicsVerdict(0.45, "green")).toBe("green");
    expect(capEthicsVerdict(0.1, "red")).toBe("red");
  });
});

describe("mode detection", () => {
  it("counts diagnostic against therapeutic keywords", () => {
    expect(detectMode("A blood biomarker assay for early detection")).toBe("diagnostic");
    expect(detectMode("Inhibitor therapy with targeted drug delivery")).toBe("therapeutic");
  });

  it("falls back to therapeutic on a tie", () => {
    expect(detectMode("Nothing to see")).toBe("therapeutic");
  });

  it("honours an explicit override", () => {
    expect(detectMode("A blood biomarker assay for early detection", "therapeutic")).toBe("therapeutic");
  });
});

describe("text guards", () => {
  it("strips therapeutic phrasing from diagnostic text", () => {
    const text =
      "Exosome panel, leveraging cross-domain innovations such as self-healing polymers for stable biomarker capture. " +
      "Uses lipid nanoparticles .";
    expect(cleanDiagnosticText(text, "diagnostic")).toBe("Exosome panel. Uses.");
    expect(cleanDiagnosticText(text, "therapeutic")).toBe(text);
  });

  it("softens accuracy claims in diagnostic mode", () => {
    expect(softenAccuracyClaims("Achieves >90% accuracy in pilots", "diagnostic")).toBe(
      "Achieves target AUC 0.80-0.88 in external validation (cohort-dependent) in pilots",
    );
    expect(softenAccuracyClaims("Achieves >90% accuracy in pilots", "therapeutic")).toBe(
      "Achieves >90% accuracy in pilots",
    );
  });

  it("deduplicates paragraphs case-insensitively", () => {
    expect(dedupeParagraphs("A\n\na\nB")).toBe("A\nB");
  });

  it("repairs spacing around punctuation", () => {
    expect(punctuationGuard("Done .. next , ok .")).toBe("Done. next, ok.");
  });

  it("restores section breaks and collapses repeated lines", () => {
    expect(cleanTextBlocks("Score is fine**Ethics Assessment**")).toBe("Score is fine\n\n**Ethics Assessment**");
    expect(cleanTextBlocks("end.Next")).toBe("end. Next");
    expect(cleanTextBlocks("Line one\nline one\n\n\nLine two")).toBe("Line one\n\nLine two");
  });

  it("formats small helpers", () => {
    expect(sentenceCase("abc")).toBe("Abc");
    expect(sentenceCase("")).toBe("");
    expect(pluralizeDomains(0)).toBe("multiple domains");
    expect(pluralizeDomains(1)).toBe("one domain");
    expect(pluralizeDomains(3)).toBe("3 domains");
    expect(orNA("  ")).toBe("N/A");
    expect(orNA(null)).toBe("N/A");
    expect(orNA(0)).toBe("0");
  });

  it("drops therapeutic transfers in diagnostic mode", () => {
    expect(filterCrossDomain(["LNP carrier", "Graph analytics"], "diagnostic")).toEqual(["Graph analytics"]);
    expect(filterCrossDomain(["LNP carrier"], "therapeutic")).toEqual(["LNP carrier"]);
  });

  it("bands IVD timeline and cost by composite score", () => {
    expect(ivdTimelineCost(0.7).timeline).toBe("12-18 months to clinical validation (IVD/CLIA track)");
    expect(ivdTimelineCost(0.5).timeline).toBe("18-24 months to clinical validation (IVD/CLIA track)");
    expect(ivdTimelineCost(0.49).cost).toBe(
      "€600,000-€1,000,000 (method development, extensive validation, regulatory hurdles)",
    );
  });
});
