import { describe, expect, it } from "vitest";
import { EvidenceDeduplicator, signatureOf } from "../src/evidence/deduplicator.js";
import { calculateDomainRelevance, domainContext, extractTargetConcepts } from "../src/evidence/domainRelevance.js";
import {
  calculateEvidenceStrengthV2,
  detectStudyType,
  extractEpistemicMetadata,
  extractSampleSize,
  formatEpistemicConfidence,
} from "../src/evidence/epistemic.js";
import { dedupeTerms, extractMedicalConcepts, QueryExpander } from "../src/evidence/queryExpander.js";
import { blendConfidence, combineConfidence, EvidenceScorer, evidenceTier, rankEvidence } from "../src/evidence/scorer.js";
import { similarityRatio } from "../src/evidence/similarity.js";
import type { EvidenceScores, RawEvidence } from "../src/schema/evidence.js";
import { makeConceptMap } from "./fixtures.js";

type ScoredRaw = RawEvidence & Partial<EvidenceScores>;

function raw(overrides: Partial<ScoredRaw> = {}): ScoredRaw {
  return {
    source: "PubMed",
    title: "NLRP3 inhibition in atherosclerosis",
    citation: "",
    url: "",
    excerpts: [],
    keyFindings: [],
    ...overrides,
  };
}

describe("EvidenceScorer", () => {
  const scorer = new EvidenceScorer({ now: () => new Date("2026-06-01T00:00:00.000Z") });

  it("scores relevance from term hits with a title bonus", () => {
    expect(scorer.relevance(raw(), ["NLRP3", "plaque rupture"])).toBe(0.6);
    expect(scorer.relevance(raw(), [])).toBe(0.5);
  });

  it("adjusts source credibility by citation markers", () => {
    expect(scorer.quality(raw({ source: "Zenodo", citation: "Zenodo preprint 2021" }))).toBe(0.7);
    expect(scorer.quality(raw({ source: "Crossref", citation: "Lancet (2020) published", keyFindings: ["x"] }))).toBe(1);
    expect(scorer.quality(raw({ source: "Mystery" }))).toBe(0.5);
  });

  it("decays recency over a five year half-life", () => {
    expect(scorer.recency(raw({ citation: "Circulation. 2021;143:1" }))).toBe(0.368);
    expect(scorer.recency(raw())).toBe(0.5);
  });

  it("reads impact from citations, trials and votes", () => {
    expect(scorer.impact(raw({ citation: "Cited by 120 citations" }))).toBe(0.821);
    expect(scorer.impact(raw({ source: "ClinicalTrials.gov" }))).toBe(0.8);
    expect(scorer.impact(raw({ source: "Kaggle", citation: "Dataset, 30 votes" }))).toBe(0.8);
  });

  it("combines and blends confidence", () => {
    expect(
      combineConfidence({ relevanceScore: 0.6, qualityScore: 0.7, recencyScore: 0.368, impactScore: 0.821 }),
    ).toBe(0.639);
    expect(blendConfidence(0.8, 0.5)).toBe(0.71);
  });

  it("maps confidence to tiers", () => {
    expect([0.85, 0.75, 0.6, 0.45, 0.44].map(evidenceTier)).toEqual([
      "TIER_1_EXCEPTIONAL",
      "TIER_2_HIGH",
      "TIER_3_MODERATE",
      "TIER_4_LOW",
      "TIER_5_MARGINAL",
    ]);
  });

  it("ranks by confidence and keeps ties in order", () => {
    const ranked = rankEvidence([
      { id: "a", confidenceScore: 0.5 },
      { id: "b", confidenceScore: 0.9 },
      { id: "c", confidenceScore: 0.5 },
    ]);
    expect(ranked.map((record) => record.id)).toEqual(["b", "a", "c"]);
    expect(rankEvidence(ranked, 2).map((record) => record.id)).toEqual(["b", "a"]);
  });
});

describe("scoring properties", () => {
  it("scores a current registered trial near the top", () => {
    const scorer = new EvidenceScorer({ now: () => new Date("2024-06-01T00:00:00.000Z") });
    const trial = raw({
      source: "ClinicalTrials.gov",
      title: "Colchicine after myocardial infarction",
      citation: "NCT01234567 - COMPLETED - 2024",
    });

    expect(scorer.score(trial, ["colchicine"])).toEqual({
      relevanceScore: 1,
      qualityScore: 0.95,
      recencyScore: 1,
      impactScore: 0.8,
      confidenceScore: 0.945,
    });
  });

  it("keeps every score in range and the confidence on its weights", () => {
    const scorer = new EvidenceScorer({ now: () => new Date("2026-06-01T00:00:00.000Z") });
    const records = [
      raw(),
      raw({ source: "Crossref", citation: "Nature Medicine (1998) published, 5000 citations", keyFindings: ["x"] }),
      raw({ source: "arXiv", title: "Unrelated", citation: "arXiv preprint 2026" }),
      raw({ source: "Kaggle", citation: "Dataset, 900 votes, 20000 downloads" }),
    ];

    for (const record of records) {
      const scores = scorer.score(record, ["NLRP3", "plaque rupture", "caspase"]);
      for (const value of Object.values(scores)) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
      const weighted =
        scores.relevanceScore * 0.35 + scores.qualityScore * 0.3 + scores.impactScore * 0.2 + scores.recencyScore * 0.15;
      expect(scores.confidenceScore).toBe(Math.round(weighted * 1000) / 1000);
    }
  });
});

describe("similarityRatio", () => {
  it("matches common blocks over combined length", () => {
    expect(similarityRatio("", "")).toBe(1);
    expect(similarityRatio("abcd", "abcd")).toBe(1);
    expect(similarityRatio("abcd", "abce")).toBe(0.75);
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
    expect(similarityRatio("abc", "xyz")).toBe(0);
  });
});

describe("EvidenceDeduplicator", () => {
  it("signs records by identifier, then url, then title", () => {
    expect(signatureOf(raw({ url: "https://doi.org/10.1000/xyz123/" }))).toBe("doi:10.1000/xyz123");
    expect(signatureOf(raw({ citation: "Circulation. PMID: 12345" }))).toBe("pmid:12345");
    expect(signatureOf(raw({ citation: "Registered as nct01234567" }))).toBe("nct:NCT01234567");
    expect(signatureOf(raw({ url: "http://example.org/paper/" }))).toBe("url:example.org/paper");
    expect(signatureOf(raw({ title: "Hello, World!  Again" }))).toBe("title:hello world again");
  });

  it("keeps the better of exact and fuzzy duplicates", () => {
    const first = raw({ url: "https://doi.org/10.1000/abc", title: "NLRP3 inhibition reduces plaque", qualityScore: 0.6 });
    const second = raw({ citation: "doi 10.1000/abc", title: "NLRP3 inhibition reduces plaque", qualityScore: 0.9 });
    const fuzzy = raw({ url: "https://x.org/c", title: "NLRP3 inhibition reduces plaques", qualityScore: 0.5 });
    const other = raw({ url: "https://x.org/d", title: "Statin adherence in elderly patients", qualityScore: 0.4 });
    const deduplicator = new EvidenceDeduplicator();

    expect(deduplicator.deduplicate([first, second, fuzzy, other])).toEqual([second, other]);
    expect(deduplicator.deduplicate([first, second, fuzzy, other], { keepHighestQuality: false })).toEqual([
      first,
      other,
    ]);
  });

  it("collapses records with the same DOI whatever their titles", () => {
    const first = raw({ url: "https://doi.org/10.1000/abc", title: "Colchicine trial outcomes", qualityScore: 0.6 });
    const second = raw({ citation: "doi 10.1000/abc", title: "NLRP3 inhibition reduces plaque", qualityScore: 0.9 });

    expect(new EvidenceDeduplicator().deduplicate([first, second])).toEqual([second]);
  });

  it("is idempotent and never grows the list", () => {
    const records = [
      raw({ url: "https://doi.org/10.1000/abc", title: "NLRP3 inhibition reduces plaque", qualityScore: 0.6 }),
      raw({ url: "https://x.org/c", title: "NLRP3 inhibition reduces plaques", qualityScore: 0.8 }),
      raw({ citation: "PMID: 12345", title: "Statin adherence in elderly patients" }),
      raw({ url: "https://pubmed.ncbi.nlm.nih.gov/12345/", title: "Statin adherence" }),
      raw({ url: "https://x.org/d", title: "Colchicine after myocardial infarction" }),
    ];
    const deduplicator = new EvidenceDeduplicator();

    const once = deduplicator.deduplicate(records);
    expect(once.length).toBeLessThanOrEqual(records.length);
    expect(once).toHaveLength(3);
    expect(deduplicator.deduplicate(once)).toEqual(once);
  });

  it("collapses a title cluster bridged by a later, better record", () => {
    const a = raw({ title: "abcdefghij klmnopqrst", qualityScore: 0.5 });
    const c = raw({ title: "abcdefghij klmnopXXXX", qualityScore: 0.5 });
    const b = raw({ title: "abcdefghij klmnopqXXX", qualityScore: 0.9 });
    const deduplicator = new EvidenceDeduplicator();

    expect(deduplicator.isFuzzyDuplicate(a, c)).toBe(false);
    const once = deduplicator.deduplicate([a, c, b]);
    expect(once).toEqual([b]);
    expect(deduplicator.deduplicate(once)).toEqual(once);
  });

  it("keeps unrelated records when a bridge record loses on quality", () => {
    const a = raw({ title: "abcdefghij klmnopqrst", qualityScore: 0.9 });
    const c = raw({ title: "abcdefghij klmnopXXXX", qualityScore: 0.5 });
    const b = raw({ title: "abcdefghij klmnopqXXX", qualityScore: 0.7 });
    const other = raw({ title: "Statin adherence in elderly patients" });
    const deduplicator = new EvidenceDeduplicator();

    const once = deduplicator.deduplicate([a, c, other, b]);
    expect(once).toEqual([a, other]);
    expect(deduplicator.deduplicate(once)).toEqual(once);
  });

  it("strips trailing punctuation from citation DOIs", () => {
    const cited = raw({ citation: "Lee K. Plaque regression. Cardiol J. 2021. doi:10.1000/abc.", title: "Plaque regression" });
    const linked = raw({ url: "https://doi.org/10.1000/abc", title: "Macrophage efferocytosis", qualityScore: 0.8 });

    expect(signatureOf(cited)).toBe("doi:10.1000/abc");
    expect(signatureOf(raw({ citation: "see 10.1000/xyz; and PMID 1" }))).toBe("doi:10.1000/xyz");
    expect(new EvidenceDeduplicator().deduplicate([cited, linked])).toEqual([linked]);
  });

  it("merges records that share a signature", () => {
    const merged = new EvidenceDeduplicator().merge([
      raw({ url: "https://x.org/a", keyFindings: ["f1"], confidenceScore: 0.7 }),
      raw({ source: "Crossref", url: "https://x.org/a", keyFindings: ["f1", "f2"], confidenceScore: 0.9 }),
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0].source).toBe("Crossref (also in: PubMed)");
    expect(merged[0].keyFindings).toEqual(["f1", "f2"]);
    expect(merged[0].confidenceScore).toBe(0.9);
  });
});

describe("epistemic metadata", () => {
  it("detects study types from venue and text", () => {
    expect(detectStudyType("A randomized controlled trial of colchicine")).toEqual({ studyType: "rct", confidence: 0.9 });
    expect(detectStudyType("Inflammasome biology", "", "bioRxiv")).toEqual({ studyType: "preprint", confidence: 0.95 });
    expect(detectStudyType("Plaque inflammation", "", "Nature Reviews Cardiology")).toEqual({
      studyType: "review",
      confidence: 0.9,
    });
    expect(detectStudyType("Narrative review of inflammasome targets")).toEqual({ studyType: "review", confidence: 0.6 });
    expect(detectStudyType("Something else")).toEqual({ studyType: "unknown", confidence: 0.25 });
  });

  it("extracts sample sizes", () => {
    expect(extractSampleSize("We enrolled 1200 patients")).toBe(1200);
    expect(extractSampleSize("Mice (n = 45) were treated")).toBe(45);
    expect(extractSampleSize(undefined)).toBeNull();
  });

  it("scales the weight by sample size", () => {
    expect(
      extractEpistemicMetadata({ title: "A randomized controlled trial", abstract: "We enrolled 1200 patients" }),
    ).toEqual({ studyType: "rct", sampleSize: 1200, weight: 0.99, confidence: 0.9 });
    expect(extractEpistemicMetadata({ title: "A case-control study", abstract: "n = 30" })).toEqual({
      studyType: "case_control",
      sampleSize: 30,
      weight: 0.54,
      confidence: 0.85,
    });
    expect(extractEpistemicMetadata({ title: "Anything" }, "meta_analysis")).toEqual({
      studyType: "meta_analysis",
      sampleSize: null,
      weight: 1,
      confidence: 1,
    });
  });

  it("averages weights and formats the breakdown", () => {
    const strength = calculateEvidenceStrengthV2([
      { epistemicMetadata: { studyType: "rct", sampleSize: null, weight: 0.9, confidence: 0.9 } },
      {},
    ]);
    expect(strength).toEqual({
      strength: 0.65,
      totalEvidence: 2,
      studyTypeBreakdown: { rct: 1, unknown: 1 },
      weightedTotal: 1.3,
    });
    expect(formatEpistemicConfidence(strength).split("\n")).toEqual([
      "## 🧬 Epistemic Confidence",
      "",
      "**Evidence Strength**: 0.65 (epistemic-weighted, n=2)",
      "",
      "**Study Type Breakdown**:",
      "- 🟢 Rct: 1 (weight: 0.9)",
      "- 🟠 Unknown: 1 (weight: 0.25)",
    ]);
  });
});

describe("domain relevance", () => {
  it("collects concept terms and salient goal words", () => {
    expect(extractTargetConcepts(makeConceptMap(), "Slow atherosclerotic plaque growth using novel inhibitors.")).toEqual([
      "nlrp3",
      "atherosclerotic",
      "plaque",
      "growth",
      "inhibitors",
    ]);
  });

  it("rewards concept coverage and context boosts", () => {
    expect(
      calculateDomainRelevance({ title: "NLRP3 drives plaque growth" }, ["nlrp3", "plaque", "growth", "inhibitors"], "cardiology"),
    ).toBe(0.725);
    expect(
      calculateDomainRelevance({ title: "CAR-T therapy for glioblastoma" }, [], "oncology:glioblastoma car-t"),
    ).toBe(0.8);
  });

  it("penalises transferrin receptor hits outside the brain", () => {
    expect(calculateDomainRelevance({ title: "Transferrin receptor uptake in liver" }, [], "cardiology")).toBe(0.35);
  });

  it("builds a context key from domain and goal", () => {
    expect(domainContext("oncology", "")).toBe("oncology");
    expect(domainContext("oncology", "Shrink tumours")).toBe("oncology:Shrink tumours");
  });
});

describe("QueryExpander", () => {
  const expander = new QueryExpander({
    synonyms: { heart: ["cardiac", "cardiovascular", "myocardial", "coronary"] },
    domainKeywords: { cardiology: ["atherosclerosis", "plaque"] },
    acronyms: { MI: "myocardial infarction" },
  });

  it("adds synonyms, domain keywords, acronyms and concepts", () => {
    expect(expander.expand("Heart plaque MI", { domain: "cardiology" })).toEqual([
      "Heart plaque MI",
      "cardiac",
      "cardiovascular",
      "myocardial",
      "plaque",
      "myocardial infarction",
    ]);
    expect(expander.expand("Heart plaque MI", { domain: "cardiology", maxTerms: 3 })).toEqual([
      "Heart plaque MI",
      "cardiac",
      "cardiovascular",
    ]);
  });

  it("extracts structural and disease phrases", () => {
    expect(extractMedicalConcepts("Insulin receptor signaling in kidney disease")).toEqual([
      "insulin receptor",
      "receptor signaling",
      "kidney disease",
    ]);
  });

  it("dedupes case-insensitively", () => {
    expect(dedupeTerms(["NLRP3", "nlrp3", "IL-1"])).toEqual(["NLRP3", "IL-1"]);
  });
});
