import type { EvidenceRecord, EvidenceScores, EvidenceTier, RawEvidence } from "../schema/evidence.js";

export const SOURCE_CREDIBILITY: Readonly<Record<string, number>> = {
  PubMed: 0.95,
  Crossref: 0.9,
  "ClinicalTrials.gov": 0.95,
  UniProt: 0.95,
  KEGG: 0.9,
  ChEMBL: 0.9,
  PubChem: 0.85,
  arXiv: 0.7,
  Zenodo: 0.75,
  Kaggle: 0.7,
};

const HIGH_IMPACT_JOURNALS = [
  "nature",
  "science",
  "cell",
  "lancet",
  "nejm",
  "jama",
  "pnas",
  "nature medicine",
  "nature biotechnology",
];
const PEER_REVIEW_MARKERS = ["peer-reviewed", "published", "journal"];
const PREPRINT_MARKERS = ["preprint", "arxiv", "biorxiv"];

const CONFIDENCE_WEIGHTS = {
  relevance: 0.35,
  quality: 0.3,
  impact: 0.2,
  recency: 0.15,
} as const;

const RECENCY_HALF_LIFE_YEARS = 5;

export type ScorableEvidence = Pick<RawEvidence, "source" | "title" | "citation" | "excerpts" | "keyFindings">;

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function clamp(value: number, min = 0, max = 1): number {
  return Math.min(max, Math.max(min, value));
}

export interface ScorerOptions {
  now?: () => Date;
}

export class EvidenceScorer {
  private readonly now: () => Date;

  constructor(options: ScorerOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  score(evidence: ScorableEvidence, queryTerms: string[]): EvidenceScores {
    const relevanceScore = this.relevance(evidence, queryTerms);
    const qualityScore = this.quality(evidence);
    const recencyScore = this.recency(evidence);
    const impactScore = this.impact(evidence);

    return {
      relevanceScore,
      qualityScore,
      recencyScore,
      impactScore,
      confidenceScore: combineConfidence({ relevanceScore, qualityScore, recencyScore, impactScore }),
    };
  }

  relevance(evidence: ScorableEvidence, queryTerms: string[]): number {
    if (queryTerms.length === 0) {
      return 0.5;
    }

    const title = evidence.title.toLowerCase();
    const combined = `${title} ${evidence.excerpts.join(" ").toLowerCase()} ${evidence.keyFindings
      .join(" ")
      .toLowerCase()}`;

    let matches = 0;
    for (const term of queryTerms) {
      const lower = term.toLowerCase();
      if (combined.includes(lower)) {
        matches += 1;
      } else if (lower.split(/\s+/).some((word) => word.length > 0 && combined.includes(word))) {
        matches += 0.5;
      }
    }

    let relevance = Math.min(matches / queryTerms.length, 1);
    const titleMatches = queryTerms.filter((term) => title.includes(term.toLowerCase())).length;
    if (titleMatches > 0) {
      relevance = Math.min(relevance + titleMatches * 0.1, 1);
    }
    return round(relevance, 3);
  }

  quality(evidence: ScorableEvidence): number {
    let quality = SOURCE_CREDIBILITY[evidence.source] ?? 0.5;
    const citation = evidence.citation.toLowerCase();

    if (HIGH_IMPACT_JOURNALS.some((journal) => citation.includes(journal))) {
      quality = Math.min(quality + 0.05, 1);
    }
    if (PEER_REVIEW_MARKERS.some((marker) => citation.includes(marker))) {
      quality = Math.min(quality + 0.02, 1);
    }
    if (PREPRINT_MARKERS.some((marker) => citation.includes(marker))) {
      quality = Math.max(quality - 0.05, 0.3);
    }
    if (evidence.keyFindings.length > 0) {
      quality = Math.min(quality + 0.03, 1);
    }
    return round(quality, 3);
  }

  recency(evidence: ScorableEvidence): number {
    const match = /\b(19|20)\d{2}\b/.exec(evidence.citation);
    if (!match) {
      return 0.5;
    }
    const yearsOld = this.now().getFullYear() - Number(match[0]);
    return round(clamp(Math.exp(-yearsOld / RECENCY_HALF_LIFE_YEARS)), 3);
  }

  impact(evidence: ScorableEvidence): number {
    const citation = evidence.citation.toLowerCase();
    let impact = 0.5;

    const citations = /(\d+)\s+citation/.exec(citation);
    if (citations) {
      impact = Math.min(0.3 + Math.log10(Number(citations[1]) + 1) / 4, 1);
    }

    if (citation.includes("downloads")) {
      const downloads = /(\d+)\s+download/.exec(citation);
      if (downloads) {
        impact = Math.max(impact, Math.min(0.4 + Math.log10(Number(downloads[1]) + 1) / 5, 1));
      }
    }

    if (evidence.source === "ClinicalTrials.gov") {
      impact = Math.max(impact, 0.8);
    }

    if (citation.includes("votes")) {
      const votes = /(\d+)\s+vote/.exec(citation);
      if (votes) {
        impact = Math.max(impact, Math.min(0.5 + Number(votes[1]) / 100, 0.9));
      }
    }

    return round(impact, 3);
  }
}

export function combineConfidence(scores: Omit<EvidenceScores, "confidenceScore">): number {
  return round(
    scores.relevanceScore * CONFIDENCE_WEIGHTS.relevance +
      scores.qualityScore * CONFIDENCE_WEIGHTS.quality +
      scores.impactScore * CONFIDENCE_WEIGHTS.impact +
      scores.recencyScore * CONFIDENCE_WEIGHTS.recency,
    3,
  );
}

/** Folds domain relevance into an already combined confidence. */
export function blendConfidence(confidence: number, domainRelevance: number): number {
  return round(0.7 * confidence + 0.3 * domainRelevance, 3);
}

export function evidenceTier(confidence: number): EvidenceTier {
  if (confidence >= 0.85) return "TIER_1_EXCEPTIONAL";
  if (confidence >= 0.75) return "TIER_2_HIGH";
  if (confidence >= 0.6) return "TIER_3_MODERATE";
  if (confidence >= 0.45) return "TIER_4_LOW";
  return "TIER_5_MARGINAL";
}

/** Stable: records with equal confidence keep their incoming order. */
export function rankEvidence<T extends Pick<EvidenceRecord, "confidenceScore">>(records: T[], topK?: number): T[] {
  const ranked = records
    .map((record, index) => ({ record, index }))
    .sort((a, b) => b.record.confidenceScore - a.record.confidenceScore || a.index - b.index)
    .map(({ record }) => record);
  return topK ? ranked.slice(0, topK) : ranked;
}
