export const STUDY_TYPES = [
  "meta_analysis",
  "systematic_review",
  "rct",
  "cohort",
  "case_control",
  "in_vivo",
  "cross_sectional",
  "review",
  "case_report",
  "preprint",
  "in_vitro",
  "in_silico",
  "unknown",
] as const;

export type StudyType = (typeof STUDY_TYPES)[number];

export const EVIDENCE_TIERS = [
  "TIER_1_EXCEPTIONAL",
  "TIER_2_HIGH",
  "TIER_3_MODERATE",
  "TIER_4_LOW",
  "TIER_5_MARGINAL",
] as const;

export type EvidenceTier = (typeof EVIDENCE_TIERS)[number];

export interface EpistemicMetadata {
  studyType: StudyType;
  sampleSize: number | null;
  weight: number;
  confidence: number;
}

/** What a source connector returns before ids and scores are assigned. */
export interface RawEvidence {
  source: string;
  title: string;
  citation: string;
  url: string;
  excerpts: string[];
  keyFindings: string[];
  abstract?: string;
  /** Source family, e.g. "literature", "clinical", "protein". */
  domain?: string;
  /** Publication type reported by the source, used for study-type detection. */
  publicationType?: string;
  venue?: string;
  epistemicMetadata?: EpistemicMetadata;
}

export interface EvidenceScores {
  relevanceScore: number;
  qualityScore: number;
  recencyScore: number;
  impactScore: number;
  confidenceScore: number;
}

export interface EvidenceRecord extends RawEvidence, EvidenceScores {
  id: string;
  domainRelevance: number;
  evidenceTier: EvidenceTier;
}
