import { STUDY_TYPES, type EpistemicMetadata, type RawEvidence, type StudyType } from "../schema/evidence.js";
import { round } from "./scorer.js";

/** Position in the evidence hierarchy. */
export const STUDY_TYPE_WEIGHTS: Readonly<Record<StudyType, number>> = {
  meta_analysis: 1.0,
  systematic_review: 0.95,
  rct: 0.9,
  cohort: 0.75,
  case_control: 0.6,
  in_vivo: 0.55,
  cross_sectional: 0.5,
  review: 0.5,
  case_report: 0.4,
  preprint: 0.35,
  in_vitro: 0.3,
  in_silico: 0.25,
  unknown: 0.25,
};

const MISSING_METADATA_WEIGHT = 0.4;

interface KeywordRule {
  type: StudyType;
  confidence: number;
  keywords: string[];
}

const KEYWORD_RULES: KeywordRule[] = [
  { type: "meta_analysis", confidence: 0.95, keywords: ["meta-analysis", "meta analysis", "metaanalysis"] },
  { type: "systematic_review", confidence: 0.95, keywords: ["systematic review"] },
  {
    type: "rct",
    confidence: 0.9,
    keywords: ["randomized controlled trial", "rct", "randomised", "double-blind", "placebo-controlled", "randomized trial"],
  },
  {
    type: "cohort",
    confidence: 0.85,
    keywords: ["cohort study", "prospective study", "longitudinal study", "prospective cohort"],
  },
  { type: "case_control", confidence: 0.85, keywords: ["case-control study", "case control", "case-control"] },
  {
    type: "in_vitro",
    confidence: 0.75,
    keywords: ["in vitro", "cell culture", "cultured cells", "cell-based", "cell line", "in vitro study"],
  },
  {
    type: "in_silico",
    confidence: 0.75,
    keywords: [
      "in silico",
      "computational model",
      "simulation",
      "molecular dynamics",
      "bioinformatics",
      "machine learning",
      "deep learning",
      "structural modeling",
    ],
  },
  {
    type: "cross_sectional",
    confidence: 0.8,
    keywords: ["cross-sectional", "cross sectional", "observational study", "retrospective analysis"],
  },
  { type: "case_report", confidence: 0.8, keywords: ["case report", "case series"] },
  {
    type: "in_vivo",
    confidence: 0.7,
    keywords: ["mouse model", "murine", "xenograft", "orthotopic", "animal model", "preclinical", "in vivo"],
  },
];

export interface StudyTypeDetection {
  studyType: StudyType;
  confidence: number;
}

export function detectStudyType(
  title: string,
  abstract = "",
  venue = "",
  publicationType = "",
): StudyTypeDetection {
  const venueLower = venue.toLowerCase();
  if (["nature reviews", "annual review", "trends in"].some((marker) => venueLower.includes(marker))) {
    return { studyType: "review", confidence: 0.9 };
  }
  if (["arxiv", "biorxiv", "medrxiv"].some((marker) => venueLower.includes(marker))) {
    return { studyType: "preprint", confidence: 0.95 };
  }

  const text = `${abstract} ${title} ${publicationType} ${venue}`.toLowerCase();
  for (const rule of KEYWORD_RULES) {
    if (rule.keywords.some((keyword) => text.includes(keyword))) {
      return { studyType: rule.type, confidence: rule.confidence };
    }
  }

  if (text.includes("review") && !text.includes("systematic")) {
    return { studyType: "review", confidence: 0.6 };
  }
  if (["preprint", "biorxiv", "medrxiv"].some((marker) => text.includes(marker))) {
    return { studyType: "preprint", confidence: 0.9 };
  }
  return { studyType: "unknown", confidence: 0.25 };
}

const SAMPLE_SIZE_PATTERNS: Array<{ pattern: RegExp; group: number }> = [
  { pattern: /n\s*=\s*(\d+)/, group: 1 },
  { pattern: /(\d+)\s+(patients|participants|subjects|individuals|cases)/, group: 1 },
  { pattern: /(enrolled|included|recruited)\s+(\d+)/, group: 2 },
  { pattern: /(sample|cohort)\s+of\s+(\d+)/, group: 2 },
];

export function extractSampleSize(abstract: string | undefined): number | null {
  if (!abstract) {
    return null;
  }
  const text = abstract.toLowerCase();
  for (const { pattern, group } of SAMPLE_SIZE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return Number(match[group]);
    }
  }
  return null;
}

/** A study type the source reported itself is taken with full confidence. */
export function extractEpistemicMetadata(
  evidence: Pick<RawEvidence, "title" | "abstract" | "venue" | "publicationType">,
  explicit?: StudyType,
): EpistemicMetadata {
  const detection: StudyTypeDetection = explicit
    ? { studyType: explicit, confidence: 1 }
    : detectStudyType(evidence.title, evidence.abstract, evidence.venue, evidence.publicationType);

  const sampleSize = extractSampleSize(evidence.abstract);
  let weight = STUDY_TYPE_WEIGHTS[detection.studyType];
  if (sampleSize) {
    if (sampleSize >= 1000) {
      weight = Math.min(weight * 1.1, 1);
    } else if (sampleSize < 50) {
      weight *= 0.9;
    }
  }

  return {
    studyType: detection.studyType,
    sampleSize,
    weight: round(weight, 2),
    confidence: round(detection.confidence, 2),
  };
}

export interface EvidenceStrengthV2 {
  strength: number;
  totalEvidence: number;
  studyTypeBreakdown: Partial<Record<StudyType, number>>;
  weightedTotal: number;
}

export function calculateEvidenceStrengthV2(
  records: Array<Pick<RawEvidence, "epistemicMetadata">>,
): EvidenceStrengthV2 {
  if (records.length === 0) {
    return { strength: 0, totalEvidence: 0, studyTypeBreakdown: {}, weightedTotal: 0 };
  }

  let weightedSum = 0;
  const breakdown: Partial<Record<StudyType, number>> = {};
  for (const record of records) {
    const weight = record.epistemicMetadata?.weight ?? MISSING_METADATA_WEIGHT;
    const studyType = record.epistemicMetadata?.studyType ?? "unknown";
    weightedSum += weight;
    breakdown[studyType] = (breakdown[studyType] ?? 0) + 1;
  }

  return {
    strength: round(Math.min(weightedSum / records.length, 1), 2),
    totalEvidence: records.length,
    studyTypeBreakdown: breakdown,
    weightedTotal: round(weightedSum, 2),
  };
}

function titleCase(studyType: string): string {
  return studyType
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function formatWeight(weight: number): string {
  return Number.isInteger(weight) ? weight.toFixed(1) : String(weight);
}

export function formatEpistemicConfidence(data: EvidenceStrengthV2): string {
  const lines = [
    "## 🧬 Epistemic Confidence",
    "",
    `**Evidence Strength**: ${data.strength.toFixed(2)} (epistemic-weighted, n=${data.totalEvidence})`,
    "",
  ];

  const entries = STUDY_TYPES.flatMap((type) => {
    const count = data.studyTypeBreakdown[type];
    return count ? [{ type, count, weight: STUDY_TYPE_WEIGHTS[type] }] : [];
  });
  entries.sort((a, b) => b.weight - a.weight);

  if (entries.length > 0) {
    lines.push("**Study Type Breakdown**:");
    for (const { type, count, weight } of entries) {
      const emoji = weight >= 0.8 ? "🟢" : weight >= 0.6 ? "🟡" : "🟠";
      lines.push(`- ${emoji} ${titleCase(type)}: ${count} (weight: ${formatWeight(weight)})`);
    }
  }

  return lines.join("\n");
}
