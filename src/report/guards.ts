import { clamp, round } from "../evidence/scorer.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { DetectedMode, TierCounts } from "../schema/run.js";
import type { EthicsVerdict } from "../schema/stages.js";

export const TIER_THRESHOLDS = {
  T1: 0.8,
  T2: 0.7,
  T3: 0.6,
} as const;

export const TIER_WEIGHTS: Readonly<TierCounts> = { T1: 1, T2: 0.7, T3: 0.4, T4: 0.2 };

export const SMOOTHING = {
  minTotal: 15,
  t3Share: 0.9,
  moveShare: 0.15,
} as const;

export const ETHICS_CAP_STRENGTH = 0.45;

export const INFERENCE_FALLBACK_WEIGHTS = {
  technicalFeasibility: 0.6,
  clinicalTranslatability: 0.6,
  safetyProfile: 0.8,
  regulatoryPathReady: 0.4,
} as const;

const DIAGNOSTIC_KEYWORDS = [
  "diagnostic",
  "biomarker",
  "detection",
  "screening",
  "test",
  "assay",
  "exosome",
  "blood test",
  "biopsy",
  "imaging marker",
  "predictor",
];

const THERAPEUTIC_KEYWORDS = [
  "treatment",
  "therapy",
  "drug",
  "intervention",
  "molecule",
  "compound",
  "inhibitor",
  "agonist",
  "delivery",
];

const THERAPEUTIC_PHRASES = [
  /,\s*leveraging cross-domain innovations such as [^.]+polymers for stable biomarker capture/gi,
  /lipid nanoparticles?/gi,
  /self-healing polymers?/gi,
  /lnp delivery/gi,
  /drug delivery/gi,
];

const THERAPEUTIC_TRANSFER_MARKERS = ["lnp", "lipid nanoparticle", "self-healing", "polymer", "drug delivery"];

type TieredRecord = Pick<EvidenceRecord, "relevanceScore" | "qualityScore" | "title" | "source"> &
  Partial<Pick<EvidenceRecord, "id" | "domain">>;

export interface ConsolidatedEvidence {
  total: number;
  tiers: TierCounts;
  strength: number;
  domains: string[];
}

export function tierOf(relevance: number, quality: number): keyof TierCounts {
  if (relevance >= TIER_THRESHOLDS.T1 && quality >= TIER_THRESHOLDS.T1) {
    return "T1";
  }
  if (relevance >= TIER_THRESHOLDS.T2 && quality >= TIER_THRESHOLDS.T2) {
    return "T2";
  }
  if (relevance >= TIER_THRESHOLDS.T3 || quality >= TIER_THRESHOLDS.T3) {
    return "T3";
  }
  return "T4";
}

/** Moves 15% of an all-T3 distribution up to T2 once there are enough records. */
export function smoothTiers(tiers: TierCounts): TierCounts {
  const total = tiers.T1 + tiers.T2 + tiers.T3 + tiers.T4;
  if (total >= SMOOTHING.minTotal && tiers.T1 === 0 && tiers.T2 === 0 && tiers.T3 / total > SMOOTHING.t3Share) {
    const move = Math.max(1, Math.floor(SMOOTHING.moveShare * total));
    return { ...tiers, T2: tiers.T2 + move, T3: tiers.T3 - move };
  }
  return { ...tiers };
}

export function evidenceStrength(tiers: TierCounts): number {
  const total = tiers.T1 + tiers.T2 + tiers.T3 + tiers.T4;
  if (total === 0) {
    return 0;
  }
  const weighted =
    tiers.T1 * TIER_WEIGHTS.T1 + tiers.T2 * TIER_WEIGHTS.T2 + tiers.T3 * TIER_WEIGHTS.T3 + tiers.T4 * TIER_WEIGHTS.T4;
  return round(weighted / total, 2);
}

/** The one place evidence counts, tiers and strength are derived from. */
export function consolidateEvidence(records: TieredRecord[]): ConsolidatedEvidence {
  const seen = new Set<string>();
  const unique: TieredRecord[] = [];
  for (const record of records) {
    const key = record.id ? record.id : `${record.title.trim()}||${record.source.trim()}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(record);
    }
  }

  const counted: TierCounts = { T1: 0, T2: 0, T3: 0, T4: 0 };
  for (const record of unique) {
    counted[tierOf(record.relevanceScore, record.qualityScore)] += 1;
  }
  const tiers = smoothTiers(counted);

  return {
    total: unique.length,
    tiers,
    strength: evidenceStrength(tiers),
    domains: [...new Set(unique.map((record) => record.domain ?? "Unknown"))].sort(),
  };
}

export function feasibilityLabel(composite: number): string {
  if (composite >= 0.8) {
    return "High (Green)";
  }
  if (composite >= 0.6) {
    return "Moderate-High (Green)";
  }
  if (composite >= 0.4) {
    return "Moderate (Amber)";
  }
  return "Low (Red)";
}

export function confidenceLabel(confidence: number): string {
  if (confidence >= 0.8) {
    return "High";
  }
  if (confidence >= 0.6) {
    return "Moderate-High";
  }
  if (confidence >= 0.4) {
    return "Moderate";
  }
  return "Low";
}

/** A present score is clamped; a missing one is inferred from the evidence and the run's confidence. */
export function inferMissingScore(
  value: number | undefined,
  strength: number,
  avgConfidence: number,
  fallbackWeight: number,
): number {
  if (value !== undefined) {
    return clamp(value);
  }
  return clamp(strength * 0.6 + avgConfidence * 0.3 + 0.1 * fallbackWeight, 0.01, 0.99);
}

export function capEthicsVerdict(strength: number, verdict: EthicsVerdict): EthicsVerdict {
  return strength < ETHICS_CAP_STRENGTH && verdict === "green" ? "amber" : verdict;
}

function modeScores(text: string): { diagnostic: number; therapeutic: number } {
  const lowered = text.toLowerCase();
  return {
    diagnostic: DIAGNOSTIC_KEYWORDS.filter((keyword) => lowered.includes(keyword)).length,
    therapeutic: THERAPEUTIC_KEYWORDS.filter((keyword) => lowered.includes(keyword)).length,
  };
}

export function detectMode(text: string, override: "auto" | DetectedMode = "auto"): DetectedMode {
  if (override !== "auto") {
    return override;
  }
  const { diagnostic, therapeutic } = modeScores(text);
  return diagnostic > therapeutic ? "diagnostic" : "therapeutic";
}

export function cleanDiagnosticText(text: string, mode: DetectedMode): string {
  if (mode !== "diagnostic") {
    return text;
  }
  let cleaned = text;
  for (const phrase of THERAPEUTIC_PHRASES) {
    cleaned = cleaned.replace(phrase, "");
  }
  return cleaned
    .replaceAll("..", ".")
    .replace(/\s+/g, " ")
    .replace(/\s+\./g, ".")
    .replace(/,\s*\./g, ".")
    .trim();
}

export function softenAccuracyClaims(text: string, mode: DetectedMode): string {
  if (mode !== "diagnostic") {
    return text;
  }
  return text
    .replace(/>90%\s+accuracy/gi, "target AUC 0.80-0.88 in external validation (cohort-dependent)")
    .replace(/accuracy of >?90%/gi, "target AUC 0.80-0.88 (cohort-dependent)");
}

/** Drops repeated lines (case-insensitive) and blank lines. */
export function dedupeParagraphs(text: string): string {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const paragraph of text.split("\n").map((line) => line.trim())) {
    const key = paragraph.toLowerCase();
    if (paragraph && !seen.has(key)) {
      seen.add(key);
      out.push(paragraph);
    }
  }
  return out.join("\n");
}

export function punctuationGuard(text: string): string {
  return text.replaceAll("..", ".").replaceAll(" .", ".").replaceAll(" ,", ",");
}

/** Fixes run-together sentences, restores section breaks and drops repeated lines. */
export function cleanTextBlocks(text: string): string {
  const spaced = text
    .replaceAll("..", ".")
    .replace(/([a-z])\s*\.\s*([A-Za-z])/g, "$1. $2")
    .replace(/(\w)(\*\*Ethics)/g, "$1\n\n$2")
    .replace(/(\w)(\*\*Key Limitations)/g, "$1\n\n$2");

  const seen = new Set<string>();
  const out: string[] = [];
  for (const line of spaced.split("\n")) {
    const key = line.trim().toLowerCase();
    if (key) {
      if (!seen.has(key)) {
        seen.add(key);
        out.push(line);
      }
    } else if (out.length > 0 && out[out.length - 1] !== "") {
      out.push("");
    }
  }
  return out.join("\n");
}

export function sentenceCase(text: string): string {
  return text ? text.charAt(0).toUpperCase() + text.slice(1) : text;
}

export function pluralizeDomains(count: number): string {
  if (count === 0) {
    return "multiple domains";
  }
  return count === 1 ? "one domain" : `${count} domains`;
}

export function filterCrossDomain(items: string[], mode: DetectedMode): string[] {
  if (mode !== "diagnostic") {
    return items;
  }
  return items.filter((item) => {
    const lowered = item.toLowerCase();
    return !THERAPEUTIC_TRANSFER_MARKERS.some((marker) => lowered.includes(marker));
  });
}

export function ivdTimelineCost(composite: number): { timeline: string; cost: string } {
  if (composite >= 0.7) {
    return {
      timeline: "12-18 months to clinical validation (IVD/CLIA track)",
      cost: "€250,000-€500,000 (analytical validation, pilot cohort, regulatory dossier)",
    };
  }
  if (composite >= 0.5) {
    return {
      timeline: "18-24 months to clinical validation (IVD/CLIA track)",
      cost: "€400,000-€700,000 (assay optimization, multi-site validation, regulatory prep)",
    };
  }
  return {
    timeline: "24-36 months to clinical validation (IVD/CLIA track)",
    cost: "€600,000-€1,000,000 (method development, extensive validation, regulatory hurdles)",
  };
}

/** N/A for values an upstream stage never produced. */
export function orNA(value: string | number | undefined | null): string {
  if (value === undefined || value === null) {
    return "N/A";
  }
  const rendered = String(value).trim();
  return rendered.length > 0 ? rendered : "N/A";
}
