import { compositeScore, feasibilityLevel } from "../agents/simulation.js";
import { round } from "../evidence/scorer.js";
import { createLogger } from "../logger.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { HypothesisRequest } from "../schema/request.js";
import type { Reconciliation, ReasoningStep } from "../schema/run.js";
import type { CompleteScorecard, EthicsReport, HypothesisDocument, SimulationScorecard } from "../schema/stages.js";
import {
  capEthicsVerdict,
  consolidateEvidence,
  detectMode,
  INFERENCE_FALLBACK_WEIGHTS,
  inferMissingScore,
  type ConsolidatedEvidence,
} from "./guards.js";

const log = createLogger("reconcile");

type Dimension = keyof typeof INFERENCE_FALLBACK_WEIGHTS;

const DIMENSIONS: readonly Dimension[] = [
  "technicalFeasibility",
  "clinicalTranslatability",
  "safetyProfile",
  "regulatoryPathReady",
];

export interface ReconcileInput {
  request: Pick<HypothesisRequest, "mode">;
  document: HypothesisDocument;
  scorecard: SimulationScorecard;
  ethics: EthicsReport;
  evidence: EvidenceRecord[];
  steps: ReasoningStep[];
}

export interface Reconciled {
  scorecard: CompleteScorecard;
  ethics: EthicsReport;
  evidence: ConsolidatedEvidence;
  avgConfidence: number;
  reconciliation: Reconciliation;
}

export function averageConfidence(steps: ReasoningStep[]): number {
  if (steps.length === 0) {
    return 0.5;
  }
  return steps.reduce((sum, step) => sum + step.confidence, 0) / steps.length;
}

export function modeText(document: HypothesisDocument): string {
  return `${document.title} ${document.mechanismOfAction} ${document.clinicalRationale}`;
}

/**
 * Completes the scorecard, recomputes the single composite and caps the ethics
 * verdict against the evidence strength. Every report reads these values.
 */
export function reconcile(input: ReconcileInput): Reconciled {
  const evidence = consolidateEvidence(input.evidence);
  const avgConfidence = averageConfidence(input.steps);

  const inferredDimensions = DIMENSIONS.filter((name) => input.scorecard[name] === undefined);
  const resolve = (name: Dimension): number =>
    inferMissingScore(input.scorecard[name], evidence.strength, avgConfidence, INFERENCE_FALLBACK_WEIGHTS[name]);

  const dimensions = {
    technicalFeasibility: resolve("technicalFeasibility"),
    clinicalTranslatability: resolve("clinicalTranslatability"),
    safetyProfile: resolve("safetyProfile"),
    regulatoryPathReady: resolve("regulatoryPathReady"),
  };
  const composite = round(compositeScore(dimensions), 2);
  const scorecard: CompleteScorecard = {
    ...input.scorecard,
    ...dimensions,
    feasibilityScore: composite,
    overallFeasibility: feasibilityLevel(composite),
  };

  const cappedVerdict = capEthicsVerdict(evidence.strength, input.ethics.verdict);
  const verdictCapped = cappedVerdict !== input.ethics.verdict;
  const ethics: EthicsReport = verdictCapped
    ? { ...input.ethics, verdict: cappedVerdict, verdictCapped: true, requestedVerdict: input.ethics.verdict }
    : input.ethics;
  if (verdictCapped) {
    log.warn("Ethics verdict capped at amber", { evidenceStrength: evidence.strength });
  }

  const mode = detectMode(modeText(input.document), input.request.mode);
  if (inferredDimensions.length > 0) {
    log.info("Inferred missing feasibility dimensions", { dimensions: inferredDimensions });
  }

  return {
    scorecard,
    ethics,
    evidence,
    avgConfidence,
    reconciliation: {
      inferredDimensions,
      evidenceStrength: evidence.strength,
      verdictCapped,
      mode,
    },
  };
}
