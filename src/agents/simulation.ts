import { z } from "zod";
import { errorMessage } from "../errors.js";
import { clamp, round } from "../evidence/scorer.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { FeasibilityLevel, HypothesisDocument, SimulationScorecard } from "../schema/stages.js";
import { optionalScore, optionalText, stringList } from "./shared.js";

const log = createLogger("simulation");

/** Composite weights: technical, clinical, safety, regulatory. */
export const COMPOSITE_WEIGHTS = {
  technicalFeasibility: 0.35,
  clinicalTranslatability: 0.3,
  safetyProfile: 0.2,
  regulatoryPathReady: 0.15,
} as const;

const REGULATORY_HINTS = ["ivd_readiness", "regulatory_ready", "clia_ready"];

export const scorecardSchema = z.object({
  therapeutic_potential: optionalScore,
  therapeutic_potential_reasoning: optionalText,
  delivery_feasibility: optionalScore,
  delivery_feasibility_reasoning: optionalText,
  safety_profile: optionalScore,
  safety_profile_reasoning: optionalText,
  clinical_translatability: optionalScore,
  clinical_translatability_reasoning: optionalText,
  technical_feasibility: optionalScore,
  regulatory_path_ready: optionalScore,
  domain_specific_scores: z
    .record(z.unknown())
    .transform((scores) => {
      const numeric: Record<string, number> = {};
      for (const [name, value] of Object.entries(scores)) {
        if (typeof value === "number" && Number.isFinite(value)) {
          numeric[name] = value;
        }
      }
      return numeric;
    })
    .catch({}),
  assumptions: stringList,
  limitations: stringList,
  recommended_validations: stringList,
});
export type RawScorecard = z.output<typeof scorecardSchema>;

function clampOptional(value: number | undefined): number | undefined {
  return value === undefined ? undefined : clamp(value);
}

export function feasibilityLevel(composite: number): FeasibilityLevel {
  if (composite >= 0.7) {
    return "GREEN";
  }
  if (composite >= 0.5) {
    return "AMBER";
  }
  return "RED";
}

export interface CompositeInputs {
  technicalFeasibility?: number;
  clinicalTranslatability?: number;
  safetyProfile?: number;
  regulatoryPathReady?: number;
}

/** Weighted composite; an absent dimension counts as 0.5. */
export function compositeScore(scores: CompositeInputs): number {
  return (
    COMPOSITE_WEIGHTS.technicalFeasibility * (scores.technicalFeasibility ?? 0.5) +
    COMPOSITE_WEIGHTS.clinicalTranslatability * (scores.clinicalTranslatability ?? 0.5) +
    COMPOSITE_WEIGHTS.safetyProfile * (scores.safetyProfile ?? 0.5) +
    COMPOSITE_WEIGHTS.regulatoryPathReady * (scores.regulatoryPathReady ?? 0.5)
  );
}

export function resolveTechnicalFeasibility(raw: RawScorecard): number | undefined {
  if (raw.technical_feasibility !== undefined) {
    return clamp(raw.technical_feasibility);
  }
  if (raw.delivery_feasibility !== undefined) {
    return clamp(raw.delivery_feasibility);
  }
  if (raw.therapeutic_potential !== undefined) {
    return clamp(raw.therapeutic_potential);
  }
  const others = [raw.safety_profile, raw.clinical_translatability].filter(
    (value): value is number => value !== undefined,
  );
  return others.length > 0 ? clamp(others.reduce((sum, value) => sum + value, 0) / others.length) : undefined;
}

export function resolveRegulatoryReadiness(raw: RawScorecard): number | undefined {
  if (raw.regulatory_path_ready !== undefined) {
    return clamp(raw.regulatory_path_ready);
  }
  const hint = REGULATORY_HINTS.map((name) => raw.domain_specific_scores[name]).find(
    (value): value is number => value !== undefined,
  );
  if (hint !== undefined) {
    return clamp(hint);
  }
  if (raw.clinical_translatability === undefined && raw.safety_profile === undefined) {
    return undefined;
  }
  const clinical = clamp(raw.clinical_translatability ?? 0.5);
  const safety = clamp(raw.safety_profile ?? 0.5);
  return clamp(clinical * 0.6 + safety * 0.4, 0.01, 0.99);
}

/**
 * Clamps the model's scores and derives the technical and regulatory
 * dimensions. Dimensions the model gave nothing for stay absent so that
 * reconciliation can infer them from the evidence.
 */
export function buildScorecard(raw: RawScorecard): SimulationScorecard {
  const scorecard: SimulationScorecard = {
    therapeuticPotential: clampOptional(raw.therapeutic_potential),
    therapeuticPotentialReasoning: raw.therapeutic_potential_reasoning,
    deliveryFeasibility: clampOptional(raw.delivery_feasibility),
    deliveryFeasibilityReasoning: raw.delivery_feasibility_reasoning,
    safetyProfile: clampOptional(raw.safety_profile),
    safetyProfileReasoning: raw.safety_profile_reasoning,
    clinicalTranslatability: clampOptional(raw.clinical_translatability),
    clinicalTranslatabilityReasoning: raw.clinical_translatability_reasoning,
    technicalFeasibility: resolveTechnicalFeasibility(raw),
    regulatoryPathReady: resolveRegulatoryReadiness(raw),
    domainSpecificScores: raw.domain_specific_scores,
    feasibilityScore: 0,
    overallFeasibility: "RED",
    assumptions: raw.assumptions,
    limitations: raw.limitations,
    recommendedValidations: raw.recommended_validations,
  };
  const composite = round(compositeScore(scorecard), 2);
  return { ...scorecard, feasibilityScore: composite, overallFeasibility: feasibilityLevel(composite) };
}

export function fallbackScorecard(): SimulationScorecard {
  return buildScorecard({
    therapeutic_potential: 0.6,
    therapeutic_potential_reasoning: "Requires further validation",
    delivery_feasibility: 0.6,
    delivery_feasibility_reasoning: "Standard delivery methods applicable",
    safety_profile: 0.7,
    safety_profile_reasoning: "No major safety concerns identified",
    clinical_translatability: 0.6,
    clinical_translatability_reasoning: "Standard clinical pathway",
    technical_feasibility: undefined,
    regulatory_path_ready: undefined,
    domain_specific_scores: {},
    assumptions: ["Mechanism validity", "Target accessibility"],
    limitations: ["Limited in-silico data", "Requires experimental validation"],
    recommended_validations: ["In vitro studies", "Animal models"],
  });
}

/** Stage 6: in-silico feasibility scoring. */
export class SimulationAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async assessFeasibility(document: HypothesisDocument, domain: string): Promise<SimulationScorecard> {
    log.info("Assessing feasibility", { domain });
    const { prompt, systemMessage } = await renderPrompt("simulation", {
      title: document.title,
      mechanism: document.mechanismOfAction,
      targets: document.molecularTargets.join(", "),
      domain,
      deliveryOptions: document.deliveryOptions.join(", "),
    });

    try {
      const raw = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.3,
        maxTokens: 3000,
        schema: scorecardSchema,
        label: "simulation",
      });
      const scorecard = buildScorecard(raw);
      log.info("Feasibility assessed", {
        verdict: scorecard.overallFeasibility,
        composite: scorecard.feasibilityScore,
      });
      return scorecard;
    } catch (error) {
      log.warn("Feasibility assessment failed, using baseline scorecard", { error: errorMessage(error) });
      return fallbackScorecard();
    }
  }
}
