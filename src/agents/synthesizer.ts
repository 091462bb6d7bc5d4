import { z } from "zod";
import { errorMessage } from "../errors.js";
import { clamp, round } from "../evidence/scorer.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type {
  ConceptMap,
  CrossDomainTransfer,
  DirectionsOutput,
  DivergentVariant,
  HypothesisDocument,
} from "../schema/stages.js";
import { optionalScore, optionalText, stringList, text } from "./shared.js";

const log = createLogger("synthesizer");

const MAX_VARIANTS = 3;

const variantSchema = z.object({
  variant_id: z.union([z.string(), z.number()]).optional().catch(undefined),
  type: z.string().catch("unknown"),
  claim: z.string().trim().min(1),
  source_domain: optionalText,
  mechanism_change: optionalText,
  novelty_justification: text,
  testability: text,
  plausibility_estimate: optionalScore,
});
type RawVariant = z.output<typeof variantSchema>;

export const hypothesisSchema = z.object({
  title: z.string().trim().min(1),
  abstract: optionalText,
  mechanism_of_action: text,
  molecular_targets: stringList,
  pathway_impact: text,
  delivery_options: stringList,
  expected_outcomes: text,
  clinical_rationale: optionalText,
  resistance_considerations: text,
  key_assumptions: stringList,
  unknown_factors: stringList,
  validation_plan: optionalText,
  novelty_score: optionalScore,
  divergent_variants: z
    .array(variantSchema.nullable().catch(null))
    .transform((items) => items.filter((item): item is RawVariant => item !== null))
    .catch([]),
});
export type RawHypothesis = z.output<typeof hypothesisSchema>;

export interface SynthesisInputs {
  directions: DirectionsOutput;
  conceptMap: ConceptMap;
  evidence: EvidenceRecord[];
  transfers: CrossDomainTransfer[];
  domain: string;
  goal: string;
}

/** 0.6 base, +0.08 per transfer up to +0.24, +0.1 for thin literature, -0.05 for crowded. */
export function noveltyScore(transferCount: number, evidenceCount: number): number {
  let novelty = 0.6 + Math.min(0.24, transferCount * 0.08);
  if (evidenceCount < 20) {
    novelty += 0.1;
  } else if (evidenceCount > 50) {
    novelty -= 0.05;
  }
  return round(clamp(novelty, 0.5, 0.95), 2);
}

function blank(value: string | undefined): boolean {
  return !value || value.trim().length === 0 || value.trim() === "N/A";
}

export function fallbackAbstract(raw: RawHypothesis, transfers: CrossDomainTransfer[], evidenceCount: number): string {
  const parts = [`This hypothesis proposes ${raw.title}.`];
  if (raw.mechanism_of_action) {
    parts.push(`The approach leverages ${raw.mechanism_of_action.slice(0, 150)}...`);
  }
  if (transfers.length > 0) {
    const domains = transfers.slice(0, 2).map((transfer) => transfer.sourceDomain);
    parts.push(`Drawing insights from ${domains.join(", ")}, this strategy integrates cross-domain innovations.`);
  }
  if (raw.expected_outcomes) {
    parts.push(`Expected outcomes include ${raw.expected_outcomes.slice(0, 100)}...`);
  }
  parts.push(
    `Supported by ${evidenceCount} evidence sources including peer-reviewed research and clinical data.`,
  );
  return parts.join(" ");
}

export function fallbackClinicalRationale(raw: RawHypothesis): string {
  const parts: string[] = [];
  if (raw.mechanism_of_action) {
    parts.push(`This approach is justified by its ${raw.mechanism_of_action.slice(0, 150)}...`);
  }
  if (raw.molecular_targets.length > 0) {
    parts.push(`Targeting ${raw.molecular_targets.slice(0, 2).join(", ")} provides a rational therapeutic strategy.`);
  }
  if (raw.expected_outcomes) {
    parts.push(`Expected to achieve ${raw.expected_outcomes.slice(0, 100)}...`);
  }
  return parts.length > 0
    ? parts.join(" ")
    : "Clinical rationale requires validation through systematic experimental studies.";
}

function toVariant(raw: RawVariant, index: number): DivergentVariant {
  return {
    variantId: raw.variant_id !== undefined ? String(raw.variant_id) : String(index + 1),
    type: raw.type,
    claim: raw.claim,
    sourceDomain: raw.source_domain,
    mechanismChange: raw.mechanism_change,
    noveltyJustification: raw.novelty_justification,
    testability: raw.testability,
    plausibilityEstimate: round(clamp(raw.plausibility_estimate ?? 0.5), 2),
  };
}

/** Fills every gap the model left so downstream stages always see a full document. */
export function completeHypothesis(
  raw: RawHypothesis,
  transfers: CrossDomainTransfer[],
  evidenceCount: number,
): HypothesisDocument {
  return {
    title: raw.title,
    abstract: blank(raw.abstract) ? fallbackAbstract(raw, transfers, evidenceCount) : (raw.abstract ?? ""),
    mechanismOfAction: raw.mechanism_of_action,
    molecularTargets: raw.molecular_targets,
    pathwayImpact: raw.pathway_impact,
    deliveryOptions: raw.delivery_options,
    expectedOutcomes: raw.expected_outcomes,
    clinicalRationale: blank(raw.clinical_rationale) ? fallbackClinicalRationale(raw) : (raw.clinical_rationale ?? ""),
    resistanceConsiderations: raw.resistance_considerations,
    keyAssumptions: raw.key_assumptions,
    unknownFactors: raw.unknown_factors,
    validationPlan: blank(raw.validation_plan)
      ? "Propose in vitro validation, followed by in vivo models and early-phase clinical studies."
      : (raw.validation_plan ?? ""),
    noveltyScore:
      raw.novelty_score !== undefined
        ? round(clamp(raw.novelty_score), 2)
        : noveltyScore(transfers.length, evidenceCount),
    divergentVariants: raw.divergent_variants.slice(0, MAX_VARIANTS).map(toVariant),
  };
}

export function fallbackHypothesis(domain: string, transferCount: number, evidenceCount: number): HypothesisDocument {
  return {
    title: `Novel Therapeutic Approach for ${domain}`,
    abstract: `This hypothesis proposes a multi-targeted intervention for ${domain}. Supported by ${evidenceCount} evidence sources; it requires further investigation.`,
    mechanismOfAction: "Multi-targeted intervention addressing key pathological mechanisms",
    molecularTargets: ["To be determined"],
    pathwayImpact: "Expected to modulate disease-relevant pathways",
    deliveryOptions: ["To be determined"],
    expectedOutcomes: "Improved clinical outcomes",
    clinicalRationale: "Addresses unmet medical need",
    resistanceConsiderations: "To be evaluated",
    keyAssumptions: ["Pathway involvement", "Target accessibility"],
    unknownFactors: ["Optimal dosing", "Long-term effects"],
    validationPlan: "Requires further investigation",
    noveltyScore: noveltyScore(transferCount, evidenceCount),
    divergentVariants: [],
  };
}

/** Stage 5: writes the hypothesis document from everything gathered so far. */
export class SynthesizerAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async synthesize(inputs: SynthesisInputs): Promise<HypothesisDocument> {
    const { directions, conceptMap, evidence, transfers, domain, goal } = inputs;
    log.info("Synthesizing hypothesis", { domain });

    const { prompt, systemMessage } = await renderPrompt("synthesizer", {
      goal,
      domain,
      directionsText: directions.directions
        .slice(0, 3)
        .map((direction) => `- ${direction.title}: ${direction.mechanism}`)
        .join("\n"),
      conceptsText: conceptMap.concepts
        .slice(0, 10)
        .map((concept) => concept.term)
        .join(", "),
      evidenceSummary: `${evidence.length} evidence sources gathered`,
      transfersText: transfers
        .slice(0, 3)
        .map((transfer) => `- ${transfer.concept} from ${transfer.sourceDomain}`)
        .join("\n"),
    });

    try {
      const raw = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.5,
        maxTokens: 4000,
        schema: hypothesisSchema,
        label: "synthesizer",
      });
      const document = completeHypothesis(raw, transfers, evidence.length);
      log.info("Synthesized hypothesis", {
        title: document.title,
        novelty: document.noveltyScore,
        variants: document.divergentVariants.length,
      });
      return document;
    } catch (error) {
      log.warn("Synthesis failed, using fallback document", { error: errorMessage(error) });
      return fallbackHypothesis(domain, transfers.length, evidence.length);
    }
  }
}
