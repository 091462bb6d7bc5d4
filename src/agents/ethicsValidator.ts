import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { HypothesisConstraints } from "../schema/request.js";
import type {
  EthicsReport,
  EthicsVerdict,
  FragileAssumption,
  HypothesisDocument,
  SimulationScorecard,
} from "../schema/stages.js";
import { describeConstraints, stringList, text } from "./shared.js";

const log = createLogger("ethics-validator");

const MAX_FRAGILITIES_FOR_GREEN = 2;

const verdictSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["green", "amber", "red"]))
  .catch("amber");

const fragileAssumptionSchema = z.union([
  z
    .object({ assumption: z.string().min(1), impact_if_wrong: text, mitigation: text })
    .transform(
      (raw): FragileAssumption => ({
        assumption: raw.assumption,
        impactIfWrong: raw.impact_if_wrong,
        mitigation: raw.mitigation,
      }),
    ),
  z
    .string()
    .min(1)
    .transform((assumption): FragileAssumption => ({ assumption, impactIfWrong: "", mitigation: "" })),
]);

export const ethicsSchema = z.object({
  verdict: verdictSchema,
  verdict_reasoning: text,
  safety_concerns: stringList,
  regulatory_considerations: stringList,
  ethical_flags: stringList,
  vulnerable_populations: stringList,
  informed_consent_considerations: stringList,
  recommended_safeguards: stringList,
  cost_effectiveness: text,
  domain_specific_ethics: text,
  preclinical_requirements: stringList,
  clinical_trial_design_notes: text,
  fragile_assumptions: z
    .array(fragileAssumptionSchema.nullable().catch(null))
    .transform((items) => items.filter((item): item is FragileAssumption => item !== null))
    .catch([]),
  potential_confounders: stringList,
  alternative_explanations: stringList,
});
export type RawEthics = z.output<typeof ethicsSchema>;

/** Green with more than two fragile assumptions is lowered to amber. */
export function applyRedTeamOverride(
  verdict: EthicsVerdict,
  reasoning: string,
  fragileCount: number,
): { verdict: EthicsVerdict; reasoning: string } {
  if (verdict !== "green" || fragileCount <= MAX_FRAGILITIES_FOR_GREEN) {
    return { verdict, reasoning };
  }
  log.warn("Lowering ethics verdict to amber", { fragileAssumptions: fragileCount });
  return {
    verdict: "amber",
    reasoning: `${reasoning} [DOWNGRADED: ${fragileCount} critical fragilities identified]`.trim(),
  };
}

export function toEthicsReport(raw: RawEthics): EthicsReport {
  const { verdict, reasoning } = applyRedTeamOverride(raw.verdict, raw.verdict_reasoning, raw.fragile_assumptions.length);
  return {
    verdict,
    verdictReasoning: reasoning,
    safetyConcerns: raw.safety_concerns,
    regulatoryConsiderations: raw.regulatory_considerations,
    ethicalFlags: raw.ethical_flags,
    vulnerablePopulations: raw.vulnerable_populations,
    informedConsentConsiderations: raw.informed_consent_considerations,
    recommendedSafeguards: raw.recommended_safeguards,
    costEffectiveness: raw.cost_effectiveness,
    domainSpecificEthics: raw.domain_specific_ethics,
    preclinicalRequirements: raw.preclinical_requirements,
    clinicalTrialDesignNotes: raw.clinical_trial_design_notes,
    fragileAssumptions: raw.fragile_assumptions,
    potentialConfounders: raw.potential_confounders,
    alternativeExplanations: raw.alternative_explanations,
  };
}

export function fallbackEthicsReport(domain: string): EthicsReport {
  return {
    verdict: "amber",
    verdictReasoning: "Requires standard ethical review and monitoring",
    safetyConcerns: ["Requires safety monitoring", "Long-term effects unknown"],
    regulatoryConsiderations: [
      "FDA IND application required",
      "Phase I-III clinical trials needed",
      "Good Clinical Practice (GCP) compliance",
    ],
    ethicalFlags: ["Standard informed consent required"],
    vulnerablePopulations: ["To be determined based on indication"],
    informedConsentConsiderations: ["Risks and benefits disclosure", "Alternative treatments"],
    recommendedSafeguards: [
      "Safety monitoring committee",
      "Regular adverse event reporting",
      "Patient follow-up protocol",
    ],
    costEffectiveness: "To be evaluated",
    domainSpecificEthics: `Standard ethics for ${domain} research apply`,
    preclinicalRequirements: ["In vitro studies", "Animal models", "Toxicology studies"],
    clinicalTrialDesignNotes: "Standard randomized controlled trial design recommended",
    fragileAssumptions: [],
    potentialConfounders: [],
    alternativeExplanations: [],
  };
}

/** Stage 7: ethics, safety and regulatory review with a red-team pass. */
export class EthicsValidatorAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async validate(
    document: HypothesisDocument,
    scorecard: SimulationScorecard,
    domain: string,
    constraints?: HypothesisConstraints,
  ): Promise<EthicsReport> {
    log.info("Validating ethics", { domain });
    const { prompt, systemMessage } = await renderPrompt("ethics", {
      title: document.title,
      mechanism: document.mechanismOfAction,
      domain,
      safetyScore: scorecard.safetyProfile ?? "not assessed",
      expectedOutcomes: document.expectedOutcomes,
      deliveryOptions: document.deliveryOptions.join(", "),
      constraintText: describeConstraints(constraints),
    });

    try {
      const raw = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.3,
        maxTokens: 3000,
        schema: ethicsSchema,
        label: "ethics",
      });
      const report = toEthicsReport(raw);
      log.info("Ethics validation complete", {
        verdict: report.verdict,
        fragileAssumptions: report.fragileAssumptions.length,
        confounders: report.potentialConfounders.length,
      });
      return report;
    } catch (error) {
      log.warn("Ethics validation failed, using amber baseline", { error: errorMessage(error) });
      return fallbackEthicsReport(domain);
    }
  }
}
