import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { HypothesisConstraints } from "../schema/request.js";
import type { DirectionsOutput, ResearchDirection } from "../schema/stages.js";
import { describeConstraints, optionalText, stringList, text } from "./shared.js";

const log = createLogger("visioner");

const directionSchema = z
  .object({
    title: z.string().trim().min(1),
    mechanism: text,
    innovation: text,
    targets: stringList,
    therapeutic_approach: text,
    cross_domain_inspiration: optionalText,
    assumptions: stringList,
  })
  .transform(
    (raw): ResearchDirection => ({
      title: raw.title,
      mechanism: raw.mechanism,
      innovation: raw.innovation,
      targets: raw.targets,
      therapeuticApproach: raw.therapeutic_approach,
      crossDomainInspiration: raw.cross_domain_inspiration,
      assumptions: raw.assumptions,
    }),
  );

export const directionsSchema = z
  .object({
    directions: z.array(directionSchema).min(1),
    domain_context: text,
    selection_rationale: text,
  })
  .transform(
    (raw): DirectionsOutput => ({
      directions: raw.directions,
      domainContext: raw.domain_context,
      selectionRationale: raw.selection_rationale,
    }),
  );

export function fallbackDirections(domain: string): DirectionsOutput {
  return {
    directions: [
      {
        title: `Novel therapeutic approach for ${domain}`,
        mechanism: "Multi-targeted intervention addressing key pathways",
        innovation: "Combines existing approaches in novel way",
        targets: ["To be determined"],
        therapeuticApproach: "To be determined based on further analysis",
        assumptions: ["Pathway involvement confirmed", "Target accessibility"],
      },
    ],
    domainContext: `Current approaches in ${domain} have limitations that need addressing`,
    selectionRationale: "Selected based on clinical need and feasibility",
  };
}

/** Stage 1: proposes 2-5 research directions for the goal. */
export class VisionerAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async generateDirections(
    goal: string,
    domain: string,
    constraints?: HypothesisConstraints,
  ): Promise<DirectionsOutput> {
    log.info("Generating research directions", { domain });
    const { prompt, systemMessage } = await renderPrompt("visioner", {
      goal,
      domain,
      constraintText: describeConstraints(constraints),
    });

    try {
      const result = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.8,
        maxTokens: 3000,
        schema: directionsSchema,
        label: "visioner",
      });
      log.info("Generated research directions", { count: result.directions.length });
      return result;
    } catch (error) {
      log.warn("Direction generation failed, using fallback", { error: errorMessage(error) });
      return fallbackDirections(domain);
    }
  }
}
