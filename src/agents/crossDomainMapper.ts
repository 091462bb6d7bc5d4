import { z } from "zod";
import { errorMessage } from "../errors.js";
import { round } from "../evidence/scorer.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { ConceptMap, CrossDomainTransfer } from "../schema/stages.js";
import { optionalText, stringList } from "./shared.js";

const log = createLogger("cross-domain");

const DEFAULT_CHALLENGES = ["Adaptation required", "Validation needed"];

const rawTransferSchema = z.object({
  source_domain: optionalText,
  source: optionalText,
  target_domain: optionalText,
  concept: optionalText,
  concept_transferred: optionalText,
  source_mechanism: optionalText,
  proposed_application: optionalText,
  rationale: optionalText,
  potential_impact: optionalText,
  challenges: stringList,
});
export type RawTransfer = z.output<typeof rawTransferSchema>;

export const transfersSchema = z.object({
  transfers: z.array(rawTransferSchema.nullable().catch(null)).transform((items) =>
    items.filter((item): item is RawTransfer => item !== null),
  ),
});

function firstText(...candidates: Array<string | undefined>): string | undefined {
  return candidates.map((candidate) => candidate?.trim()).find((candidate) => candidate);
}

export function transferRelevance(rationale: string): number {
  return round(Math.min(0.85, Math.max(0.6, 0.6 + rationale.length / 1000)), 3);
}

/** Resolves each field of a model transfer to its first usable value. */
export function normalizeTransfer(raw: RawTransfer, domain: string): CrossDomainTransfer {
  const sourceDomain = firstText(raw.source_domain, raw.source) ?? "unknown";
  const targetDomain = firstText(raw.target_domain) ?? domain;
  const concept = firstText(raw.concept, raw.concept_transferred) ?? `Innovation from ${sourceDomain}`;

  const rationale =
    firstText(raw.rationale, `${raw.source_mechanism ?? ""} ${raw.proposed_application ?? ""}`) ??
    `Cross-domain transfer leveraging ${sourceDomain} insights for ${targetDomain} applications`;

  const potentialImpact =
    firstText(raw.potential_impact, raw.proposed_application) ??
    `Applying ${sourceDomain} methodologies to enhance ${targetDomain} research and treatment strategies`;

  return {
    sourceDomain,
    targetDomain,
    concept,
    sourceMechanism: firstText(raw.source_mechanism),
    proposedApplication: firstText(raw.proposed_application),
    rationale,
    potentialImpact,
    challenges: raw.challenges.length > 0 ? raw.challenges : [...DEFAULT_CHALLENGES],
    relevanceScore: transferRelevance(rationale),
  };
}

/** Stage 4: borrows ideas from the requested non-medical fields. */
export class CrossDomainMapperAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async findTransfers(conceptMap: ConceptMap, domain: string, crossDomains: string[]): Promise<CrossDomainTransfer[]> {
    const keyConcepts = conceptMap.concepts.slice(0, 5).map((concept) => concept.term);
    log.info("Searching cross-domain transfers", { domain, crossDomains });
    const { prompt, systemMessage } = await renderPrompt("cross-domain", {
      domain,
      keyConcepts: keyConcepts.join(", "),
      crossDomains: crossDomains.join(", "),
    });

    try {
      const { transfers } = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.8,
        maxTokens: 3000,
        schema: transfersSchema,
        label: "cross-domain",
      });
      const normalized = transfers.map((raw) => normalizeTransfer(raw, domain));
      log.info("Found cross-domain transfers", { count: normalized.length });
      return normalized;
    } catch (error) {
      log.warn("Cross-domain mapping failed, continuing without transfers", { error: errorMessage(error) });
      return [];
    }
  }
}
