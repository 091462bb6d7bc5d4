import { z } from "zod";
import { errorMessage } from "../errors.js";
import type { StructuredLlm } from "../llm/structuredClient.js";
import { createLogger } from "../logger.js";
import { renderPrompt } from "../prompt-helpers/promptLibrary.js";
import type { Concept, ConceptMap, ConceptRelationship, DirectionsOutput } from "../schema/stages.js";
import { stringList, text } from "./shared.js";

const log = createLogger("concept-learner");

const SENSOR_WORDS = ["wear", "wearable", "sensor", "ecg", "device", "sensor data"];
const SENSOR_CONCEPT_MARKERS = ["wear", "sensor", "ecg", "device"];

const WEARABLE_CONCEPT: Concept = {
  term: "wearable sensors",
  definition: "Non-invasive wearable devices that capture physiological signals (e.g., ECG, PPG, accelerometry)",
  relatedTerms: ["ECG", "PPG", "accelerometer", "biosensor"],
  pathways: [],
  targets: [],
  clinicalSignificance: "Enables continuous monitoring and early detection of physiological anomalies",
};

const conceptSchema = z
  .object({
    term: z.string().trim().min(1),
    definition: text,
    related_terms: stringList,
    pathways: stringList,
    targets: stringList,
    clinical_significance: text,
  })
  .transform(
    (raw): Concept => ({
      term: raw.term,
      definition: raw.definition,
      relatedTerms: raw.related_terms,
      pathways: raw.pathways,
      targets: raw.targets,
      clinicalSignificance: raw.clinical_significance,
    }),
  );

const relationshipListSchema = z.array(
  z.object({
    source: z.string().min(1),
    target: z.string().min(1),
    type: z.string().min(1).catch("related_to"),
  }),
);

/** Models answer with either an edge list or a concept -> related[] map. */
const relationshipsSchema = z
  .union([
    relationshipListSchema,
    z.record(stringList).transform((map): ConceptRelationship[] =>
      Object.entries(map).flatMap(([source, targets]) =>
        targets.map((target) => ({ source, target, type: "related_to" })),
      ),
    ),
  ])
  .catch([]);

const pathwaySchema = z.object({
  name: z.string().trim().min(1),
  description: text,
  relevance: text,
});

export const conceptMapSchema = z
  .object({
    concepts: z.array(conceptSchema),
    relationships: relationshipsSchema,
    key_pathways: z.array(pathwaySchema).catch([]),
    glossary: z.record(z.string()).catch({}),
  })
  .transform(
    (raw): ConceptMap => ({
      concepts: raw.concepts,
      relationships: raw.relationships,
      keyPathways: raw.key_pathways,
      glossary: raw.glossary,
    }),
  );

export function summarizeDirections(directions: DirectionsOutput): string {
  return directions.directions.map((direction) => `- ${direction.title}: ${direction.mechanism}`).join("\n");
}

/**
 * Prepends a wearable-sensor concept when the goal or directions talk about
 * sensors and no concept covers them yet.
 */
export function withWearableConcept(map: ConceptMap, context: string): ConceptMap {
  const lowered = context.toLowerCase();
  if (!SENSOR_WORDS.some((word) => lowered.includes(word))) {
    return map;
  }
  const covered = map.concepts.some((concept) => {
    const term = concept.term.toLowerCase();
    return SENSOR_CONCEPT_MARKERS.some((marker) => term.includes(marker));
  });
  if (covered) {
    return map;
  }
  log.debug("Injecting wearable sensor concept");
  return { ...map, concepts: [WEARABLE_CONCEPT, ...map.concepts] };
}

export function fallbackConceptMap(domain: string): ConceptMap {
  return {
    concepts: [
      {
        term: domain,
        definition: `Medical concepts related to ${domain}`,
        relatedTerms: [],
        pathways: [],
        targets: [],
        clinicalSignificance: "Core to the medical challenge",
      },
    ],
    relationships: [],
    keyPathways: [],
    glossary: {},
  };
}

/** Stage 2: turns the directions into a concept map with pathways and a glossary. */
export class ConceptLearnerAgent {
  constructor(private readonly llm: StructuredLlm) {}

  async buildConceptMap(goal: string, domain: string, directions: DirectionsOutput): Promise<ConceptMap> {
    log.info("Building concept map", { domain });
    const directionsSummary = summarizeDirections(directions);
    const { prompt, systemMessage } = await renderPrompt("concept-learner", { goal, domain, directionsSummary });

    let map: ConceptMap;
    try {
      map = await this.llm.generateStructured({
        prompt,
        systemMessage,
        temperature: 0.3,
        maxTokens: 4000,
        schema: conceptMapSchema,
        label: "concept-learner",
      });
    } catch (error) {
      log.warn("Concept map generation failed, using fallback", { error: errorMessage(error) });
      return fallbackConceptMap(domain);
    }

    const enriched = withWearableConcept(map, `${goal} ${directionsSummary}`);
    log.info("Built concept map", {
      concepts: enriched.concepts.length,
      pathways: enriched.keyPathways.length,
    });
    return enriched;
  }
}
