import type { RawEvidence } from "../schema/evidence.js";
import type { ConceptMap } from "../schema/stages.js";
import { clamp, round } from "./scorer.js";

const GOAL_STOPWORDS = new Set([
  "the",
  "and",
  "for",
  "with",
  "using",
  "novel",
  "enhanced",
  "therapy",
  "treatment",
  "approach",
  "this",
  "that",
  "will",
]);

interface ContextBoost {
  context: string[];
  rules: Array<{ terms: string[]; boost: number }>;
}

const CONTEXT_BOOSTS: ContextBoost[] = [
  {
    context: ["glioblastoma", "gbm", "brain", "neuro"],
    rules: [
      { terms: ["glioblastoma", "gbm", "brain tumor", "malignant glioma"], boost: 0.15 },
      { terms: ["egfrviii", "il13ra2", "her2", "epha2"], boost: 0.1 },
    ],
  },
  {
    context: ["car-t", "immunotherapy"],
    rules: [
      { terms: ["car-t", "chimeric antigen receptor"], boost: 0.15 },
      { terms: ["solid tumor", "persistence", "exhaustion"], boost: 0.08 },
    ],
  },
  {
    context: ["bbb", "blood-brain", "delivery"],
    rules: [
      { terms: ["blood-brain barrier", "bbb"], boost: 0.15 },
      { terms: ["focused ultrasound", "transcytosis"], boost: 0.1 },
    ],
  },
  {
    context: ["nanoparticle", "nano"],
    rules: [{ terms: ["nanoparticle", "lipid nanoparticle", "lnp"], boost: 0.1 }],
  },
];

const BRAIN_CONTEXT = ["brain", "cns", "bbb", "glioblastoma", "neural"];

/** Concept-map terms and salient goal words, lower-cased and deduplicated. */
export function extractTargetConcepts(conceptMap: Pick<ConceptMap, "concepts">, goal: string): string[] {
  const concepts = conceptMap.concepts
    .slice(0, 15)
    .map((concept) => concept.term.trim())
    .filter((term) => term.length > 3)
    .map((term) => term.toLowerCase());

  const goalTerms = goal
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 4 && !GOAL_STOPWORDS.has(word))
    .map((word) => word.replace(/^[.,;:()[\]]+|[.,;:()[\]]+$/g, ""))
    .slice(0, 10);

  return [...new Set([...concepts, ...goalTerms])];
}

export function domainContext(domain: string, goal: string): string {
  return goal ? `${domain}:${goal.slice(0, 50)}` : domain;
}

/**
 * 0.5 base, up to +0.3 for target-concept coverage, then boosts for the
 * therapeutic contexts the goal names. TfR hits outside a brain context are
 * pulled down.
 */
export function calculateDomainRelevance(
  evidence: Pick<RawEvidence, "title" | "abstract" | "venue">,
  targetConcepts: string[],
  context: string,
): number {
  const text = `${evidence.title} ${evidence.abstract ?? ""} ${evidence.venue ?? ""}`.toLowerCase();
  const contextLower = context.toLowerCase();
  const mentions = (terms: string[], haystack: string) => terms.some((term) => haystack.includes(term));

  let score = 0.5;
  if (targetConcepts.length > 0) {
    const hits = targetConcepts.filter((concept) => text.includes(concept)).length;
    score += (hits / targetConcepts.length) * 0.3;
  }

  for (const { context: contextTerms, rules } of CONTEXT_BOOSTS) {
    if (!mentions(contextTerms, contextLower)) {
      continue;
    }
    for (const rule of rules) {
      if (mentions(rule.terms, text)) {
        score += rule.boost;
      }
    }
  }

  if (mentions(["transferrin receptor", "tfr"], text) && !mentions(BRAIN_CONTEXT, text)) {
    score -= 0.15;
  }

  return round(clamp(score), 3);
}
