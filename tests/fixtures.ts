import type { AggregationResult } from "../src/evidence/aggregator.js";
import type { StageAgents } from "../src/pipeline/orchestrator.js";
import type { EvidenceRecord } from "../src/schema/evidence.js";
import type { ReasoningStep, StageAgent } from "../src/schema/run.js";
import type {
  CompleteScorecard,
  ConceptMap,
  CrossDomainTransfer,
  DirectionsOutput,
  EthicsReport,
  HypothesisDocument,
  SimulationScorecard,
} from "../src/schema/stages.js";

export function makeDocument(overrides: Partial<HypothesisDocument> = {}): HypothesisDocument {
  return {
    title: "Targeting NLRP3 inflammasome signalling to slow atherosclerotic plaque growth",
    abstract: "Inflammasome inhibition reduces plaque inflammation.",
    mechanismOfAction: "Selective NLRP3 inhibition lowers IL-1β release in plaque macrophages.",
    molecularTargets: ["NLRP3", "IL-1β", "Caspase-1"],
    pathwayImpact: "Reduced inflammatory signalling",
    deliveryOptions: ["oral"],
    expectedOutcomes: "Slower plaque progression",
    clinicalRationale: "Residual inflammatory risk persists despite statin therapy.",
    resistanceConsiderations: "Compensatory IL-18 signalling",
    keyAssumptions: ["NLRP3 drives plaque inflammation", "Oral inhibitor reaches plaque"],
    unknownFactors: ["Long-term immune effects"],
    validationPlan: "Murine ApoE-/- model, then a phase I safety study",
    noveltyScore: 0.7,
    divergentVariants: [],
    ...overrides,
  };
}

export function makeScorecard(overrides: Partial<SimulationScorecard> = {}): SimulationScorecard {
  return {
    safetyProfile: 0.8,
    clinicalTranslatability: 0.7,
    technicalFeasibility: 0.6,
    regulatoryPathReady: 0.5,
    domainSpecificScores: {},
    feasibilityScore: 0,
    overallFeasibility: "RED",
    assumptions: [],
    limitations: ["Small animal models only", "No human pharmacokinetics", "Unclear dosing", "Cost"],
    recommendedValidations: [],
    ...overrides,
  };
}

export function makeCompleteScorecard(overrides: Partial<CompleteScorecard> = {}): CompleteScorecard {
  return {
    ...makeScorecard(),
    technicalFeasibility: 0.6,
    clinicalTranslatability: 0.7,
    safetyProfile: 0.8,
    regulatoryPathReady: 0.5,
    feasibilityScore: 0.65,
    overallFeasibility: "AMBER",
    ...overrides,
  };
}

export function makeEthics(overrides: Partial<EthicsReport> = {}): EthicsReport {
  return {
    verdict: "green",
    verdictReasoning: "Standard preclinical safeguards apply",
    safetyConcerns: [],
    regulatoryConsiderations: [],
    ethicalFlags: [],
    vulnerablePopulations: [],
    informedConsentConsiderations: [],
    recommendedSafeguards: ["Independent safety board", "Staged dose escalation"],
    costEffectiveness: "Unknown",
    domainSpecificEthics: "",
    preclinicalRequirements: [],
    clinicalTrialDesignNotes: "",
    fragileAssumptions: [],
    potentialConfounders: [],
    alternativeExplanations: [],
    ...overrides,
  };
}

export function makeRecord(
  id: string,
  relevanceScore: number,
  qualityScore: number,
  overrides: Partial<EvidenceRecord> = {},
): EvidenceRecord {
  return {
    id,
    source: "PubMed",
    title: `Study ${id}`,
    citation: `Journal of Tests (2023) ${id}`,
    url: `https://example.org/${id}`,
    excerpts: [],
    keyFindings: [],
    domain: "literature",
    relevanceScore,
    qualityScore,
    recencyScore: 0.5,
    impactScore: 0.5,
    confidenceScore: (relevanceScore + qualityScore) / 2,
    domainRelevance: 0.5,
    evidenceTier: "TIER_3_MODERATE",
    ...overrides,
  };
}

export function makeStep(agent: StageAgent, confidence: number, overrides: Partial<ReasoningStep> = {}): ReasoningStep {
  return {
    agent,
    action: `${agent} action`,
    inputSummary: `${agent} input`,
    reasoning: `${agent} reasoning`,
    alternativesConsidered: [],
    decisionRationale: `${agent} rationale`,
    confidence,
    supportingEvidence: [],
    timestamp: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeTransfer(sourceDomain: string, concept: string, relevanceScore = 0.8): CrossDomainTransfer {
  return {
    sourceDomain,
    targetDomain: "cardiology",
    concept,
    rationale: "Shared mechanism",
    potentialImpact: "Moderate",
    challenges: [],
    relevanceScore,
  };
}

export function makeDirections(): DirectionsOutput {
  return {
    directions: [
      {
        title: "NLRP3 blockade in plaque macrophages",
        mechanism: "Inflammasome inhibition",
        innovation: "Plaque-selective dosing",
        targets: ["NLRP3"],
        therapeuticApproach: "Small molecule",
        assumptions: [],
      },
    ],
    domainContext: "Cardiology",
    selectionRationale: "Strongest inflammatory signal",
  };
}

export function makeConceptMap(): ConceptMap {
  return {
    concepts: [
      {
        term: "NLRP3",
        definition: "Inflammasome sensor protein",
        relatedTerms: ["inflammasome"],
        pathways: ["IL-1 signalling"],
        targets: ["Caspase-1"],
        clinicalSignificance: "Drives vascular inflammation",
      },
    ],
    relationships: [],
    keyPathways: [{ name: "IL-1 signalling", description: "Cytokine cascade", relevance: "High" }],
    glossary: {},
  };
}

export function makeAggregation(records: EvidenceRecord[]): AggregationResult {
  return {
    request: { goal: "goal", domain: "cardiology", searchTerms: ["NLRP3"], mainQuery: "NLRP3" },
    records,
    outcomes: [
      { source: "PubMed", status: "ok", count: records.length },
      { source: "Kaggle", status: "skipped", count: 0 },
    ],
  };
}

/** Stage agents that answer instantly with fixed outputs. */
export function makeAgents(overrides: Partial<StageAgents> = {}): StageAgents {
  return {
    visioner: { generateDirections: async () => makeDirections() },
    conceptLearner: { buildConceptMap: async () => makeConceptMap() },
    evidenceMiner: {
      gatherEvidence: async () =>
        makeAggregation([makeRecord("ev_1", 0.9, 0.9), makeRecord("ev_2", 0.85, 0.95), makeRecord("ev_3", 0.3, 0.3)]),
    },
    crossDomainMapper: { findTransfers: async () => [makeTransfer("materials", "Hydrogel depot")] },
    synthesizer: { synthesize: async () => makeDocument() },
    simulation: { assessFeasibility: async () => makeScorecard() },
    ethicsValidator: { validate: async () => makeEthics() },
    ...overrides,
  };
}
