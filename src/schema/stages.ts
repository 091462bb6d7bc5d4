export type FeasibilityLevel = "GREEN" | "AMBER" | "RED";
export type EthicsVerdict = "green" | "amber" | "red";

export interface ResearchDirection {
  title: string;
  mechanism: string;
  innovation: string;
  targets: string[];
  therapeuticApproach: string;
  crossDomainInspiration?: string;
  assumptions: string[];
}

export interface DirectionsOutput {
  directions: ResearchDirection[];
  domainContext: string;
  selectionRationale: string;
}

export interface Concept {
  term: string;
  definition: string;
  relatedTerms: string[];
  pathways: string[];
  targets: string[];
  clinicalSignificance: string;
}

export interface ConceptRelationship {
  source: string;
  target: string;
  type: string;
}

export interface KeyPathway {
  name: string;
  description: string;
  relevance: string;
}

export interface ConceptMap {
  concepts: Concept[];
  relationships: ConceptRelationship[];
  keyPathways: KeyPathway[];
  glossary: Record<string, string>;
}

export interface CrossDomainTransfer {
  sourceDomain: string;
  targetDomain: string;
  concept: string;
  sourceMechanism?: string;
  proposedApplication?: string;
  rationale: string;
  potentialImpact: string;
  challenges: string[];
  relevanceScore: number;
}

export interface DivergentVariant {
  variantId: string;
  type: string;
  claim: string;
  sourceDomain?: string;
  mechanismChange?: string;
  noveltyJustification: string;
  testability: string;
  plausibilityEstimate: number;
}

export interface HypothesisDocument {
  title: string;
  abstract: string;
  mechanismOfAction: string;
  molecularTargets: string[];
  pathwayImpact: string;
  deliveryOptions: string[];
  expectedOutcomes: string;
  clinicalRationale: string;
  resistanceConsiderations: string;
  keyAssumptions: string[];
  unknownFactors: string[];
  validationPlan: string;
  noveltyScore: number;
  divergentVariants: DivergentVariant[];
}

export interface SimulationScorecard {
  therapeuticPotential?: number;
  therapeuticPotentialReasoning?: string;
  deliveryFeasibility?: number;
  deliveryFeasibilityReasoning?: string;
  safetyProfile?: number;
  safetyProfileReasoning?: string;
  clinicalTranslatability?: number;
  clinicalTranslatabilityReasoning?: string;
  technicalFeasibility?: number;
  regulatoryPathReady?: number;
  domainSpecificScores: Record<string, number>;
  feasibilityScore: number;
  overallFeasibility: FeasibilityLevel;
  assumptions: string[];
  limitations: string[];
  recommendedValidations: string[];
}

/** A scorecard whose four base dimensions are all present, after reconciliation. */
export interface CompleteScorecard extends SimulationScorecard {
  technicalFeasibility: number;
  clinicalTranslatability: number;
  safetyProfile: number;
  regulatoryPathReady: number;
}

export interface FragileAssumption {
  assumption: string;
  impactIfWrong: string;
  mitigation: string;
}

export interface EthicsReport {
  verdict: EthicsVerdict;
  verdictReasoning: string;
  safetyConcerns: string[];
  regulatoryConsiderations: string[];
  ethicalFlags: string[];
  vulnerablePopulations: string[];
  informedConsentConsiderations: string[];
  recommendedSafeguards: string[];
  costEffectiveness: string;
  domainSpecificEthics: string;
  preclinicalRequirements: string[];
  clinicalTrialDesignNotes: string;
  fragileAssumptions: FragileAssumption[];
  potentialConfounders: string[];
  alternativeExplanations: string[];
  /** Set when the verdict was lowered to amber because the evidence base is weak. */
  verdictCapped?: boolean;
  requestedVerdict?: EthicsVerdict;
}
