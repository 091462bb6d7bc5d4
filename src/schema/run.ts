import type { EvidenceRecord } from "./evidence.js";
import type { HypothesisRequest } from "./request.js";
import type {
  CompleteScorecard,
  ConceptMap,
  CrossDomainTransfer,
  DirectionsOutput,
  EthicsReport,
  EthicsVerdict,
  FeasibilityLevel,
  HypothesisDocument,
} from "./stages.js";

export const RUN_STATUSES = ["pending", "running", "completed", "failed", "cancelled"] as const;
export type RunStatus = (typeof RUN_STATUSES)[number];

export const TERMINAL_STATUSES: readonly RunStatus[] = ["completed", "failed", "cancelled"];

export type DetectedMode = "diagnostic" | "therapeutic";

export const STAGE_AGENTS = [
  "VisionerAgent",
  "ConceptLearnerAgent",
  "EvidenceMinerAgent",
  "CrossDomainMapperAgent",
  "SynthesizerAgent",
  "SimulationAgent",
  "EthicsValidatorAgent",
] as const;
export type StageAgent = (typeof STAGE_AGENTS)[number];

export interface ReasoningStep {
  agent: StageAgent;
  action: string;
  inputSummary: string;
  reasoning: string;
  alternativesConsidered: string[];
  decisionRationale: string;
  confidence: number;
  supportingEvidence: string[];
  questionAsked?: string;
  keyInsight?: string;
  impactOnHypothesis?: string;
  timestamp: string;
}

export interface TraceEntry {
  stage: string;
  agent: StageAgent;
  inputSummary: string;
  outputSummary: string;
  durationMs: number;
  keyDecisions: string[];
  timestamp: string;
}

export interface Provenance {
  agent: StageAgent;
  sources: string[];
  timestamp: string;
  parameters: Record<string, unknown>;
}

export interface RunProgress {
  currentStage: StageAgent | null;
  completedStages: number;
  totalStages: number;
}

export interface RunSummary {
  title: string;
  feasibility: FeasibilityLevel;
  ethicsVerdict: EthicsVerdict;
  noveltyScore: number;
}

export interface Reconciliation {
  inferredDimensions: string[];
  evidenceStrength: number;
  verdictCapped: boolean;
  mode: DetectedMode;
}

export interface ExecutiveSummary {
  title: string;
  domain: string;
  mode: DetectedMode;
  elevatorPitch: string;
  currentTreatmentGap: string;
  keyInnovation: string;
  biologicalRationale: string;
  priorityActions: string[];
  evidenceStrength: string;
  feasibilityVerdict: string;
  estimatedTimeline: string;
  estimatedCost: string;
  successProbability: string;
  epistemicConfidence?: string;
  divergentVariants?: string;
  criticalAssumptions?: string;
  consistencyIssues: string[];
}

export interface NarrativeAgentEntry {
  name: string;
  action: string;
  whyThisNotThat: Array<{ kept: string; dropped: string; reason: string }>;
  decisionPoints: string[];
  handoff: { to: string; payload: string[] };
  uncertainties: string[];
  confidence: number;
  keyInsight: string;
}

export interface TierCounts {
  T1: number;
  T2: number;
  T3: number;
  T4: number;
}

export interface NarrativeJson {
  narrative: {
    question: string;
    criteria: string[];
    agents: NarrativeAgentEntry[];
  };
  cards: {
    hypothesis: {
      title: string;
      feasibility: FeasibilityLevel;
      ethics: EthicsVerdict;
      panel: string[];
      nextSteps: string[];
    };
    evidence: { count: number; tiers: TierCounts };
    simulation: {
      scores: {
        technicalFeasibility: number;
        clinicalTranslatability: number;
        safetyProfile: number;
        regulatoryPathReady: number;
        feasibilityScore: number;
      };
    };
    ethics: { verdict: EthicsVerdict; conditions: string[] };
  };
  provenance: {
    traceId: string;
    timestamp: string;
    agentVersions: Record<string, string>;
  };
}

/** Everything the orchestrator produces for one completed run. */
export interface PipelineResult {
  directions: DirectionsOutput;
  conceptMap: ConceptMap;
  evidencePacks: EvidenceRecord[];
  crossDomainTransfers: CrossDomainTransfer[];
  hypothesisDocument: HypothesisDocument;
  simulationScorecard: CompleteScorecard;
  ethicsReport: EthicsReport;
  reasoningSteps: ReasoningStep[];
  reasoningTrace: TraceEntry[];
  provenance: Provenance[];
  summary: RunSummary;
  executiveSummary: ExecutiveSummary;
  reasoningNarrative: string;
  reasoningNarrativeJson: NarrativeJson;
  reasoningFlowchart: string;
  reconciliation: Reconciliation;
}

export interface HypothesisRun extends Partial<PipelineResult> {
  id: string;
  status: RunStatus;
  request: HypothesisRequest;
  domain: string;
  goal: string;
  progress: RunProgress;
  errorMessage?: string;
  createdAt: string;
  updatedAt: string;
  completedAt?: string;
}
