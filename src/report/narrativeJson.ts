import { stageTemplate } from "../pipeline/stageTemplates.js";
import type { NarrativeAgentEntry, NarrativeJson, ReasoningStep } from "../schema/run.js";
import type { CompleteScorecard, EthicsReport, HypothesisDocument } from "../schema/stages.js";
import type { ConsolidatedEvidence } from "./guards.js";

export const NARRATIVE_CRITERIA = ["non-invasive", "reproducible", "clinically feasible", "evidence-based"];

const NEXT_STEPS = [
  "Validate key molecular targets",
  "Conduct preliminary in vitro/in vivo studies",
  "Design pilot clinical study",
];

export function agentShortName(agent: string): string {
  return agent.replace("Agent", "").toLowerCase();
}

function agentEntry(step: ReasoningStep, next: ReasoningStep | undefined): NarrativeAgentEntry {
  const template = stageTemplate(step.agent);
  const whyThisNotThat =
    step.alternativesConsidered.length > 0
      ? [
          {
            kept: step.action,
            dropped: step.alternativesConsidered.slice(0, 3).join(", "),
            reason: step.decisionRationale ? step.decisionRationale.slice(0, 200) : "See reasoning",
          },
        ]
      : [];
  return {
    name: agentShortName(step.agent),
    action: step.action,
    whyThisNotThat,
    decisionPoints: [...template.decisionPoints],
    handoff: { to: next ? agentShortName(next.agent) : "user", payload: [...template.handoffPayload] },
    uncertainties: [...template.uncertaintyTags],
    confidence: step.confidence,
    keyInsight: step.keyInsight ?? "",
  };
}

export interface NarrativeJsonInput {
  runId: string;
  goal: string;
  steps: ReasoningStep[];
  document: HypothesisDocument;
  scorecard: CompleteScorecard;
  ethics: EthicsReport;
  evidence: ConsolidatedEvidence;
  timestamp: string;
}

/** Structured narrative and UI cards; every score is the reconciled one. */
export function buildNarrativeJson(input: NarrativeJsonInput): NarrativeJson {
  const { scorecard, ethics } = input;
  const agentVersions: Record<string, string> = {};
  for (const step of input.steps) {
    agentVersions[step.agent] = "1.0";
  }

  return {
    narrative: {
      question: input.goal || "Generate novel medical hypothesis",
      criteria: [...NARRATIVE_CRITERIA],
      agents: input.steps.map((step, index) => agentEntry(step, input.steps[index + 1])),
    },
    cards: {
      hypothesis: {
        title: input.document.title || "Untitled",
        feasibility: scorecard.overallFeasibility,
        ethics: ethics.verdict,
        panel: input.document.molecularTargets.slice(0, 5),
        nextSteps: [...NEXT_STEPS],
      },
      evidence: { count: input.evidence.total, tiers: { ...input.evidence.tiers } },
      simulation: {
        scores: {
          technicalFeasibility: scorecard.technicalFeasibility,
          clinicalTranslatability: scorecard.clinicalTranslatability,
          safetyProfile: scorecard.safetyProfile,
          regulatoryPathReady: scorecard.regulatoryPathReady,
          feasibilityScore: scorecard.feasibilityScore,
        },
      },
      ethics: { verdict: ethics.verdict, conditions: ethics.recommendedSafeguards.slice(0, 5) },
    },
    provenance: {
      traceId: input.runId,
      timestamp: input.timestamp,
      agentVersions,
    },
  };
}
