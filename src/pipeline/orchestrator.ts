import type { ConceptLearnerAgent } from "../agents/conceptLearner.js";
import type { CrossDomainMapperAgent } from "../agents/crossDomainMapper.js";
import type { EthicsValidatorAgent } from "../agents/ethicsValidator.js";
import type { EvidenceMinerAgent } from "../agents/evidenceMiner.js";
import type { SimulationAgent } from "../agents/simulation.js";
import type { SynthesizerAgent } from "../agents/synthesizer.js";
import type { VisionerAgent } from "../agents/visioner.js";
import { RunTimeoutError } from "../errors.js";
import { round } from "../evidence/scorer.js";
import { createLogger, type ComponentLogger } from "../logger.js";
import { render } from "../prompt-helpers/template-renderer.js";
import type { EvidenceRecord } from "../schema/evidence.js";
import type { HypothesisRequest } from "../schema/request.js";
import type { SimulationScorecard } from "../schema/stages.js";
import {
  STAGE_AGENTS,
  type PipelineResult,
  type Provenance,
  type ReasoningStep,
  type StageAgent,
  type TraceEntry,
} from "../schema/run.js";
import { consolidateEvidence } from "../report/guards.js";
import { buildExecutiveSummary } from "../report/executiveSummary.js";
import { buildFlowchart } from "../report/flowchart.js";
import { buildNarrativeJson } from "../report/narrativeJson.js";
import { buildReasoningNarrative } from "../report/reasoningNarrative.js";
import { reconcile } from "../report/reconcile.js";
import { stageTemplate } from "./stageTemplates.js";

/** The seven stage agents, injected. Only the entry point of each is used. */
export interface StageAgents {
  visioner: Pick<VisionerAgent, "generateDirections">;
  conceptLearner: Pick<ConceptLearnerAgent, "buildConceptMap">;
  evidenceMiner: Pick<EvidenceMinerAgent, "gatherEvidence">;
  crossDomainMapper: Pick<CrossDomainMapperAgent, "findTransfers">;
  synthesizer: Pick<SynthesizerAgent, "synthesize">;
  simulation: Pick<SimulationAgent, "assessFeasibility">;
  ethicsValidator: Pick<EthicsValidatorAgent, "validate">;
}

export interface StageUpdate {
  agent: StageAgent;
  completedStages: number;
  totalStages: number;
  step: ReasoningStep;
  trace: TraceEntry;
}

export interface RunOptions {
  runId: string;
  onStageStart?: (agent: StageAgent) => void | Promise<void>;
  onStageComplete?: (update: StageUpdate) => void | Promise<void>;
}

interface StageOutcome<T> {
  output: T;
  values: Record<string, string | number | boolean>;
  outputSummary: string;
  keyDecisions: string[];
  confidence: number;
  supportingEvidence?: string[];
  sources?: string[];
  parameters?: Record<string, unknown>;
}

const STAGE_CONFIDENCE = {
  VisionerAgent: 0.8,
  ConceptLearnerAgent: 0.85,
  SynthesizerAgent: 0.85,
  SimulationAgent: 0.75,
  EthicsValidatorAgent: 0.85,
} as const;

const SIMULATION_NOTES = {
  GREEN: "Hypothesis is viable for implementation",
  AMBER: "Hypothesis requires careful planning",
  RED: "Hypothesis faces significant challenges",
} as const;

const ETHICS_NOTES = {
  green: "Hypothesis meets ethical standards",
  amber: "Hypothesis needs ethical considerations addressed",
  red: "Hypothesis requires significant ethical modifications",
} as const;

function topIds(records: EvidenceRecord[], count: number): string[] {
  return records.slice(0, count).map((record) => record.id);
}

function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}

/**
 * Runs the seven stages in order and assembles the reconciled result.
 * A stage is never retried here; the run budget is checked between stages.
 */
export class StageOrchestrator {
  constructor(
    private readonly agents: StageAgents,
    private readonly now: () => number = Date.now,
  ) {}

  async run(request: HypothesisRequest, options: RunOptions): Promise<PipelineResult> {
    const log = createLogger("orchestrator", options.runId);
    const { goal, domain } = request;
    const startedAt = this.now();
    const budgetMs = request.maxRuntimeMinutes * 60_000;

    const steps: ReasoningStep[] = [];
    const trace: TraceEntry[] = [];
    const provenance: Provenance[] = [];

    const runStage = async <T>(agent: StageAgent, fn: () => Promise<StageOutcome<T>>): Promise<T> => {
      if (this.now() - startedAt > budgetMs) {
        throw new RunTimeoutError(request.maxRuntimeMinutes, agent);
      }
      await options.onStageStart?.(agent);
      const template = stageTemplate(agent);
      const stageStart = this.now();
      log.info("Stage started", { stage: template.stage });

      const outcome = await fn();
      const durationMs = this.now() - stageStart;
      const timestamp = new Date().toISOString();
      const fill = (text: string): string => render(text, outcome.values);

      const step: ReasoningStep = {
        agent,
        action: template.action,
        inputSummary: fill(template.inputSummary),
        reasoning: fill(template.reasoning),
        alternativesConsidered: [...template.alternatives],
        decisionRationale: fill(template.decisionRationale),
        confidence: outcome.confidence,
        supportingEvidence: outcome.supportingEvidence ?? [],
        questionAsked: template.question,
        keyInsight: fill(template.keyInsight),
        impactOnHypothesis: template.impact,
        timestamp,
      };
      const entry: TraceEntry = {
        stage: template.stage,
        agent,
        inputSummary: step.inputSummary,
        outputSummary: outcome.outputSummary,
        durationMs,
        keyDecisions: outcome.keyDecisions,
        timestamp,
      };
      steps.push(step);
      trace.push(entry);
      provenance.push({
        agent,
        sources: outcome.sources ?? [...template.provenanceSources],
        timestamp,
        parameters: outcome.parameters ?? {},
      });

      log.info("Stage completed", { stage: template.stage, durationMs, summary: outcome.outputSummary });
      await options.onStageComplete?.({
        agent,
        completedStages: steps.length,
        totalStages: STAGE_AGENTS.length,
        step,
        trace: entry,
      });
      return outcome.output;
    };

    const directions = await runStage("VisionerAgent", async () => {
      const output = await this.agents.visioner.generateDirections(goal, domain, request.constraints);
      const count = output.directions.length;
      return {
        output,
        values: { goal, domain, directionCount: count },
        outputSummary: `${count} research directions identified`,
        keyDecisions: output.directions.slice(0, 3).map((direction) => direction.title),
        confidence: STAGE_CONFIDENCE.VisionerAgent,
        parameters: { temperature: 0.8, constraints: request.constraints ?? {} },
      };
    });

    const conceptMap = await runStage("ConceptLearnerAgent", async () => {
      const output = await this.agents.conceptLearner.buildConceptMap(goal, domain, directions);
      return {
        output,
        values: {
          domain,
          directionCount: directions.directions.length,
          conceptCount: output.concepts.length,
          pathwayCount: output.keyPathways.length,
        },
        outputSummary: `${output.concepts.length} concepts, ${output.keyPathways.length} pathways`,
        keyDecisions: output.concepts.slice(0, 5).map((concept) => concept.term),
        confidence: STAGE_CONFIDENCE.ConceptLearnerAgent,
        parameters: { temperature: 0.3 },
      };
    });

    const aggregation = await runStage("EvidenceMinerAgent", async () => {
      const output = await this.agents.evidenceMiner.gatherEvidence(conceptMap, domain, goal);
      const { records, outcomes } = output;
      const { tiers } = consolidateEvidence(records);
      const tierText = `T1:${tiers.T1}, T2:${tiers.T2}, T3:${tiers.T3}, T4:${tiers.T4}`;
      const consulted = outcomes.filter((outcome) => outcome.status !== "skipped").map((outcome) => outcome.source);
      const topConfidence = records.length > 0 ? Math.max(...records.map((record) => record.confidenceScore)) : 0.5;
      return {
        output,
        values: {
          conceptCount: conceptMap.concepts.length,
          sourceCount: consulted.length,
          sourceNames: consulted.length > 0 ? consulted.join(", ") : "none",
          evidenceCount: records.length,
          tiers: tierText,
          topConfidence: topConfidence.toFixed(2),
        },
        outputSummary: `${records.length} evidence packs (tiers: ${tierText})`,
        keyDecisions: outcomes.map((outcome) => `${outcome.source}: ${outcome.status} (${outcome.count})`),
        confidence: topConfidence,
        supportingEvidence: topIds(records, 10),
        sources: outcomes.filter((outcome) => outcome.status === "ok").map((outcome) => outcome.source),
        parameters: { searchTerms: output.request.searchTerms, mainQuery: output.request.mainQuery },
      };
    });
    const evidence = aggregation.records;

    const transfers = await runStage("CrossDomainMapperAgent", async () => {
      const output = await this.agents.crossDomainMapper.findTransfers(conceptMap, domain, request.crossDomains);
      const avgRelevance =
        output.length > 0 ? output.reduce((sum, transfer) => sum + transfer.relevanceScore, 0) / output.length : 0.5;
      const sourceDomains = [...new Set(output.map((transfer) => transfer.sourceDomain))];
      return {
        output,
        values: {
          crossDomainCount: request.crossDomains.length,
          crossDomains: request.crossDomains.join(", "),
          transferCount: output.length,
          sourceDomains: sourceDomains.length > 0 ? sourceDomains.join(", ") : "no source domains",
          avgRelevance: avgRelevance.toFixed(2),
          domain,
        },
        outputSummary: `${output.length} transfers (avg relevance: ${avgRelevance.toFixed(2)})`,
        keyDecisions: output.slice(0, 3).map((transfer) => `${transfer.sourceDomain}: ${transfer.concept}`),
        confidence: round(avgRelevance, 3),
        parameters: { crossDomains: request.crossDomains },
      };
    });

    const document = await runStage("SynthesizerAgent", async () => {
      const output = await this.agents.synthesizer.synthesize({
        directions,
        conceptMap,
        evidence,
        transfers,
        domain,
        goal,
      });
      return {
        output,
        values: {
          directionCount: directions.directions.length,
          conceptCount: conceptMap.concepts.length,
          evidenceCount: evidence.length,
          transferCount: transfers.length,
          title: output.title,
          novelty: output.noveltyScore.toFixed(2),
          hasMechanism: output.mechanismOfAction.trim().length > 0 ? "yes" : "no",
          hasTargets: output.molecularTargets.length > 0 ? "yes" : "no",
        },
        outputSummary:
          `Hypothesis: ${truncate(output.title, 50)} ` +
          `(novelty ${output.noveltyScore.toFixed(2)}, ${output.divergentVariants.length} variants)`,
        keyDecisions: output.molecularTargets.slice(0, 5),
        confidence: STAGE_CONFIDENCE.SynthesizerAgent,
        supportingEvidence: topIds(evidence, 5),
        parameters: { temperature: 0.5 },
      };
    });

    const scorecard = await runStage("SimulationAgent", async () => {
      const output = await this.agents.simulation.assessFeasibility(document, domain);
      const verdict = output.overallFeasibility;
      return {
        output,
        values: {
          title: document.title,
          feasibilityScore: output.feasibilityScore.toFixed(2),
          verdict,
          technical: output.technicalFeasibility?.toFixed(2) ?? "N/A",
          regulatory: output.regulatoryPathReady?.toFixed(2) ?? "N/A",
          verdictNote: SIMULATION_NOTES[verdict],
        },
        outputSummary: `Verdict: ${verdict} (${output.feasibilityScore.toFixed(2)})`,
        keyDecisions: output.limitations.slice(0, 3),
        confidence: STAGE_CONFIDENCE.SimulationAgent,
        parameters: { temperature: 0.3 },
      };
    });

    const ethics = await runStage("EthicsValidatorAgent", async () => {
      const output = await this.agents.ethicsValidator.validate(document, scorecard, domain, request.constraints);
      return {
        output,
        values: {
          title: document.title,
          verdict: output.verdict,
          concernCount: output.safetyConcerns.length,
          safeguardCount: output.recommendedSafeguards.length,
          verdictNote: ETHICS_NOTES[output.verdict],
        },
        outputSummary: `Verdict: ${output.verdict} (${output.fragileAssumptions.length} fragile assumptions)`,
        keyDecisions: output.recommendedSafeguards.slice(0, 3),
        confidence: STAGE_CONFIDENCE.EthicsValidatorAgent,
        parameters: { temperature: 0.3 },
      };
    });

    return this.assemble({
      request,
      runId: options.runId,
      log,
      directions,
      conceptMap,
      evidence,
      transfers,
      document,
      scorecard,
      ethics,
      steps,
      trace,
      provenance,
    });
  }

  private assemble(parts: {
    request: HypothesisRequest;
    runId: string;
    log: ComponentLogger;
    directions: PipelineResult["directions"];
    conceptMap: PipelineResult["conceptMap"];
    evidence: EvidenceRecord[];
    transfers: PipelineResult["crossDomainTransfers"];
    document: PipelineResult["hypothesisDocument"];
    scorecard: SimulationScorecard;
    ethics: PipelineResult["ethicsReport"];
    steps: ReasoningStep[];
    trace: TraceEntry[];
    provenance: Provenance[];
  }): PipelineResult {
    const { request, document, steps } = parts;
    const reconciled = reconcile({
      request,
      document,
      scorecard: parts.scorecard,
      ethics: parts.ethics,
      evidence: parts.evidence,
      steps,
    });
    parts.log.info("Reconciled run", {
      composite: reconciled.scorecard.feasibilityScore,
      feasibility: reconciled.scorecard.overallFeasibility,
      ...reconciled.reconciliation,
    });

    const executiveSummary = buildExecutiveSummary({
      document,
      scorecard: reconciled.scorecard,
      ethics: reconciled.ethics,
      evidence: reconciled.evidence,
      evidenceRecords: parts.evidence,
      transfers: parts.transfers,
      steps,
      avgConfidence: reconciled.avgConfidence,
      mode: reconciled.reconciliation.mode,
      domain: request.domain,
    });

    return {
      directions: parts.directions,
      conceptMap: parts.conceptMap,
      evidencePacks: parts.evidence,
      crossDomainTransfers: parts.transfers,
      hypothesisDocument: document,
      simulationScorecard: reconciled.scorecard,
      ethicsReport: reconciled.ethics,
      reasoningSteps: steps,
      reasoningTrace: parts.trace,
      provenance: parts.provenance,
      summary: {
        title: document.title,
        feasibility: reconciled.scorecard.overallFeasibility,
        ethicsVerdict: reconciled.ethics.verdict,
        noveltyScore: document.noveltyScore,
      },
      executiveSummary,
      reasoningNarrative: buildReasoningNarrative(steps, parts.evidence),
      reasoningNarrativeJson: buildNarrativeJson({
        runId: parts.runId,
        goal: request.goal,
        steps,
        document,
        scorecard: reconciled.scorecard,
        ethics: reconciled.ethics,
        evidence: reconciled.evidence,
        timestamp: new Date().toISOString(),
      }),
      reasoningFlowchart: buildFlowchart(steps),
      reconciliation: reconciled.reconciliation,
    };
  }
}
