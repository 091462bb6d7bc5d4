import { describe, expect, it, vi } from "vitest";
import { RunTimeoutError } from "../src/errors.js";
import { StageOrchestrator, type StageUpdate } from "../src/pipeline/orchestrator.js";
import { hypothesisRequestSchema } from "../src/schema/request.js";
import { STAGE_AGENTS, type StageAgent } from "../src/schema/run.js";
import { makeAgents, makeDirections, makeDocument, makeTransfer } from "./fixtures.js";

const request = hypothesisRequestSchema.parse({
  goal: "Slow atherosclerotic plaque growth",
  domain: "cardiology",
});

describe("StageOrchestrator", () => {
  it("runs the seven stages in order and reports progress", async () => {
    const started: StageAgent[] = [];
    const completed: StageUpdate[] = [];
    const orchestrator = new StageOrchestrator(makeAgents());

    const result = await orchestrator.run(request, {
      runId: "run-1",
      onStageStart: (agent) => {
        started.push(agent);
      },
      onStageComplete: (update) => {
        completed.push(update);
      },
    });

    expect(started).toEqual([...STAGE_AGENTS]);
    expect(completed.map((update) => update.completedStages)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(completed.every((update) => update.totalStages === 7)).toBe(true);
    expect(result.reasoningSteps.map((step) => step.agent)).toEqual([...STAGE_AGENTS]);
    expect(result.reasoningTrace).toHaveLength(7);
    expect(result.provenance).toHaveLength(7);
  });

  it("records evidence outcomes on the evidence stage", async () => {
    const result = await new StageOrchestrator(makeAgents()).run(request, { runId: "run-2" });

    const evidenceStep = result.reasoningSteps[2];
    expect(evidenceStep.confidence).toBe(0.9);
    expect(evidenceStep.supportingEvidence).toEqual(["ev_1", "ev_2", "ev_3"]);

    const evidenceTrace = result.reasoningTrace[2];
    expect(evidenceTrace.outputSummary).toBe("3 evidence packs (tiers: T1:2, T2:0, T3:0, T4:1)");
    expect(evidenceTrace.keyDecisions).toEqual(["PubMed: ok (3)", "Kaggle: skipped (0)"]);
    expect(result.provenance[2].sources).toEqual(["PubMed"]);

    expect(result.reasoningTrace[3].outputSummary).toBe("1 transfers (avg relevance: 0.80)");
    expect(result.reasoningSteps[3].confidence).toBe(0.8);
  });

  it("hands earlier outputs to the synthesizer", async () => {
    const synthesize = vi.fn(async () => makeDocument());
    await new StageOrchestrator(makeAgents({ synthesizer: { synthesize } })).run(request, { runId: "run-3" });

    expect(synthesize).toHaveBeenCalledWith(
      expect.objectContaining({
        directions: makeDirections(),
        transfers: [makeTransfer("materials", "Hydrogel depot")],
        domain: "cardiology",
        goal: "Slow atherosclerotic plaque growth",
      }),
    );
  });

  it("returns reconciled scores in every report", async () => {
    const result = await new StageOrchestrator(makeAgents()).run(request, { runId: "run-4" });

    expect(result.simulationScorecard.overallFeasibility).toBe("AMBER");
    expect(result.summary).toEqual({
      title: makeDocument().title,
      feasibility: "AMBER",
      ethicsVerdict: "green",
      noveltyScore: 0.7,
    });
    expect(result.reasoningNarrativeJson.cards.hypothesis.feasibility).toBe("AMBER");
    expect(result.reasoningNarrativeJson.cards.simulation.scores.feasibilityScore).toBe(
      result.simulationScorecard.feasibilityScore,
    );
    expect(result.reasoningNarrativeJson.provenance.traceId).toBe("run-4");
    expect(result.reconciliation.mode).toBe("therapeutic");
    expect(result.executiveSummary.domain).toBe("cardiology");
  });

  it("stops before the next stage once the run budget is spent", async () => {
    let clock = 0;
    const buildConceptMap = vi.fn();
    const agents = makeAgents({
      visioner: {
        generateDirections: async () => {
          clock += 9 * 60_000;
          return makeDirections();
        },
      },
      conceptLearner: { buildConceptMap },
    });

    const run = new StageOrchestrator(agents, () => clock).run(request, { runId: "run-5" });

    await expect(run).rejects.toBeInstanceOf(RunTimeoutError);
    await expect(run).rejects.toThrow("Run exceeded its 8 minute budget before stage ConceptLearnerAgent");
    expect(buildConceptMap).not.toHaveBeenCalled();
  });

  it("propagates a stage failure", async () => {
    const agents = makeAgents({
      ethicsValidator: {
        validate: async () => {
          throw new Error("model unavailable");
        },
      },
    });

    await expect(new StageOrchestrator(agents).run(request, { runId: "run-6" })).rejects.toThrow("model unavailable");
  });
});
