import { randomUUID } from "node:crypto";
import { errorMessage, RunNotFoundError, RunStateError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { ListRunsOptions, ListRunsResult, RunStore } from "../data/runStore.js";
import type { RunOptions } from "../pipeline/orchestrator.js";
import { hypothesisRequestSchema, type HypothesisRequest, type HypothesisRequestInput } from "../schema/request.js";
import {
  STAGE_AGENTS,
  TERMINAL_STATUSES,
  type HypothesisRun,
  type PipelineResult,
  type RunStatus,
} from "../schema/run.js";

const log = createLogger("hypothesis-service");

export const RUN_SECTIONS = ["evidence", "reasoning", "narrative", "executiveSummary", "trace"] as const;
export type RunSection = (typeof RUN_SECTIONS)[number];

/** What the service needs from the orchestrator. */
export interface PipelineRunner {
  run(request: HypothesisRequest, options: RunOptions): Promise<PipelineResult>;
}

export interface HypothesisServiceOptions {
  idFactory?: () => string;
  now?: () => Date;
}

/** A run without the sections the caller did not ask for. */
export type RunView = HypothesisRun;

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/** Drops the heavy sections that are not in `include`. */
export function selectSections(run: HypothesisRun, include: readonly RunSection[] = []): RunView {
  const {
    evidencePacks,
    reasoningSteps,
    reasoningNarrative,
    reasoningNarrativeJson,
    reasoningFlowchart,
    executiveSummary,
    reasoningTrace,
    provenance,
    ...rest
  } = run;
  const view: RunView = { ...rest };
  if (include.includes("evidence")) {
    view.evidencePacks = evidencePacks;
  }
  if (include.includes("reasoning")) {
    view.reasoningSteps = reasoningSteps;
  }
  if (include.includes("narrative")) {
    view.reasoningNarrative = reasoningNarrative;
    view.reasoningNarrativeJson = reasoningNarrativeJson;
    view.reasoningFlowchart = reasoningFlowchart;
  }
  if (include.includes("executiveSummary")) {
    view.executiveSummary = executiveSummary;
  }
  if (include.includes("trace")) {
    view.reasoningTrace = reasoningTrace;
    view.provenance = provenance;
  }
  return view;
}

/**
 * Accepts hypothesis requests, runs the pipeline in the background and keeps
 * each run's status in the store.
 */
export class HypothesisService {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly store: RunStore,
    private readonly pipeline: PipelineRunner,
    options: HypothesisServiceOptions = {},
  ) {
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  async create(input: HypothesisRequestInput): Promise<{ runId: string; status: RunStatus }> {
    const request = hypothesisRequestSchema.parse(input);
    const timestamp = this.now().toISOString();
    const run: HypothesisRun = {
      id: this.idFactory(),
      status: "pending",
      request,
      domain: request.domain,
      goal: request.goal,
      progress: { currentStage: null, completedStages: 0, totalStages: STAGE_AGENTS.length },
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    await this.store.create(run);
    log.info("Run accepted", { runId: run.id, domain: run.domain, mode: request.mode });

    const task = this.execute(run.id, request).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);

    return { runId: run.id, status: run.status };
  }

  async get(runId: string, include: readonly RunSection[] = []): Promise<RunView> {
    const run = await this.store.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return selectSections(run, include);
  }

  list(options: ListRunsOptions = {}): Promise<ListRunsResult> {
    return this.store.list(options);
  }

  async delete(runId: string): Promise<{ runId: string; status: RunStatus }> {
    const run = await this.store.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    if (!isTerminal(run.status)) {
      throw new RunStateError(runId, run.status, "delete");
    }
    const removed = await this.store.delete(runId);
    log.info("Run deleted", { runId, status: removed.status });
    return { runId, status: removed.status };
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Waits for every run in flight, including ones started while waiting. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async execute(runId: string, request: HypothesisRequest): Promise<void> {
    try {
      const result = await this.pipeline.run(request, {
        runId,
        onStageStart: async (agent) => {
          const run = await this.store.get(runId);
          await this.store.update(runId, {
            status: "running",
            progress: {
              currentStage: agent,
              completedStages: run?.progress.completedStages ?? 0,
              totalStages: STAGE_AGENTS.length,
            },
          });
        },
        onStageComplete: async (update) => {
          await this.store.update(runId, {
            progress: {
              currentStage: update.agent,
              completedStages: update.completedStages,
              totalStages: update.totalStages,
            },
          });
        },
      });
      await this.store.update(runId, {
        ...result,
        status: "completed",
        progress: { currentStage: null, completedStages: STAGE_AGENTS.length, totalStages: STAGE_AGENTS.length },
        completedAt: this.now().toISOString(),
      });
      log.info("Run completed", {
        runId,
        feasibility: result.summary.feasibility,
        ethicsVerdict: result.summary.ethicsVerdict,
      });
    } catch (error) {
      const message = errorMessage(error);
      log.error("Run failed", { runId, error: message });
      try {
        await this.store.update(runId, {
          status: "failed",
          errorMessage: message,
          completedAt: this.now().toISOString(),
        });
      } catch (storeError) {
        log.error("Could not record run failure", { runId, error: errorMessage(storeError) });
      }
    }
  }
}
