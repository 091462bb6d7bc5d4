import { z } from "zod";
import { RunNotFoundError } from "../errors.js";
import type { McpServer } from "../framework/mcpServerKit.js";
import { render } from "../prompt-helpers/template-renderer.js";
import type { HypothesisService } from "../service/hypothesisService.js";
import type { HypothesisRun } from "../schema/run.js";

const BRIEF_TEMPLATE = `## Hypothesis Brief: {{title}}

**Run**: {{runId}} | **Domain**: {{domain}} | **Mode**: {{mode}}
**Feasibility**: {{feasibility}} | **Ethics**: {{ethicsVerdict}}

### Elevator Pitch

{{elevatorPitch}}

### Current Treatment Gap

{{currentTreatmentGap}}

### Key Innovation

{{keyInnovation}}

### Biological Rationale

{{biologicalRationale}}

### Priority Actions

{{priorityActions}}

### Evidence Strength

{{evidenceStrength}}

### Feasibility Verdict

{{feasibilityVerdict}}

### Timeline and Cost

- Timeline: {{estimatedTimeline}}
- Cost: {{estimatedCost}}

**Success probability**: {{successProbability}}
{{#if consistencyIssues}}
### Consistency Warnings

{{consistencyIssues}}
{{/if}}
---

{{#if focus}}Focus the discussion on: {{focus}}

{{/if}}Review this hypothesis critically. Point out the weakest assumption, the experiment that would falsify it
fastest, and anything in the evidence or feasibility sections that does not hold together.`;

const PENDING_TEMPLATE = `Hypothesis run {{runId}} is {{status}} ({{completedStages}}/{{totalStages}} stages).
{{#if errorMessage}}
Failure: {{errorMessage}}
{{/if}}
A brief is available once the run completes. Check again with hypothesis_get.`;

function userMessage(text: string) {
  return {
    messages: [
      {
        role: "user" as const,
        content: {
          type: "text" as const,
          text,
        },
      },
    ],
  };
}

export function renderBrief(run: HypothesisRun, focus?: string): string {
  const summary = run.executiveSummary;
  if (run.status !== "completed" || !summary) {
    return render(PENDING_TEMPLATE, {
      runId: run.id,
      status: run.status,
      completedStages: run.progress.completedStages,
      totalStages: run.progress.totalStages,
      errorMessage: run.errorMessage,
    });
  }

  return render(BRIEF_TEMPLATE, {
    runId: run.id,
    title: summary.title,
    domain: summary.domain,
    mode: summary.mode,
    feasibility: run.summary?.feasibility ?? "N/A",
    ethicsVerdict: run.summary?.ethicsVerdict ?? "N/A",
    elevatorPitch: summary.elevatorPitch,
    currentTreatmentGap: summary.currentTreatmentGap,
    keyInnovation: summary.keyInnovation,
    biologicalRationale: summary.biologicalRationale,
    priorityActions: summary.priorityActions.map((action, index) => `${index + 1}. ${action}`).join("\n"),
    evidenceStrength: summary.evidenceStrength,
    feasibilityVerdict: summary.feasibilityVerdict,
    estimatedTimeline: summary.estimatedTimeline,
    estimatedCost: summary.estimatedCost,
    successProbability: summary.successProbability,
    consistencyIssues: summary.consistencyIssues.map((issue) => `- ${issue}`).join("\n"),
    focus,
  });
}

/**
 * Register hypothesis_brief prompt
 */
export function registerHypothesisBriefPrompt(server: McpServer, service: HypothesisService): void {
  server.registerPrompt(
    "hypothesis_brief",
    {
      description: "Turn a completed hypothesis run's executive summary into a review brief",
      argsSchema: {
        runId: z.string().describe("Hypothesis run ID"),
        focus: z.string().optional().describe("Aspect to concentrate the review on"),
      },
    },
    async (args) => {
      try {
        const run = await service.get(args.runId, ["executiveSummary"]);
        return userMessage(renderBrief(run, args.focus));
      } catch (error) {
        if (error instanceof RunNotFoundError) {
          return userMessage(`Error: Run ${args.runId} not found`);
        }
        throw error;
      }
    },
  );
}
