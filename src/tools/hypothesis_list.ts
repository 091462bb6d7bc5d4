import { z } from "zod";
import { MEDICAL_DOMAINS } from "../schema/request.js";
import { RUN_STATUSES, STAGE_AGENTS } from "../schema/run.js";
import { defineTool } from "./types.js";

const runSummarySchema = z.object({
  id: z.string(),
  status: z.enum(RUN_STATUSES),
  domain: z.string(),
  goal: z.string(),
  progress: z.object({
    currentStage: z.enum(STAGE_AGENTS).nullable(),
    completedStages: z.number().int().nonnegative(),
    totalStages: z.number().int().nonnegative(),
  }),
  title: z.string().optional(),
  feasibility: z.enum(["GREEN", "AMBER", "RED"]).optional(),
  ethicsVerdict: z.enum(["green", "amber", "red"]).optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const hypothesisListTool = defineTool({
  name: "hypothesis_list",
  description: "List hypothesis runs, newest first, with filtering and cursor-based pagination.",
  input: {
    status: z.enum(RUN_STATUSES).optional(),
    domain: z.enum(MEDICAL_DOMAINS).optional(),
    query: z.string().trim().optional(),
    pageSize: z.number().int().min(1).max(50).optional(),
    cursor: z.string().optional(),
  },
  output: {
    runs: z.array(runSummarySchema),
    nextCursor: z.string().optional(),
    total: z.number().int().nonnegative(),
  },
  handler: async (input, context) => {
    const result = await context.service.list({
      status: input.status,
      domain: input.domain,
      query: input.query,
      pageSize: input.pageSize,
      cursor: input.cursor,
    });

    context.logger.info("Listed hypothesis runs", {
      count: result.runs.length,
      total: result.total,
    });

    return result;
  },
});
