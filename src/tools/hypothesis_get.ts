import { z } from "zod";
import { RUN_SECTIONS } from "../service/hypothesisService.js";
import { defineTool } from "./types.js";

export const hypothesisGetTool = defineTool({
  name: "hypothesis_get",
  description:
    "Fetch one hypothesis run with its status and progress. Heavy sections (evidence, reasoning, narrative, " +
    "executiveSummary, trace) are returned only when listed in include.",
  input: {
    runId: z.string().min(1, "Run identifier is required"),
    include: z.array(z.enum(RUN_SECTIONS)).optional(),
  },
  output: {
    run: z.record(z.unknown()),
  },
  handler: async (input, context) => {
    const run = await context.service.get(input.runId, input.include);
    context.logger.info("Fetched hypothesis run", { runId: run.id, status: run.status, include: input.include ?? [] });
    return { run: { ...run } };
  },
});
