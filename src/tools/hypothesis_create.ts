import { z } from "zod";
import { hypothesisRequestSchema } from "../schema/request.js";
import { RUN_STATUSES } from "../schema/run.js";
import { defineTool } from "./types.js";

export const hypothesisCreateTool = defineTool({
  name: "hypothesis_create",
  description:
    "Start a hypothesis generation run for a medical research goal. Returns a run id immediately; " +
    "poll hypothesis_get for progress and results.",
  input: hypothesisRequestSchema.shape,
  output: {
    runId: z.string(),
    status: z.enum(RUN_STATUSES),
  },
  handler: async (input, context) => {
    const result = await context.service.create(input);
    context.logger.info("Hypothesis run created", { runId: result.runId, domain: input.domain });
    return result;
  },
});
