import { z } from "zod";
import { RUN_STATUSES } from "../schema/run.js";
import { defineTool } from "./types.js";

export const hypothesisDeleteTool = defineTool({
  name: "hypothesis_delete",
  description: "Delete a finished hypothesis run. Runs that are pending or running cannot be deleted.",
  input: {
    runId: z.string().min(1, "Run identifier is required"),
  },
  output: {
    runId: z.string(),
    status: z.enum(RUN_STATUSES),
  },
  handler: async (input, context) => {
    const result = await context.service.delete(input.runId);
    context.logger.info("Deleted hypothesis run", result);
    return result;
  },
});
