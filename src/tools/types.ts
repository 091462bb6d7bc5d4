import { z } from "zod";
import type { ComponentLogger } from "../logger.js";
import type { HypothesisService } from "../service/hypothesisService.js";

export interface ToolContext {
  requestId: string;
  now: () => Date;
  logger: ComponentLogger;
  service: HypothesisService;
}

/** A tool as the server registers it: raw shapes plus an untyped entry point. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  outputShape: z.ZodRawShape;
  handler: (args: unknown, context: ToolContext) => Promise<Record<string, unknown>>;
}

export interface ToolSpec<Input extends z.ZodRawShape, Output extends z.ZodRawShape> {
  name: string;
  description: string;
  input: Input;
  output: Output;
  handler: (
    input: z.objectOutputType<Input, z.ZodTypeAny, "strip">,
    context: ToolContext,
  ) => Promise<z.objectInputType<Output, z.ZodTypeAny, "strip">>;
}

const structuredContentSchema = z.record(z.unknown());

/**
 * Binds a typed handler to its schemas. Arguments are parsed here; the SDK
 * checks the result against the output shape.
 */
export function defineTool<Input extends z.ZodRawShape, Output extends z.ZodRawShape>(
  spec: ToolSpec<Input, Output>,
): ToolDefinition {
  const inputSchema = z.object(spec.input);
  return {
    name: spec.name,
    description: spec.description,
    inputShape: spec.input,
    outputShape: spec.output,
    handler: async (args, context) =>
      structuredContentSchema.parse(await spec.handler(inputSchema.parse(args), context)),
  };
}
