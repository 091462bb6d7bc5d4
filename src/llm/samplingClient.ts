import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import type { CreateMessageRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { LLMRequestOptions, LLMResponse, Message } from "./LLMProvider.js";

const DEFAULT_MAX_TOKENS = 2000;

const usageSchema = z
  .object({
    inputTokens: z.number().optional(),
    outputTokens: z.number().optional(),
    totalTokens: z.number().optional(),
    promptTokens: z.number().optional(),
    completionTokens: z.number().optional(),
  })
  .optional()
  .catch(undefined);

const metadataSchema = z.record(z.unknown()).optional().catch(undefined);

/**
 * Routes completions to the connected MCP client through sampling/createMessage.
 * The server attaches itself once the transport is up.
 */
export class SamplingBridge {
  private server: Server | undefined;

  attach(server: Server): void {
    this.server = server;
  }

  detach(): void {
    this.server = undefined;
  }

  get attached(): boolean {
    return this.server !== undefined;
  }

  async complete(messages: Message[], options: LLMRequestOptions = {}): Promise<LLMResponse> {
    const server = this.server;
    if (!server) {
      throw new Error("MCP sampling server connection is not configured");
    }

    const conversation = messages.flatMap((message) =>
      message.role === "system"
        ? []
        : [{ role: message.role, content: { type: "text" as const, text: message.content } }],
    );
    if (conversation.length === 0) {
      throw new Error("sampling/createMessage requires at least one user or assistant message");
    }

    const systemPrompt = messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");
    const model = options.model?.trim();

    const params: CreateMessageRequest["params"] = {
      messages: conversation,
      maxTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(systemPrompt ? { systemPrompt } : {}),
      ...(typeof options.temperature === "number" ? { temperature: options.temperature } : {}),
      ...(options.stop && options.stop.length > 0 ? { stopSequences: options.stop } : {}),
      ...(model ? { modelPreferences: { hints: [{ name: model }] } } : {}),
    };

    const result = await server.createMessage(params, { signal: options.signal });
    if (result.content.type !== "text") {
      throw new Error("MCP sampling response did not include text content");
    }

    const usage = usageSchema.parse(result.usage);
    const inputTokens = usage?.inputTokens ?? usage?.promptTokens ?? 0;
    const outputTokens = usage?.outputTokens ?? usage?.completionTokens ?? 0;

    return {
      content: result.content.text,
      model: result.model,
      usage: usage ? { inputTokens, outputTokens, totalTokens: usage.totalTokens ?? inputTokens + outputTokens } : undefined,
      metadata: metadataSchema.parse(result.metadata),
    };
  }
}
