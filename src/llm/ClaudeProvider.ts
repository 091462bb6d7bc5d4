/**
 * Anthropic Messages API.
 */

import { z } from "zod";
import { BaseLLMProvider, type LLMRequestOptions, type LLMResponse, type Message } from "./LLMProvider.js";

const messageResponseSchema = z.object({
  id: z.string(),
  type: z.string(),
  role: z.string(),
  model: z.string(),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

export interface ClaudeConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  version?: string;
}

export class ClaudeProvider extends BaseLLMProvider {
  readonly name = "Claude";
  readonly supportedModels = ["claude-3-5-sonnet-20241022", "claude-3-5-haiku-20241022", "claude-3-opus-20240229"];

  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly defaultModel: string;
  private readonly version: string;

  constructor(config: ClaudeConfig = {}) {
    super();
    this.apiKey = this.validateApiKey(config.apiKey, "Claude");
    this.baseURL = config.baseURL ?? "https://api.anthropic.com";
    this.defaultModel = config.defaultModel ?? "claude-3-5-sonnet-20241022";
    this.version = config.version ?? "2023-06-01";
  }

  async generateMessage(messages: Message[], options: LLMRequestOptions = {}): Promise<LLMResponse> {
    try {
      const system = messages
        .filter((message) => message.role === "system")
        .map((message) => message.content)
        .join("\n");
      const conversation = messages.flatMap((message) =>
        message.role === "system" ? [] : [{ role: message.role, content: message.content }],
      );

      const raw = await this.postJson(
        `${this.baseURL}/v1/messages`,
        { "x-api-key": this.apiKey, "anthropic-version": this.version },
        {
          model: options.model ?? this.defaultModel,
          max_tokens: options.maxTokens ?? 1000,
          temperature: options.temperature ?? 0.7,
          top_p: options.topP,
          stop_sequences: options.stop,
          system: system || undefined,
          messages: conversation,
        },
        options.signal,
      );

      const data = messageResponseSchema.parse(raw);
      const text = data.content.find((block) => block.type === "text")?.text ?? "";
      return {
        content: text,
        model: data.model,
        usage: {
          inputTokens: data.usage.input_tokens,
          outputTokens: data.usage.output_tokens,
          totalTokens: data.usage.input_tokens + data.usage.output_tokens,
        },
        metadata: { id: data.id, type: data.type, role: data.role },
      };
    } catch (error) {
      this.handleError(error, "generateMessage");
    }
  }
}
