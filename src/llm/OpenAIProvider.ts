/**
 * OpenAI-compatible chat completions. A custom base URL covers DeepSeek and
 * other compatible gateways.
 */

import { z } from "zod";
import { BaseLLMProvider, type LLMRequestOptions, type LLMResponse, type Message } from "./LLMProvider.js";

const chatResponseSchema = z.object({
  id: z.string().default(""),
  created: z.number().optional(),
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1, "OpenAI API returned empty choices array"),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export interface OpenAIConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  organization?: string;
}

export class OpenAIProvider extends BaseLLMProvider {
  readonly name = "OpenAI";
  readonly supportedModels = ["gpt-4o", "gpt-4o-mini", "gpt-4-turbo", "deepseek-chat", "deepseek-reasoner"];

  private readonly apiKey: string;
  private readonly baseURL: string;
  private readonly defaultModel: string;
  private readonly organization?: string;

  constructor(config: OpenAIConfig = {}) {
    super();
    this.apiKey = this.validateApiKey(config.apiKey, "OpenAI");
    this.baseURL = (config.baseURL ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.defaultModel = config.defaultModel ?? "gpt-4o-mini";
    this.organization = config.organization;
  }

  async generateMessage(messages: Message[], options: LLMRequestOptions = {}): Promise<LLMResponse> {
    try {
      const headers: Record<string, string> = { Authorization: `Bearer ${this.apiKey}` };
      if (this.organization) {
        headers["OpenAI-Organization"] = this.organization;
      }

      const raw = await this.postJson(
        `${this.baseURL}/chat/completions`,
        headers,
        {
          model: options.model ?? this.defaultModel,
          messages: messages.map(({ role, content }) => ({ role, content })),
          max_tokens: options.maxTokens ?? 1000,
          temperature: options.temperature ?? 0.7,
          top_p: options.topP,
          stop: options.stop,
          ...(options.jsonMode ? { response_format: { type: "json_object" } } : {}),
        },
        options.signal,
      );

      const data = chatResponseSchema.parse(raw);
      const [choice] = data.choices;
      return {
        content: choice.message.content ?? "",
        model: data.model,
        usage: data.usage
          ? {
              inputTokens: data.usage.prompt_tokens,
              outputTokens: data.usage.completion_tokens,
              totalTokens: data.usage.total_tokens,
            }
          : undefined,
        metadata: { id: data.id, created: data.created, finishReason: choice.finish_reason },
      };
    } catch (error) {
      this.handleError(error, "generateMessage");
    }
  }
}
