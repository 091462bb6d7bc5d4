/**
 * Registers the configured LLM providers and routes requests to one of them.
 */

import type { AppConfig } from "../config.js";
import { ClaudeProvider } from "./ClaudeProvider.js";
import type { LLMProvider, LLMRequestOptions, LLMResponse, Message } from "./LLMProvider.js";
import { OpenAIProvider } from "./OpenAIProvider.js";
import { SamplingProvider } from "./SamplingProvider.js";
import type { SamplingBridge } from "./samplingClient.js";

export type ProviderName = AppConfig["llm"]["provider"];

export interface LLMManagerOptions {
  defaultProvider?: ProviderName;
  /** Without a bridge the sampling provider is not registered. */
  sampling?: SamplingBridge;
}

export class LLMProviderManager {
  private readonly providers = new Map<string, LLMProvider>();
  private readonly defaultProvider: ProviderName;

  constructor(config: AppConfig["llm"], options: LLMManagerOptions = {}) {
    this.defaultProvider = options.defaultProvider ?? config.provider;

    if (config.openai.apiKey) {
      this.providers.set("openai", new OpenAIProvider(config.openai));
    } else if (this.defaultProvider === "openai") {
      throw new Error("OPENAI_API_KEY must be set when using the OpenAI provider.");
    }

    if (config.claude.apiKey) {
      this.providers.set("claude", new ClaudeProvider(config.claude));
    } else if (this.defaultProvider === "claude") {
      throw new Error("ANTHROPIC_API_KEY must be set when using the Anthropic provider.");
    }

    if (options.sampling) {
      this.providers.set("sampling", new SamplingProvider(options.sampling));
    }

    if (!this.providers.has(this.defaultProvider)) {
      throw new Error(`Default provider '${this.defaultProvider}' could not be initialized.`);
    }
  }

  /** Registers or replaces a provider, e.g. an in-process fake. */
  register(name: string, provider: LLMProvider): void {
    this.providers.set(name, provider);
  }

  getAvailableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  async generateMessage(
    messages: Message[],
    options: LLMRequestOptions & { provider?: string } = {},
  ): Promise<LLMResponse> {
    const { provider: providerName, ...llmOptions } = options;
    const name = providerName ?? this.defaultProvider;
    const provider = this.providers.get(name);
    if (!provider) {
      throw new Error(
        `Provider '${name}' not available. Available providers: ${this.getAvailableProviders().join(", ")}`,
      );
    }

    return provider.generateMessage(messages, llmOptions);
  }

  async healthCheckAll(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const [name, provider] of this.providers.entries()) {
      results[name] = await provider.healthCheck();
    }
    return results;
  }
}
