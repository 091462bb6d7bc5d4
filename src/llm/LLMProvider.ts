/**
 * LLM provider contract shared by the HTTP providers and MCP sampling.
 */

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  metadata?: Record<string, unknown>;
}

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMRequestOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  stop?: string[];
  /** Ask for a single JSON object where the provider supports it. */
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LLMProvider {
  readonly name: string;
  readonly supportedModels: string[];

  generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse>;

  healthCheck(): Promise<boolean>;
}

export class ProviderHttpError extends Error {
  readonly response: { status: number; statusText: string; body: string };

  constructor(provider: string, status: number, statusText: string, body: string) {
    super(`${provider} API error: ${status} ${statusText}`);
    this.name = "ProviderHttpError";
    this.response = { status, statusText, body };
  }
}

export abstract class BaseLLMProvider implements LLMProvider {
  abstract readonly name: string;
  abstract readonly supportedModels: string[];

  abstract generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse>;

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateMessage([{ role: "user", content: "ping" }], { maxTokens: 5 });
      return true;
    } catch {
      return false;
    }
  }

  protected handleError(error: unknown, operation: string): never {
    if (error instanceof Error) {
      throw new Error(`${this.name} ${operation} failed: ${error.message}`, { cause: error });
    }
    throw new Error(`${this.name} ${operation} failed: ${String(error)}`);
  }

  protected validateApiKey(apiKey: string | undefined, providerName: string): string {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error(`${providerName} API key is required. Set it via environment variable or config.`);
    }
    return apiKey.trim();
  }

  protected async postJson(url: string, headers: Record<string, string>, body: unknown, signal?: AbortSignal): Promise<unknown> {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      throw new ProviderHttpError(this.name, response.status, response.statusText, await response.text());
    }
    return response.json();
  }
}
