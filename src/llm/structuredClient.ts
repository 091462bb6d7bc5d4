import { setTimeout as sleep } from "node:timers/promises";
import type { z } from "zod";
import { errorMessage, StructuredOutputError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { LLMRequestOptions, LLMResponse, Message } from "./LLMProvider.js";

const log = createLogger("structured-llm");

export interface StructuredRequest<S extends z.ZodTypeAny> {
  prompt: string;
  systemMessage?: string;
  temperature: number;
  maxTokens: number;
  schema: S;
  /** Names the call in logs. */
  label?: string;
}

export interface StructuredLlm {
  generateStructured<S extends z.ZodTypeAny>(request: StructuredRequest<S>): Promise<z.output<S>>;
}

/** Anything that completes a chat; the provider manager in production. */
export interface ChatCompleter {
  generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse>;
}

export interface RetryPolicy {
  maxAttempts: number;
  retryBaseMs: number;
  retryMaxMs: number;
  timeoutMs: number;
}

/** Pulls the JSON object out of a reply that may be fenced or wrapped in prose. */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const body = fenced ? fenced[1].trim() : trimmed;

  try {
    return JSON.parse(body);
  } catch (error) {
    const start = body.indexOf("{");
    const end = body.lastIndexOf("}");
    if (start >= 0 && end > start) {
      return JSON.parse(body.slice(start, end + 1));
    }
    throw error;
  }
}

export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, "retryBaseMs" | "retryMaxMs">): number {
  return Math.min(policy.retryMaxMs, policy.retryBaseMs * 2 ** (attempt - 1));
}

export class StructuredLlmClient implements StructuredLlm {
  constructor(
    private readonly completer: ChatCompleter,
    private readonly policy: RetryPolicy,
    private readonly wait: (ms: number) => Promise<unknown> = sleep,
  ) {}

  async generateStructured<S extends z.ZodTypeAny>(request: StructuredRequest<S>): Promise<z.output<S>> {
    const messages: Message[] = [];
    if (request.systemMessage) {
      messages.push({ role: "system", content: request.systemMessage });
    }
    messages.push({ role: "user", content: request.prompt });

    const label = request.label ?? "structured";
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      try {
        const response = await this.completer.generateMessage(messages, {
          temperature: request.temperature,
          maxTokens: request.maxTokens,
          jsonMode: true,
          signal: AbortSignal.timeout(this.policy.timeoutMs),
        });
        if (response.content.length > 50_000) {
          log.warn("Very long completion, may be truncated", { label, length: response.content.length });
        }
        return request.schema.parse(extractJson(response.content));
      } catch (error) {
        lastError = error;
        log.warn("Structured completion attempt failed", {
          label,
          attempt,
          maxAttempts: this.policy.maxAttempts,
          error: errorMessage(error),
        });
        if (attempt < this.policy.maxAttempts) {
          await this.wait(backoffDelay(attempt, this.policy));
        }
      }
    }

    throw new StructuredOutputError(
      `${label}: no valid structured output after ${this.policy.maxAttempts} attempts: ${errorMessage(lastError)}`,
      this.policy.maxAttempts,
      lastError,
    );
  }
}
