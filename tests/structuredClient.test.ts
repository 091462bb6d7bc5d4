import { describe, expect, it } from "vitest";
import { z } from "zod";
import { StructuredOutputError } from "../src/errors.js";
import type { LLMRequestOptions, LLMResponse, Message } from "../src/llm/LLMProvider.js";
import { backoffDelay, extractJson, StructuredLlmClient, type ChatCompleter } from "../src/llm/structuredClient.js";

class ScriptedCompleter implements ChatCompleter {
  readonly calls: Array<{ messages: Message[]; options?: LLMRequestOptions }> = [];

  constructor(private readonly replies: string[]) {}

  async generateMessage(messages: Message[], options?: LLMRequestOptions): Promise<LLMResponse> {
    this.calls.push({ messages, options });
    const content = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    return { content, model: "scripted" };
  }
}

const policy = { maxAttempts: 3, retryBaseMs: 2000, retryMaxMs: 10_000, timeoutMs: 5000 };
const schema = z.object({ title: z.string(), score: z.number() });

function client(completer: ChatCompleter) {
  const waits: number[] = [];
  const llm = new StructuredLlmClient(completer, policy, async (ms) => {
    waits.push(ms);
  });
  return { llm, waits };
}

describe("extractJson", () => {
  it("reads fenced, bare and prose-wrapped objects", () => {
    expect(extractJson('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(extractJson('  {"a": 2}  ')).toEqual({ a: 2 });
    expect(extractJson('Here you go: {"a": 3} hope it helps')).toEqual({ a: 3 });
  });

  it("throws when there is no object", () => {
    expect(() => extractJson("no json here")).toThrow(SyntaxError);
  });
});

describe("backoffDelay", () => {
  it("doubles up to the ceiling", () => {
    const retry = { retryBaseMs: 2000, retryMaxMs: 10_000 };
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, retry))).toEqual([2000, 4000, 8000, 10_000]);
  });
});

describe("StructuredLlmClient", () => {
  it("sends the system message first and asks for JSON", async () => {
    const completer = new ScriptedCompleter(['{"title": "NLRP3", "score": 0.7}']);
    const { llm, waits } = client(completer);

    const result = await llm.generateStructured({
      prompt: "Propose a hypothesis",
      systemMessage: "You are a careful scientist",
      temperature: 0.3,
      maxTokens: 800,
      schema,
    });

    expect(result).toEqual({ title: "NLRP3", score: 0.7 });
    expect(waits).toEqual([]);
    expect(completer.calls[0].messages).toEqual([
      { role: "system", content: "You are a careful scientist" },
      { role: "user", content: "Propose a hypothesis" },
    ]);
    expect(completer.calls[0].options).toMatchObject({ temperature: 0.3, maxTokens: 800, jsonMode: true });
  });

  it("retries malformed and invalid replies with backoff", async () => {
    const completer = new ScriptedCompleter(["not json", '{"title": "NLRP3"}', '{"title": "NLRP3", "score": 1}']);
    const { llm, waits } = client(completer);

    const result = await llm.generateStructured({ prompt: "p", temperature: 0.3, maxTokens: 100, schema });

    expect(result).toEqual({ title: "NLRP3", score: 1 });
    expect(completer.calls).toHaveLength(3);
    expect(waits).toEqual([2000, 4000]);
  });

  it("gives up after the last attempt", async () => {
    const { llm, waits } = client(new ScriptedCompleter(["still not json"]));

    const call = llm.generateStructured({ prompt: "p", temperature: 0.3, maxTokens: 100, schema, label: "visioner" });

    await expect(call).rejects.toBeInstanceOf(StructuredOutputError);
    await expect(call).rejects.toThrow(/^visioner: no valid structured output after 3 attempts/);
    await expect(call).rejects.toMatchObject({ attempts: 3 });
    expect(waits).toEqual([2000, 4000]);
  });
});
