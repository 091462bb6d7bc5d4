import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import { ClaudeProvider } from "../src/llm/ClaudeProvider.js";
import { BaseLLMProvider, type LLMResponse, type Message } from "../src/llm/LLMProvider.js";
import { LLMProviderManager } from "../src/llm/LLMProviderManager.js";
import { OpenAIProvider } from "../src/llm/OpenAIProvider.js";
import { SamplingBridge } from "../src/llm/samplingClient.js";

class EchoProvider extends BaseLLMProvider {
  readonly name = "Echo";
  readonly supportedModels = ["echo"];

  async generateMessage(messages: Message[]): Promise<LLMResponse> {
    return { content: messages.map((message) => message.content).join("|"), model: "echo" };
  }
}

function llmConfig(env: Record<string, string>) {
  return loadConfig(env).llm;
}

function stubJsonFetch(body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status: 200, headers: { "content-type": "application/json" } }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("LLMProviderManager", () => {
  it("requires the key of the chosen HTTP provider", () => {
    expect(() => new LLMProviderManager(llmConfig({ LLM_PROVIDER: "openai" }))).toThrow(
      "OPENAI_API_KEY must be set when using the OpenAI provider.",
    );
    expect(() => new LLMProviderManager(llmConfig({}))).toThrow(
      "Default provider 'sampling' could not be initialized.",
    );
  });

  it("routes to the default or a named provider", async () => {
    const manager = new LLMProviderManager(llmConfig({}), { sampling: new SamplingBridge() });
    manager.register("echo", new EchoProvider());

    expect(manager.getAvailableProviders()).toEqual(["sampling", "echo"]);
    const reply = await manager.generateMessage([{ role: "user", content: "hi" }], { provider: "echo" });
    expect(reply.content).toBe("hi");
    await expect(manager.generateMessage([], { provider: "nope" })).rejects.toThrow(
      "Provider 'nope' not available. Available providers: sampling, echo",
    );
  });

  it("reports health per provider", async () => {
    const manager = new LLMProviderManager(llmConfig({}), { sampling: new SamplingBridge() });
    manager.register("echo", new EchoProvider());
    expect(await manager.healthCheckAll()).toEqual({ sampling: false, echo: true });
  });
});

describe("SamplingBridge", () => {
  it("refuses to complete before a server is attached", async () => {
    await expect(new SamplingBridge().complete([{ role: "user", content: "hi" }])).rejects.toThrow(
      "MCP sampling server connection is not configured",
    );
  });
});

describe("OpenAIProvider", () => {
  it("posts chat completions and maps usage", async () => {
    const fetchMock = stubJsonFetch({
      id: "cmpl-1",
      model: "gpt-4o-mini",
      choices: [{ message: { content: '{"ok":true}' }, finish_reason: "stop" }],
      usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
    });

    const provider = new OpenAIProvider({ apiKey: "test-secret", baseURL: "https://gateway.test/v1/" });
    const reply = await provider.generateMessage([{ role: "user", content: "hi" }], {
      maxTokens: 50,
      temperature: 0.2,
      jsonMode: true,
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://gateway.test/v1/chat/completions");
    expect(sentBody(init)).toEqual({
      model: "gpt-4o-mini",
      messages: [{ role: "user", content: "hi" }],
      max_tokens: 50,
      temperature: 0.2,
      response_format: { type: "json_object" },
    });
    expect(reply).toEqual({
      content: '{"ok":true}',
      model: "gpt-4o-mini",
      usage: { inputTokens: 12, outputTokens: 4, totalTokens: 16 },
      metadata: { id: "cmpl-1", created: undefined, finishReason: "stop" },
    });
  });

  it("wraps API failures with the provider name", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("quota", { status: 429, statusText: "Too Many Requests" })),
    );
    await expect(
      new OpenAIProvider({ apiKey: "test-secret" }).generateMessage([{ role: "user", content: "hi" }]),
    ).rejects.toThrow("OpenAI generateMessage failed: OpenAI API error: 429 Too Many Requests");
  });
});

describe("ClaudeProvider", () => {
  it("moves system messages into the system field", async () => {
    const fetchMock = stubJsonFetch({
      id: "msg_1",
      type: "message",
      role: "assistant",
      model: "claude-test",
      content: [{ type: "text", text: "answer" }],
      usage: { input_tokens: 7, output_tokens: 3 },
    });

    const reply = await new ClaudeProvider({ apiKey: "test-secret", defaultModel: "claude-test" }).generateMessage([
      { role: "system", content: "Be brief" },
      { role: "user", content: "hi" },
    ]);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.anthropic.com/v1/messages");
    expect(sentBody(init)).toEqual({
      model: "claude-test",
      max_tokens: 1000,
      temperature: 0.7,
      system: "Be brief",
      messages: [{ role: "user", content: "hi" }],
    });
    expect(reply.content).toBe("answer");
    expect(reply.usage).toEqual({ inputTokens: 7, outputTokens: 3, totalTokens: 10 });
  });
});
