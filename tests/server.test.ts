import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { loadConfig } from "../src/config.js";
import { connectToTransport } from "../src/framework/mcpServerKit.js";
import type { StructuredLlm } from "../src/llm/structuredClient.js";
import { buildServer, SERVER_NAME, SERVER_VERSION } from "../src/server.js";

/** Every agent falls back to its offline answer. */
const offlineLlm: StructuredLlm = {
  generateStructured: async () => {
    throw new Error("model offline");
  },
};

const responseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.number(),
  result: z.record(z.unknown()).optional(),
  error: z.object({ code: z.number(), message: z.string() }).optional(),
});
type RpcResponse = z.infer<typeof responseSchema>;

const toolResultSchema = z.object({
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

const createdSchema = z.object({ runId: z.string(), status: z.string() });

/** Line-delimited JSON-RPC over a pair of in-memory streams. */
class Wire {
  private buffer = "";
  private readonly waiters = new Map<number, (response: RpcResponse) => void>();
  private nextId = 1;

  constructor(
    private readonly input: PassThrough,
    output: PassThrough,
  ) {
    output.on("data", (chunk: Buffer) => {
      this.buffer += chunk.toString("utf8");
      let newline = this.buffer.indexOf("\n");
      while (newline !== -1) {
        const line = this.buffer.slice(0, newline).trim();
        this.buffer = this.buffer.slice(newline + 1);
        if (line) {
          this.accept(JSON.parse(line));
        }
        newline = this.buffer.indexOf("\n");
      }
    });
  }

  private accept(message: unknown): void {
    const parsed = responseSchema.safeParse(message);
    if (!parsed.success) {
      return; // notifications and server-initiated requests
    }
    const waiter = this.waiters.get(parsed.data.id);
    this.waiters.delete(parsed.data.id);
    waiter?.(parsed.data);
  }

  request(method: string, params: Record<string, unknown> = {}): Promise<RpcResponse> {
    const id = this.nextId++;
    const response = new Promise<RpcResponse>((resolve) => {
      this.waiters.set(id, resolve);
    });
    this.notify(method, params, id);
    return response;
  }

  notify(method: string, params: Record<string, unknown> = {}, id?: number): void {
    this.input.write(`${JSON.stringify({ jsonrpc: "2.0", ...(id !== undefined ? { id } : {}), method, params })}\n`);
  }

  async callTool(name: string, args: Record<string, unknown>) {
    const response = await this.request("tools/call", { name, arguments: args });
    return toolResultSchema.parse(response.result);
  }
}

async function connect() {
  const input = new PassThrough();
  const output = new PassThrough();
  const config = { ...loadConfig({ LOG_LEVEL: "error" }), runsPath: ":memory:" };
  const built = await buildServer({ streams: { input, output }, config, llm: offlineLlm, sources: [] });
  await connectToTransport(built.server, built.transport);

  const wire = new Wire(input, output);
  const initialize = await wire.request("initialize", {
    protocolVersion: "2025-06-18",
    clientInfo: { name: "TestClient", version: "0.0.1" },
    capabilities: {},
  });
  wire.notify("notifications/initialized");
  return { ...built, wire, initialize };
}

let closeServer: (() => Promise<void>) | undefined;

afterEach(async () => {
  await closeServer?.();
  closeServer = undefined;
});

describe("mcp server", () => {
  it("announces itself and lists tools, prompts and resources", async () => {
    const { server, wire, initialize } = await connect();
    closeServer = () => server.close();

    expect(initialize.result).toMatchObject({
      protocolVersion: "2025-06-18",
      serverInfo: { name: SERVER_NAME, title: "Medical Hypothesis Pipeline", version: SERVER_VERSION },
    });

    const tools = z
      .object({ tools: z.array(z.object({ name: z.string() })) })
      .parse((await wire.request("tools/list")).result);
    expect(tools.tools.map((tool) => tool.name)).toEqual([
      "hypothesis_create",
      "hypothesis_get",
      "hypothesis_list",
      "hypothesis_delete",
    ]);

    const prompts = z
      .object({ prompts: z.array(z.object({ name: z.string() })) })
      .parse((await wire.request("prompts/list")).result);
    expect(prompts.prompts.map((prompt) => prompt.name)).toEqual(["hypothesis_brief"]);

    const resources = z
      .object({ resources: z.array(z.object({ uri: z.string() })) })
      .parse((await wire.request("resources/list")).result);
    expect(resources.resources.map((resource) => resource.uri)).toEqual([`doc://${SERVER_NAME}/README`]);
  });

  it("runs a hypothesis end to end through the tools", async () => {
    const { server, wire, service } = await connect();
    closeServer = () => server.close();

    const created = await wire.callTool("hypothesis_create", {
      goal: "Slow atherosclerotic plaque growth",
      domain: "cardiology",
    });
    const { runId, status } = createdSchema.parse(created.structuredContent);
    expect(status).toBe("pending");

    await service.drain();

    const fetched = await wire.callTool("hypothesis_get", { runId, include: ["executiveSummary"] });
    expect(fetched.structuredContent).toMatchObject({
      run: {
        id: runId,
        status: "completed",
        progress: { currentStage: null, completedStages: 7, totalStages: 7 },
        summary: { title: "Novel Therapeutic Approach for cardiology" },
        executiveSummary: { domain: "cardiology" },
      },
    });

    const listed = await wire.callTool("hypothesis_list", { status: "completed" });
    expect(listed.structuredContent).toMatchObject({ total: 1, runs: [{ id: runId, status: "completed" }] });

    const brief = await wire.request("prompts/get", { name: "hypothesis_brief", arguments: { runId } });
    const text = z
      .object({ messages: z.array(z.object({ content: z.object({ text: z.string() }) })) })
      .parse(brief.result).messages[0].content.text;
    expect(text.split("\n")[0]).toBe("## Hypothesis Brief: Novel Therapeutic Approach for cardiology");

    const deleted = await wire.callTool("hypothesis_delete", { runId });
    expect(deleted.structuredContent).toEqual({ runId, status: "completed" });
  });

  it("reports tool failures as errors", async () => {
    const { server, wire } = await connect();
    closeServer = () => server.close();

    const missing = await wire.callTool("hypothesis_get", { runId: "missing" });
    expect(missing.isError).toBe(true);

    const brief = await wire.request("prompts/get", { name: "hypothesis_brief", arguments: { runId: "missing" } });
    expect(brief.result).toMatchObject({
      messages: [{ role: "user", content: { type: "text", text: "Error: Run missing not found" } }],
    });
  });
});
