import { randomUUID } from "node:crypto";
import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { CreateMessageRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { ConceptLearnerAgent } from "./agents/conceptLearner.js";
import { CrossDomainMapperAgent } from "./agents/crossDomainMapper.js";
import { EthicsValidatorAgent } from "./agents/ethicsValidator.js";
import { EvidenceMinerAgent } from "./agents/evidenceMiner.js";
import { SimulationAgent } from "./agents/simulation.js";
import { SynthesizerAgent } from "./agents/synthesizer.js";
import { VisionerAgent } from "./agents/visioner.js";
import { loadConfig, type AppConfig } from "./config.js";
import { RunStore } from "./data/runStore.js";
import { errorMessage } from "./errors.js";
import { EvidenceAggregator } from "./evidence/aggregator.js";
import { createEvidenceSources, type EvidenceSource } from "./evidence/sources/index.js";
import {
  connectToTransport,
  createMcpServer,
  createTransport,
  type McpServer,
  type ServerRequestExtra,
  type TransportStreams,
} from "./framework/mcpServerKit.js";
import { createLogger, log } from "./logger.js";
import { LLMProviderManager } from "./llm/LLMProviderManager.js";
import type { LLMRequestOptions, Message } from "./llm/LLMProvider.js";
import { SamplingBridge } from "./llm/samplingClient.js";
import { StructuredLlmClient, type StructuredLlm } from "./llm/structuredClient.js";
import { getProjectRoot } from "./paths.js";
import { StageOrchestrator } from "./pipeline/orchestrator.js";
import { registerPrompts } from "./prompts/index.js";
import { HypothesisService } from "./service/hypothesisService.js";
import { hypothesisCreateTool } from "./tools/hypothesis_create.js";
import { hypothesisDeleteTool } from "./tools/hypothesis_delete.js";
import { hypothesisGetTool } from "./tools/hypothesis_get.js";
import { hypothesisListTool } from "./tools/hypothesis_list.js";
import type { ToolContext, ToolDefinition } from "./tools/types.js";

// Keep server version in sync with package.json
const packageSchema = z.object({ version: z.string() });
export const SERVER_VERSION = packageSchema.parse(
  JSON.parse(readFileSync(resolve(getProjectRoot(), "package.json"), "utf8")),
).version;

export const SERVER_NAME = "mcp-med-hypothesis";

type CreateMessageRequest = z.infer<typeof CreateMessageRequestSchema>;

const TOOL_REGISTRY: ToolDefinition[] = [
  hypothesisCreateTool,
  hypothesisGetTool,
  hypothesisListTool,
  hypothesisDeleteTool,
];

export interface BuildServerOptions {
  streams?: TransportStreams;
  config?: AppConfig;
  /** Replaces the provider-backed structured client, e.g. with an in-process fake. */
  llm?: StructuredLlm;
  /** Replaces the configured evidence connectors. */
  sources?: EvidenceSource[];
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  log({
    level: "info",
    component: "server",
    message: "Building MCP hypothesis server",
    meta: {
      version: SERVER_VERSION,
      runsPath: config.runsPath,
      provider: config.llm.provider,
    },
  });

  const server = createMcpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    title: "Medical Hypothesis Pipeline",
  });

  const bridge = new SamplingBridge();
  bridge.attach(server.server);
  const llm = options.llm ?? createStructuredClient(config, bridge);

  const aggregator = new EvidenceAggregator({
    sources: options.sources ?? createEvidenceSources(config.evidence),
    maxResults: config.evidence.maxResults,
    timeoutMs: config.evidence.timeoutMs,
  });
  const orchestrator = new StageOrchestrator({
    visioner: new VisionerAgent(llm),
    conceptLearner: new ConceptLearnerAgent(llm),
    evidenceMiner: new EvidenceMinerAgent(aggregator, llm),
    crossDomainMapper: new CrossDomainMapperAgent(llm),
    synthesizer: new SynthesizerAgent(llm),
    simulation: new SimulationAgent(llm),
    ethicsValidator: new EthicsValidatorAgent(llm),
  });

  const store = await RunStore.open(config.runsPath);
  const service = new HypothesisService(store, orchestrator);

  TOOL_REGISTRY.forEach((tool) => registerTool(server, tool, service));
  registerPrompts(server, service);
  await registerDefaultResources(server);
  registerSamplingHandler(server, config);

  const transport = createTransport(options.streams);
  return { server, transport, service, store };
}

export async function start(options: BuildServerOptions = {}) {
  const { server, transport, service } = await buildServer(options);

  await connectToTransport(server, transport);
  return { server, service };
}

function createStructuredClient(config: AppConfig, bridge: SamplingBridge): StructuredLlm {
  const manager = new LLMProviderManager(config.llm, { sampling: bridge });
  return new StructuredLlmClient(manager, {
    maxAttempts: config.llm.maxAttempts,
    retryBaseMs: config.llm.retryBaseMs,
    retryMaxMs: config.llm.retryMaxMs,
    timeoutMs: config.llm.timeoutMs,
  });
}

async function registerDefaultResources(server: McpServer) {
  const projectRoot = getProjectRoot();
  const readme = {
    uri: `doc://${SERVER_NAME}/README`,
    name: "Project README",
    description: "Pipeline overview, tools and configuration for the hypothesis server.",
    mimeType: "text/markdown",
    path: resolve(projectRoot, "README.md"),
  };

  try {
    await readFile(readme.path, "utf8");
  } catch (error) {
    log({
      level: "error",
      component: "resources",
      message: `Failed to register resource ${readme.uri}`,
      meta: { error: errorMessage(error), path: readme.path },
    });
    return;
  }

  server.registerResource(
    readme.name,
    readme.uri,
    {
      description: readme.description,
      mimeType: readme.mimeType,
    },
    async () => ({
      contents: [
        {
          uri: readme.uri,
          mimeType: readme.mimeType,
          text: await readFile(readme.path, "utf8"),
        },
      ],
    }),
  );
}

function registerSamplingHandler(server: McpServer, config: AppConfig) {
  let samplingManager: LLMProviderManager | undefined;
  const getSamplingManager = (): LLMProviderManager => {
    if (config.llm.provider === "sampling") {
      throw new Error("LLM_PROVIDER 'sampling' cannot be used to service sampling/createMessage requests.");
    }
    samplingManager ??= new LLMProviderManager(config.llm);
    return samplingManager;
  };

  server.server.setRequestHandler(CreateMessageRequestSchema, async (request: CreateMessageRequest) => {
    const { messages, systemPrompt, maxTokens, temperature, stopSequences, modelPreferences } = request.params;

    if (messages.length === 0) {
      throw new Error("sampling/createMessage requires at least one message");
    }

    const conversation: Message[] = [];

    if (systemPrompt) {
      conversation.push({ role: "system", content: systemPrompt });
    }

    for (const message of messages) {
      if (message.content.type !== "text") {
        throw new Error("sampling/createMessage only supports text content");
      }

      conversation.push({ role: message.role, content: message.content.text });
    }

    const llmOptions: LLMRequestOptions = { maxTokens };

    if (typeof temperature === "number") {
      llmOptions.temperature = temperature;
    }

    if (Array.isArray(stopSequences) && stopSequences.length > 0) {
      llmOptions.stop = stopSequences;
    }

    const preferredModel = modelPreferences?.hints?.find((hint) =>
      typeof hint.name === "string" && hint.name.trim().length > 0,
    )?.name;

    if (preferredModel) {
      llmOptions.model = preferredModel;
    }

    try {
      const response = await getSamplingManager().generateMessage(conversation, llmOptions);

      return {
        model: response.model,
        role: "assistant" as const,
        stopReason: "endTurn" as const,
        content: {
          type: "text" as const,
          text: response.content,
        },
      };
    } catch (error) {
      const message = errorMessage(error);
      const providerUnavailable = /Provider '.+' not available/.test(message);
      const failureMessage = providerUnavailable
        ? "No LLM providers configured to handle sampling requests"
        : message;

      log({
        level: "error",
        component: "sampling",
        message: "sampling/createMessage failed",
        meta: { error: message },
      });

      throw new Error(failureMessage);
    }
  });
}

function registerTool(server: McpServer, tool: ToolDefinition, service: HypothesisService) {
  server.registerTool(
    tool.name,
    {
      description: tool.description,
      inputSchema: tool.inputShape,
      outputSchema: tool.outputShape,
    },
    async (args, extra) => {
      const context = createToolContext(tool.name, service, extra);
      try {
        const structuredContent = await tool.handler(args, context);
        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(structuredContent, null, 2),
            },
          ],
          structuredContent,
        };
      } catch (error) {
        context.logger.error("Tool call failed", { error: errorMessage(error) });
        throw error;
      }
    },
  );
}

function createToolContext(toolName: string, service: HypothesisService, extra?: ServerRequestExtra): ToolContext {
  const requestId = extra?.requestId !== undefined ? String(extra.requestId) : randomUUID();

  return {
    requestId,
    now: () => new Date(),
    logger: createLogger(`tool:${toolName}`, requestId),
    service,
  };
}
