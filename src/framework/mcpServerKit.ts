import type { Readable, Writable } from "node:stream";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { RequestHandlerExtra } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { ServerNotification, ServerRequest } from "@modelcontextprotocol/sdk/types.js";

export type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
export { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

export interface McpServerOptions {
  name: string;
  version: string;
  title?: string;
  instructions?: string;
}

export type ServerRequestExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface TransportStreams {
  input?: Readable;
  output?: Writable;
}

export const DEFAULT_INSTRUCTIONS = [
  "Generate medical research hypotheses with a seven-stage agent pipeline.",
  "Call hypothesis_create with a goal and a domain; it returns a run id straight away.",
  "Poll hypothesis_get until the status is completed or failed, adding include sections for the heavy output.",
  "The hypothesis_brief prompt turns a completed run into a review brief.",
].join(" ");

export function createMcpServer(options: McpServerOptions): McpServer {
  return new McpServer(
    {
      name: options.name,
      version: options.version,
      title: options.title ?? options.name,
    },
    {
      capabilities: {
        tools: { listChanged: true },
        resources: { listChanged: true },
        prompts: { listChanged: true },
        logging: {},
        sampling: {},
      },
      instructions: options.instructions ?? DEFAULT_INSTRUCTIONS,
    },
  );
}

export async function connectToTransport(server: McpServer, transport: StdioServerTransport): Promise<void> {
  await server.connect(transport);
}

export function createTransport(streams?: TransportStreams): StdioServerTransport {
  return new StdioServerTransport(streams?.input, streams?.output);
}
