import type { McpServer } from "../framework/mcpServerKit.js";
import type { HypothesisService } from "../service/hypothesisService.js";
import { registerHypothesisBriefPrompt } from "./hypothesis-brief.js";

/**
 * Register all prompts with the MCP server
 */
export function registerPrompts(server: McpServer, service: HypothesisService): void {
  registerHypothesisBriefPrompt(server, service);
}
