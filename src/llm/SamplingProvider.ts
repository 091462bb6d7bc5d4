import { BaseLLMProvider, type LLMRequestOptions, type LLMResponse, type Message } from "./LLMProvider.js";
import type { SamplingBridge } from "./samplingClient.js";

export class SamplingProvider extends BaseLLMProvider {
  readonly name = "Sampling";
  readonly supportedModels = ["mcp-sampling"];

  constructor(private readonly bridge: SamplingBridge) {
    super();
  }

  async generateMessage(messages: Message[], options: LLMRequestOptions = {}): Promise<LLMResponse> {
    return this.bridge.complete(messages, options);
  }
}
