import type {
  LlmProviderCapabilities,
  LlmStreamChunk,
  LlmTurnInput,
} from "./llm-protocol.js";

export interface LlmProvider {
  name: string;
  version: string;
  start(): void | Promise<void>;
  stop(): void | Promise<void>;
  capabilities: LlmProviderCapabilities;
  streamTurn(input: LlmTurnInput): AsyncIterable<LlmStreamChunk>;
}
