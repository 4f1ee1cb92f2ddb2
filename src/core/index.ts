export type { LlmProvider } from "./contracts/provider.js";
export type {
  AssistantMessage,
  Attachment,
  ChatMessage,
  LlmProviderCapabilities,
  LlmStreamChunk,
  LlmStreamDelta,
  LlmToolSchema,
  LlmTurnInput,
  SystemMessage,
  ToolInvocation,
  ToolInvocationFragment,
  ToolMessage,
  UserMessage,
} from "./contracts/llm-protocol.js";
export { loadProvider } from "./runtime/provider-loader.js";
export type { ProviderFactory } from "./runtime/provider-loader.js";
export { userMessageText } from "./runtime/user-content.js";
