export * from "./core/index.js";
export * from "./shared/index.js";
export * from "./orchestrator/index.js";
export * from "./tools/index.js";
export { AgentEngine, parseChatRequest } from "./engine/index.js";
export type { AgentEngineOptions, ChatRequest, EngineEvent } from "./engine/index.js";
export { WsServer } from "./server/index.js";
export { loadSettings, readPositiveIntEnv } from "./config/settings.js";
export type { AgentSettings, ProviderName } from "./config/settings.js";
export { loadSystemPrompt } from "./prompts/system-prompt.js";
