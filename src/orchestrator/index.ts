export { DeltaAccumulator } from "./delta-accumulator.js";
export { RoundHistory } from "./round-history.js";
export { executeRound } from "./tool-coordinator.js";
export type { RoundExecutionContext } from "./tool-coordinator.js";
export { assembleModelMessages } from "./message-assembly.js";
export type { VisibleMessage } from "./message-assembly.js";
export {
  TOOL_ROUND_HISTORY_KEY,
  parseChatMessage,
  parseConversationState,
  serializeMessage,
  serializeState,
} from "./state.js";
export type { ConversationState } from "./state.js";
export {
  ConversationOrchestrator,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_TOOL_TIMEOUT_MS,
} from "./conversation-orchestrator.js";
export type {
  ConversationOrchestratorOptions,
  OrchestratorPhase,
  OrchestratorRequest,
  OrchestratorResult,
  OrchestratorSinks,
} from "./conversation-orchestrator.js";
