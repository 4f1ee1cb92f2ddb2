export { devLog, devWarn, devError, scopedLogger } from "./debug-log.js";
export type { ScopedLogger } from "./debug-log.js";
export {
  AgentError,
  ConfigError,
  ProtocolViolationError,
  RequestCancelledError,
  RoundLimitExceededError,
  ToolArgumentsError,
  ToolExecutionError,
  ToolTimeoutError,
  errorMessage,
} from "./errors.js";
