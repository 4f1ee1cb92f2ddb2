// Error taxonomy for the agent core.
//
// Fatal to a request:  ProtocolViolationError, RoundLimitExceededError, ConfigError,
//                      RequestCancelledError
// Recovered per tool:  ToolArgumentsError, ToolTimeoutError, ToolExecutionError

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AgentError";
  }
}

/** The provider's delta stream disagrees with the fragment framing. */
export class ProtocolViolationError extends AgentError {
  constructor(message: string) {
    super(message, "PROTOCOL_VIOLATION");
    this.name = "ProtocolViolationError";
  }
}

export class RoundLimitExceededError extends AgentError {
  constructor(public readonly maxRounds: number) {
    super(`Model kept requesting tools after ${maxRounds} rounds.`, "ROUND_LIMIT_EXCEEDED");
    this.name = "RoundLimitExceededError";
  }
}

/** The client that sent the request went away. */
export class RequestCancelledError extends AgentError {
  constructor(message = "Request cancelled.") {
    super(message, "REQUEST_CANCELLED");
    this.name = "RequestCancelledError";
  }
}

export class ToolArgumentsError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOOL_ARGUMENTS", cause);
    this.name = "ToolArgumentsError";
  }
}

export class ToolTimeoutError extends AgentError {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`, "TOOL_TIMEOUT");
    this.name = "ToolTimeoutError";
  }
}

export class ToolExecutionError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOOL_EXECUTION", cause);
    this.name = "ToolExecutionError";
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
