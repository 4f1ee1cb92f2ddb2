import type { ToolInvocation, ToolMessage } from "../core/contracts/llm-protocol.js";
import { ToolTimeoutError, errorMessage } from "../shared/index.js";
import { parseToolArguments } from "./arguments.js";
import type { ValidationResult } from "./registry.js";
import type { OutputChannel, Stage, Tool, ToolOutcome } from "./types.js";

export const TOOL_ERROR_PREFIX = "Error during tool execution: ";

/** Everything a guarded tool needs besides the invocation itself. */
export interface ToolEnvironment {
  conversationId: string;
  credential?: string;
  stage: Stage;
  output: OutputChannel;
  /** Cancels the whole request; the tool's own signal follows it. */
  signal?: AbortSignal;
}

export interface GuardOptions {
  /** Per-invocation deadline; zero or absent disables it. */
  timeoutMs?: number;
  validate?: (toolName: string, input: unknown) => ValidationResult;
}

/** Never rejects: every failure path resolves to an error tool message. */
export type GuardedTool = (invocation: ToolInvocation, env: ToolEnvironment) => Promise<ToolMessage>;

export function toolErrorMessage(invocation: ToolInvocation, err: unknown): ToolMessage {
  return {
    role: "tool",
    toolCallId: invocation.id,
    name: invocation.name,
    content: `${TOOL_ERROR_PREFIX}${errorMessage(err)}`,
  };
}

export function isToolErrorMessage(message: ToolMessage): boolean {
  return message.content.startsWith(TOOL_ERROR_PREFIX);
}

function toToolMessage(invocation: ToolInvocation, outcome: ToolOutcome): ToolMessage {
  if (typeof outcome === "string") {
    return { role: "tool", toolCallId: invocation.id, name: invocation.name, content: outcome };
  }
  return {
    role: "tool",
    toolCallId: invocation.id,
    name: invocation.name,
    content: outcome.content,
    ...(outcome.attachments && outcome.attachments.length > 0
      ? { attachments: outcome.attachments }
      : {}),
  };
}

async function runWithDeadline(
  tool: Tool,
  timeoutMs: number | undefined,
  controller: AbortController,
  run: () => Promise<ToolOutcome>,
): Promise<ToolOutcome> {
  if (!timeoutMs || timeoutMs <= 0) {
    return run();
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeout = new ToolTimeoutError(tool.name, timeoutMs);
      controller.abort(timeout);
      reject(timeout);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wraps a tool in the uniform execution contract: arguments are parsed and
 * validated, the deadline is enforced, and whatever the tool returns or throws
 * becomes exactly one tool message carrying the invocation's id.
 */
export function guardTool(tool: Tool, options: GuardOptions = {}): GuardedTool {
  return async (invocation, env) => {
    try {
      const args = parseToolArguments(invocation.arguments);

      if (options.validate) {
        const validation = options.validate(tool.name, args);
        if (!validation.valid) {
          return toolErrorMessage(invocation, validation.error);
        }
      }

      const controller = new AbortController();
      const parent = env.signal;
      parent?.throwIfAborted();
      const forwardAbort = (): void => controller.abort(parent?.reason);
      parent?.addEventListener("abort", forwardAbort, { once: true });

      try {
        const outcome = await runWithDeadline(tool, options.timeoutMs, controller, () =>
          tool.execute({
            invocation,
            args,
            conversationId: env.conversationId,
            credential: env.credential,
            stage: env.stage,
            output: env.output,
            signal: controller.signal,
          }),
        );
        return toToolMessage(invocation, outcome);
      } finally {
        parent?.removeEventListener("abort", forwardAbort);
      }
    } catch (err) {
      return toolErrorMessage(invocation, err);
    }
  };
}

/** Stand-in for a name the registry does not know. */
export function unknownTool(availableTools: readonly string[]): GuardedTool {
  return async (invocation) =>
    toolErrorMessage(
      invocation,
      `Unknown tool '${invocation.name}'. Available tools: ${availableTools.join(", ") || "none"}`,
    );
}
