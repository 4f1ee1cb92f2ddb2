import type {
  AssistantMessage,
  ChatMessage,
  ToolMessage,
} from "../core/contracts/llm-protocol.js";
import { AgentError } from "../shared/index.js";
import { serializeState, type ConversationState } from "./state.js";

/**
 * Append-only log of the hidden rounds produced while resolving one user
 * request. Owned by a single orchestrator run; never shared across requests.
 */
export class RoundHistory {
  private readonly entries: ChatMessage[] = [];
  private completedRounds = 0;

  /**
   * Appends one complete round. Results must answer the assistant's
   * invocations one-to-one and in the same order.
   */
  appendRound(assistant: AssistantMessage, results: readonly ToolMessage[]): void {
    const calls = assistant.toolCalls ?? [];
    if (calls.length === 0) {
      throw new AgentError("A round needs at least one tool invocation.", "ROUND_INVARIANT");
    }
    if (calls.length !== results.length) {
      throw new AgentError(
        `Round has ${calls.length} invocation(s) but ${results.length} result(s).`,
        "ROUND_INVARIANT",
      );
    }
    calls.forEach((call, i) => {
      const result = results[i];
      if (!result || result.toolCallId !== call.id) {
        throw new AgentError(
          `Result ${i} does not answer invocation '${call.id}'.`,
          "ROUND_INVARIANT",
        );
      }
    });

    this.entries.push(assistant, ...results);
    this.completedRounds++;
  }

  get messages(): readonly ChatMessage[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  get rounds(): number {
    return this.completedRounds;
  }

  toState(): ConversationState {
    return serializeState(this.entries);
  }
}
