import type { Attachment, ChatMessage } from "../core/contracts/llm-protocol.js";
import { devWarn } from "../shared/index.js";
import { TOOL_ROUND_HISTORY_KEY, parseConversationState } from "./state.js";

/** A message of the public conversation, as the client resupplies it. */
export interface VisibleMessage {
  role: "system" | "user" | "assistant";
  content: string;
  attachments?: Attachment[];
  /** Round state persisted on an earlier assistant answer. */
  state?: unknown;
}

function toChatMessage(message: VisibleMessage): ChatMessage {
  const attachments =
    message.attachments && message.attachments.length > 0
      ? { attachments: message.attachments }
      : {};
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content, ...attachments };
    case "assistant":
      return { role: "assistant", content: message.content, ...attachments };
  }
}

/**
 * Rebuilds what the model sees for one round:
 *
 *   system prompt
 *   visible conversation, where each earlier answer is preceded by the hidden
 *     tool rounds persisted in its state
 *   this request's own rounds so far
 *
 * Pure: the same inputs always yield a deeply equal sequence.
 */
export function assembleModelMessages(
  systemPrompt: string,
  visible: readonly VisibleMessage[],
  currentRounds: readonly ChatMessage[],
): ChatMessage[] {
  const out: ChatMessage[] = [{ role: "system", content: systemPrompt }];

  visible.forEach((message, position) => {
    if (message.role === "assistant" && message.state !== undefined) {
      const state = parseConversationState(message.state);
      if (state) {
        out.push(...state[TOOL_ROUND_HISTORY_KEY]);
      } else {
        devWarn(`Ignoring malformed round state on visible message #${position}`);
      }
    }
    out.push(toChatMessage(message));
  });

  out.push(...currentRounds);
  return out;
}
