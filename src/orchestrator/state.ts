import type {
  Attachment,
  ChatMessage,
  ToolInvocation,
} from "../core/contracts/llm-protocol.js";
import { isRecord } from "../tools/arguments.js";

export const TOOL_ROUND_HISTORY_KEY = "tool_round_history";

/** Round state carried by the client between requests. */
export interface ConversationState {
  [TOOL_ROUND_HISTORY_KEY]: ChatMessage[];
}

const ATTACHMENT_KEYS = ["type", "title", "url", "data", "referenceUrl", "referenceType"] as const;

function compactAttachment(attachment: Attachment): Attachment {
  const out: Attachment = {};
  for (const key of ATTACHMENT_KEYS) {
    const value = attachment[key];
    if (value !== undefined && value !== null) out[key] = value;
  }
  return out;
}

function compactAttachments(
  attachments: readonly Attachment[] | undefined,
): { attachments?: Attachment[] } {
  if (!attachments || attachments.length === 0) return {};
  return { attachments: attachments.map(compactAttachment) };
}

/** Copies a message into its persisted form, dropping absent fields. */
export function serializeMessage(message: ChatMessage): ChatMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content, ...compactAttachments(message.attachments) };
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...compactAttachments(message.attachments),
        ...(message.toolCalls && message.toolCalls.length > 0
          ? { toolCalls: message.toolCalls.map((call) => ({ id: call.id, name: call.name, arguments: call.arguments })) }
          : {}),
      };
    case "tool":
      return {
        role: "tool",
        toolCallId: message.toolCallId,
        content: message.content,
        ...(message.name !== undefined ? { name: message.name } : {}),
        ...compactAttachments(message.attachments),
      };
  }
}

export function serializeState(history: readonly ChatMessage[]): ConversationState {
  return { [TOOL_ROUND_HISTORY_KEY]: history.map(serializeMessage) };
}

export function parseAttachment(raw: unknown): Attachment | undefined {
  if (!isRecord(raw)) return undefined;
  const out: Attachment = {};
  for (const key of ATTACHMENT_KEYS) {
    const value = raw[key];
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

function parseAttachments(raw: unknown): { attachments?: Attachment[] } {
  if (!Array.isArray(raw)) return {};
  const parsed = raw
    .map(parseAttachment)
    .filter((entry): entry is Attachment => entry !== undefined);
  return parsed.length > 0 ? { attachments: parsed } : {};
}

function parseInvocation(raw: unknown): ToolInvocation | undefined {
  if (!isRecord(raw)) return undefined;
  const { id, name, arguments: args } = raw;
  if (typeof id !== "string" || typeof name !== "string" || typeof args !== "string") {
    return undefined;
  }
  return { id, name, arguments: args };
}

/** Narrows one persisted message; returns undefined when it is malformed. */
export function parseChatMessage(raw: unknown): ChatMessage | undefined {
  if (!isRecord(raw)) return undefined;
  const content = typeof raw["content"] === "string" ? raw["content"] : undefined;

  switch (raw["role"]) {
    case "system":
      return content === undefined ? undefined : { role: "system", content };
    case "user":
      return content === undefined
        ? undefined
        : { role: "user", content, ...parseAttachments(raw["attachments"]) };
    case "assistant": {
      const rawCalls = raw["toolCalls"];
      let toolCalls: ToolInvocation[] | undefined;
      if (rawCalls !== undefined) {
        if (!Array.isArray(rawCalls)) return undefined;
        toolCalls = [];
        for (const rawCall of rawCalls) {
          const call = parseInvocation(rawCall);
          if (!call) return undefined;
          toolCalls.push(call);
        }
      }
      return {
        role: "assistant",
        content: content ?? "",
        ...parseAttachments(raw["attachments"]),
        ...(toolCalls && toolCalls.length > 0 ? { toolCalls } : {}),
      };
    }
    case "tool": {
      const toolCallId = raw["toolCallId"];
      if (typeof toolCallId !== "string" || content === undefined) return undefined;
      const name = raw["name"];
      return {
        role: "tool",
        toolCallId,
        content,
        ...(typeof name === "string" ? { name } : {}),
        ...parseAttachments(raw["attachments"]),
      };
    }
    default:
      return undefined;
  }
}

/**
 * Validates client-supplied round state. Any malformed entry invalidates the
 * whole state, since a partial history could orphan a tool call id.
 */
export function parseConversationState(raw: unknown): ConversationState | undefined {
  if (!isRecord(raw)) return undefined;
  const history = raw[TOOL_ROUND_HISTORY_KEY];
  if (!Array.isArray(history)) return undefined;

  const messages: ChatMessage[] = [];
  for (const entry of history) {
    const message = parseChatMessage(entry);
    if (!message) return undefined;
    messages.push(message);
  }
  return { [TOOL_ROUND_HISTORY_KEY]: messages };
}
