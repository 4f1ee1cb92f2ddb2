import { isRecord } from "../tools/arguments.js";
import { parseAttachment } from "../orchestrator/state.js";
import type { VisibleMessage } from "../orchestrator/message-assembly.js";
import type { Attachment } from "../core/contracts/llm-protocol.js";

export interface ChatRequest {
  requestId?: string;
  conversationId?: string;
  messages: VisibleMessage[];
  apiKey?: string;
}

export type ChatRequestParse =
  | { ok: true; request: ChatRequest }
  | { ok: false; error: string; requestId?: string };

const VISIBLE_ROLES = new Set(["system", "user", "assistant"]);

function isVisibleRole(value: unknown): value is VisibleMessage["role"] {
  return typeof value === "string" && VISIBLE_ROLES.has(value);
}

function parseVisibleMessage(raw: unknown, position: number): VisibleMessage | string {
  if (!isRecord(raw)) return `messages[${position}] must be an object`;
  if (!isVisibleRole(raw["role"])) {
    return `messages[${position}].role must be one of system, user, assistant`;
  }
  if (typeof raw["content"] !== "string") return `messages[${position}].content must be a string`;

  const message: VisibleMessage = { role: raw["role"], content: raw["content"] };
  if (Array.isArray(raw["attachments"])) {
    const attachments = raw["attachments"]
      .map(parseAttachment)
      .filter((entry): entry is Attachment => entry !== undefined);
    if (attachments.length > 0) message.attachments = attachments;
  }
  if (raw["state"] !== undefined && raw["state"] !== null) {
    message.state = raw["state"];
  }
  return message;
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Validates an incoming `chat` frame. */
export function parseChatRequest(data: unknown): ChatRequestParse {
  if (!isRecord(data)) return { ok: false, error: "Message must be a JSON object" };

  const requestId = optionalString(data, "requestId");
  const fail = (error: string): ChatRequestParse => ({
    ok: false,
    error,
    ...(requestId ? { requestId } : {}),
  });

  if (data["type"] !== "chat") return fail(`Unsupported message type: ${String(data["type"])}`);

  const rawMessages = data["messages"];
  if (!Array.isArray(rawMessages) || rawMessages.length === 0) {
    return fail("messages must be a non-empty array");
  }

  const messages: VisibleMessage[] = [];
  for (const [position, raw] of rawMessages.entries()) {
    const parsed = parseVisibleMessage(raw, position);
    if (typeof parsed === "string") return fail(parsed);
    messages.push(parsed);
  }

  const request: ChatRequest = { messages };
  const conversationId = optionalString(data, "conversationId");
  const apiKey = optionalString(data, "apiKey");
  if (requestId) request.requestId = requestId;
  if (conversationId) request.conversationId = conversationId;
  if (apiKey) request.apiKey = apiKey;
  return { ok: true, request };
}
