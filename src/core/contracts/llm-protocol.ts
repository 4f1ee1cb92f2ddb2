export interface Attachment {
  type?: string;
  title?: string;
  url?: string;
  data?: string;
  referenceUrl?: string;
  referenceType?: string;
}

/** A complete tool invocation, dispatchable only after its round's stream closed. */
export interface ToolInvocation {
  id: string;
  name: string;
  /** Accumulated JSON argument text. */
  arguments: string;
}

/**
 * One streamed piece of a tool invocation. `id` and `name` only arrive on the
 * fragment that opens the invocation at `index`.
 */
export interface ToolInvocationFragment {
  index: number;
  id?: string;
  name?: string;
  argumentsChunk?: string;
}

export interface SystemMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage {
  readonly role: "user";
  readonly content: string;
  readonly attachments?: readonly Attachment[];
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly attachments?: readonly Attachment[];
  readonly toolCalls?: readonly ToolInvocation[];
}

export interface ToolMessage {
  readonly role: "tool";
  readonly toolCallId: string;
  readonly content: string;
  readonly name?: string;
  readonly attachments?: readonly Attachment[];
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface LlmToolSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface LlmTurnInput {
  messages: readonly ChatMessage[];
  tools?: LlmToolSchema[];
  /** "none" keeps the tools visible for context but forbids new invocations. */
  toolChoice?: "auto" | "none";
  /** Per-request credential; providers fall back to their configured key. */
  credential?: string;
  model?: string;
  /** Extra request body fields for OpenAI-compatible gateways; other providers ignore them. */
  extraBody?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface LlmStreamDelta {
  content?: string;
  toolCalls?: ToolInvocationFragment[];
  attachments?: Attachment[];
}

/** One streamed chunk; end of stream is signalled by the iterator finishing. */
export interface LlmStreamChunk {
  delta?: LlmStreamDelta;
}

export interface LlmProviderCapabilities {
  nativeToolCalling: boolean;
  streaming: boolean;
}
