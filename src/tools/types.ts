import type { Attachment, ToolInvocation } from "../core/contracts/llm-protocol.js";

/** A progress panel opened for one tool invocation. */
export interface Stage {
  readonly name: string;
  appendContent(text: string): void;
  addAttachment(attachment: Attachment): void;
  close(): void;
}

export interface ProgressReporter {
  openStage(name: string): Stage;
}

/** The live, user-visible answer being streamed for the current request. */
export interface OutputChannel {
  appendContent(text: string): void;
  addAttachment(attachment: Attachment): void;
}

export interface ToolCallContext {
  invocation: ToolInvocation;
  /** Parsed `invocation.arguments`; `{}` when the model sent no argument text. */
  args: Record<string, unknown>;
  conversationId: string;
  credential?: string;
  stage: Stage;
  output: OutputChannel;
  /** Fires when the invocation's deadline passes. */
  signal: AbortSignal;
}

export interface ToolReply {
  content: string;
  attachments?: Attachment[];
}

export type ToolOutcome = string | ToolReply;

export interface Tool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  /** When false the coordinator skips the generic arguments preamble in the stage. */
  showInStage?: boolean;
  execute(context: ToolCallContext): Promise<ToolOutcome>;
}
