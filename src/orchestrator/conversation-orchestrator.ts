import type { LlmProvider } from "../core/contracts/provider.js";
import type {
  AssistantMessage,
  Attachment,
  LlmToolSchema,
  LlmTurnInput,
  ToolInvocation,
} from "../core/contracts/llm-protocol.js";
import { RoundLimitExceededError, scopedLogger } from "../shared/index.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { OutputChannel, ProgressReporter } from "../tools/types.js";
import { DeltaAccumulator } from "./delta-accumulator.js";
import { assembleModelMessages, type VisibleMessage } from "./message-assembly.js";
import { RoundHistory } from "./round-history.js";
import type { ConversationState } from "./state.js";
import { executeRound } from "./tool-coordinator.js";

const log = scopedLogger("orchestrator");

export const DEFAULT_MAX_ROUNDS = 10;
export const DEFAULT_TOOL_TIMEOUT_MS = 120_000;

export type OrchestratorPhase = "streaming" | "dispatching" | "done";

export interface ConversationOrchestratorOptions {
  provider: LlmProvider;
  registry: ToolRegistry;
  systemPrompt: string;
  model?: string;
  /** Tool rounds allowed before a final tool-less round forces an answer. */
  maxRounds?: number;
  toolTimeoutMs?: number;
  onPhaseChange?: (phase: OrchestratorPhase, round: number) => void;
}

export interface OrchestratorRequest {
  messages: readonly VisibleMessage[];
  conversationId: string;
  credential?: string;
  /** Aborts the provider stream and running tools; the run then rejects with its reason. */
  signal?: AbortSignal;
}

export interface OrchestratorSinks {
  output: OutputChannel;
  progress: ProgressReporter;
}

export interface OrchestratorResult {
  message: AssistantMessage;
  state: ConversationState;
  /** Model calls made, including the terminal one. */
  rounds: number;
}

interface StreamedRound {
  content: string;
  attachments: Attachment[];
  invocations: ToolInvocation[];
}

export class ConversationOrchestrator {
  private readonly provider: LlmProvider;
  private readonly registry: ToolRegistry;
  private readonly systemPrompt: string;
  private readonly model?: string;
  private readonly maxRounds: number;
  private readonly toolTimeoutMs: number;
  private readonly onPhaseChange?: (phase: OrchestratorPhase, round: number) => void;

  constructor(options: ConversationOrchestratorOptions) {
    this.provider = options.provider;
    this.registry = options.registry;
    this.systemPrompt = options.systemPrompt;
    this.model = options.model;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.onPhaseChange = options.onPhaseChange;
  }

  /**
   * Resolves one user request. Rounds run strictly one after another; each
   * round's invocations run concurrently. Provider failures and protocol
   * violations reject; tool failures become tool messages and the loop goes on.
   */
  async run(request: OrchestratorRequest, sinks: OrchestratorSinks): Promise<OrchestratorResult> {
    const history = new RoundHistory();
    const schemas = this.registry.schemas();

    for (let round = 1; ; round++) {
      request.signal?.throwIfAborted();
      const toolsOffered = round <= this.maxRounds;
      this.transition("streaming", round);

      const streamed = await this.streamRound(request, history, schemas, toolsOffered, sinks.output);

      if (streamed.invocations.length === 0) {
        this.transition("done", round);
        log.log(`Request resolved after ${round} round(s); ${history.length} hidden message(s)`);
        return {
          message: this.buildAssistantMessage(streamed),
          state: history.toState(),
          rounds: round,
        };
      }

      if (!toolsOffered) {
        throw new RoundLimitExceededError(this.maxRounds);
      }

      this.transition("dispatching", round);
      const assistant = this.buildAssistantMessage(streamed);
      const results = await executeRound(streamed.invocations, {
        registry: this.registry,
        conversationId: request.conversationId,
        credential: request.credential,
        progress: sinks.progress,
        output: sinks.output,
        toolTimeoutMs: this.toolTimeoutMs,
        ...(request.signal ? { signal: request.signal } : {}),
      });
      history.appendRound(assistant, results);

      if (round === this.maxRounds) {
        log.warn(`Round limit (${this.maxRounds}) reached; asking the model for a final answer without tools`);
      }
    }
  }

  private async streamRound(
    request: OrchestratorRequest,
    history: RoundHistory,
    tools: LlmToolSchema[],
    toolsOffered: boolean,
    output: OutputChannel,
  ): Promise<StreamedRound> {
    const messages = assembleModelMessages(this.systemPrompt, request.messages, history.messages);
    log.log(
      `Streaming with ${messages.length} message(s), ${tools.length} tool(s)${toolsOffered ? "" : " (tool choice disabled)"}`,
    );

    const accumulator = new DeltaAccumulator();
    const attachments: Attachment[] = [];
    let content = "";

    const input: LlmTurnInput = { messages };
    if (tools.length > 0) {
      input.tools = tools;
      input.toolChoice = toolsOffered ? "auto" : "none";
    }
    if (request.credential) input.credential = request.credential;
    if (this.model) input.model = this.model;
    if (request.signal) input.signal = request.signal;

    for await (const chunk of this.provider.streamTurn(input)) {
      const delta = chunk.delta;
      if (!delta) continue;

      if (delta.content) {
        output.appendContent(delta.content);
        content += delta.content;
      }
      if (delta.attachments) {
        for (const attachment of delta.attachments) {
          output.addAttachment(attachment);
          attachments.push(attachment);
        }
      }
      if (delta.toolCalls) {
        accumulator.ingestAll(delta.toolCalls);
      }
    }

    return { content, attachments, invocations: accumulator.finalize() };
  }

  private buildAssistantMessage(streamed: StreamedRound): AssistantMessage {
    return {
      role: "assistant",
      content: streamed.content,
      ...(streamed.attachments.length > 0 ? { attachments: streamed.attachments } : {}),
      ...(streamed.invocations.length > 0 ? { toolCalls: streamed.invocations } : {}),
    };
  }

  private transition(phase: OrchestratorPhase, round: number): void {
    log.log(`Round ${round}: ${phase}`);
    this.onPhaseChange?.(phase, round);
  }
}
