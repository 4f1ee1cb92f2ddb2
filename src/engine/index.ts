import type { LlmProvider } from "../core/contracts/provider.js";
import type { Attachment } from "../core/contracts/llm-protocol.js";
import {
  ConversationOrchestrator,
  type OrchestratorPhase,
} from "../orchestrator/conversation-orchestrator.js";
import { createToolRegistry } from "../tools/registry.js";
import type { OutputChannel, ProgressReporter, Stage, Tool } from "../tools/types.js";
import { RequestCancelledError, devLog, devWarn, devError, errorMessage } from "../shared/index.js";
import { parseChatRequest, type ChatRequest } from "./chat-request.js";
import type { EngineEvent } from "./events.js";

export type { EngineEvent, EngineEventType } from "./events.js";
export { parseChatRequest } from "./chat-request.js";
export type { ChatRequest, ChatRequestParse } from "./chat-request.js";

export interface AgentEngineOptions {
  provider: LlmProvider;
  systemPrompt: string;
  /** Called once, on the first request that needs tools. */
  loadTools: () => Promise<Tool[]>;
  onReply: (clientId: string, event: EngineEvent) => void;
  model?: string;
  maxRounds?: number;
  toolTimeoutMs?: number;
  onPhaseChange?: (phase: OrchestratorPhase, round: number) => void;
}

export class AgentEngine {
  private readonly provider: LlmProvider;
  private readonly options: AgentEngineOptions;
  private orchestrator: Promise<ConversationOrchestrator> | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly clientRequests = new Map<string, Set<AbortController>>();

  constructor(options: AgentEngineOptions) {
    this.provider = options.provider;
    this.options = options;
  }

  async start(): Promise<void> {
    await this.provider.start();
    devLog(`Provider "${this.provider.name}" started`);
    devLog("AgentEngine started");
  }

  async stop(): Promise<void> {
    await this.provider.stop();
    devLog(`Provider "${this.provider.name}" stopped`);
    devLog("AgentEngine stopped");
  }

  /** Resolves once every request accepted so far has finished. */
  async idle(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  /** Aborts every request the client still has running. */
  cancelClient(clientId: string): void {
    const controllers = this.clientRequests.get(clientId);
    if (!controllers) return;
    this.clientRequests.delete(clientId);
    devLog(`Cancelling ${controllers.size} request(s) of ${clientId}`);
    for (const controller of controllers) {
      controller.abort(new RequestCancelledError(`Client ${clientId} disconnected.`));
    }
  }

  handleMessage(clientId: string, data: unknown): void {
    const parsed = parseChatRequest(data);
    if (!parsed.ok) {
      devWarn(`Rejected message from ${clientId}: ${parsed.error}`);
      this.emit(clientId, {
        type: "error",
        message: parsed.error,
        ...(parsed.requestId ? { requestId: parsed.requestId } : {}),
      });
      return;
    }

    devLog(`Chat request from ${clientId} with ${parsed.request.messages.length} message(s)`);
    const task = this.processChat(clientId, parsed.request);
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }

  /**
   * Builds the tool set and orchestrator once. Concurrent callers share the
   * same attempt; a failed attempt is dropped so the next request retries.
   */
  ensureTools(): Promise<ConversationOrchestrator> {
    if (!this.orchestrator) {
      const attempt = this.options.loadTools().then((tools) => {
        const registry = createToolRegistry(tools);
        devLog(`Tools ready: ${registry.list().join(", ") || "none"}`);
        return new ConversationOrchestrator({
          provider: this.provider,
          registry,
          systemPrompt: this.options.systemPrompt,
          ...(this.options.model ? { model: this.options.model } : {}),
          ...(this.options.maxRounds ? { maxRounds: this.options.maxRounds } : {}),
          ...(this.options.toolTimeoutMs ? { toolTimeoutMs: this.options.toolTimeoutMs } : {}),
          ...(this.options.onPhaseChange ? { onPhaseChange: this.options.onPhaseChange } : {}),
        });
      });
      this.orchestrator = attempt;
      void attempt.catch((err: unknown) => {
        devError("Tool initialization failed:", errorMessage(err));
        if (this.orchestrator === attempt) this.orchestrator = null;
      });
    }
    return this.orchestrator;
  }

  private async processChat(clientId: string, request: ChatRequest): Promise<void> {
    const scope = request.requestId ? { requestId: request.requestId } : {};
    const emit = (event: EngineEvent): void => this.emit(clientId, { ...event, ...scope });
    const controller = this.track(clientId);

    try {
      const orchestrator = await this.ensureTools();
      const result = await orchestrator.run(
        {
          messages: request.messages,
          conversationId: request.conversationId ?? clientId,
          ...(request.apiKey ? { credential: request.apiKey } : {}),
          signal: controller.signal,
        },
        {
          output: this.outputChannel(emit),
          progress: this.progressReporter(emit),
        },
      );
      emit({ type: "reply", message: result.message, state: result.state });
    } catch (err) {
      if (controller.signal.aborted) {
        devLog(`Request from ${clientId} cancelled: ${errorMessage(err)}`);
        return;
      }
      devError("Request failed:", errorMessage(err));
      emit({ type: "error", message: errorMessage(err) });
    } finally {
      this.untrack(clientId, controller);
    }
  }

  private track(clientId: string): AbortController {
    const controller = new AbortController();
    let controllers = this.clientRequests.get(clientId);
    if (!controllers) {
      controllers = new Set();
      this.clientRequests.set(clientId, controllers);
    }
    controllers.add(controller);
    return controller;
  }

  private untrack(clientId: string, controller: AbortController): void {
    const controllers = this.clientRequests.get(clientId);
    if (!controllers) return;
    controllers.delete(controller);
    if (controllers.size === 0) this.clientRequests.delete(clientId);
  }

  private outputChannel(emit: (event: EngineEvent) => void): OutputChannel {
    return {
      appendContent: (content: string) => emit({ type: "delta", content }),
      addAttachment: (attachment: Attachment) => emit({ type: "attachment", attachment }),
    };
  }

  private progressReporter(emit: (event: EngineEvent) => void): ProgressReporter {
    let opened = 0;
    return {
      openStage: (name: string): Stage => {
        opened++;
        const stageId = String(opened);
        let closed = false;
        emit({ type: "stage_open", stageId, name });
        return {
          name,
          appendContent: (content: string) => {
            if (!closed) emit({ type: "stage_content", stageId, content });
          },
          addAttachment: (attachment: Attachment) => {
            if (!closed) emit({ type: "stage_attachment", stageId, attachment });
          },
          close: () => {
            if (closed) return;
            closed = true;
            emit({ type: "stage_close", stageId });
          },
        };
      },
    };
  }

  private emit(clientId: string, event: EngineEvent): void {
    try {
      this.options.onReply(clientId, event);
    } catch (err) {
      devWarn(`Failed to deliver ${event.type} to ${clientId}: ${errorMessage(err)}`);
    }
  }
}
