import { vi } from "vitest";
import type { LlmProvider } from "../../src/core/contracts/provider.js";
import type {
  Attachment,
  LlmStreamChunk,
  LlmTurnInput,
  ToolInvocation,
} from "../../src/core/contracts/llm-protocol.js";
import type {
  OutputChannel,
  ProgressReporter,
  Stage,
  Tool,
  ToolCallContext,
} from "../../src/tools/types.js";
import type { McpClient, McpToolDescriptor } from "../../src/tools/mcp/mcp-client.js";

export type Turn = LlmStreamChunk[] | ((input: LlmTurnInput) => LlmStreamChunk[]);

export interface ScriptedProvider extends LlmProvider {
  readonly calls: LlmTurnInput[];
}

/** Replays one scripted turn per streamTurn call; the last turn repeats. */
export function scriptedProvider(turns: Turn[]): ScriptedProvider {
  const calls: LlmTurnInput[] = [];
  return {
    name: "scripted",
    version: "1.0.0",
    capabilities: { nativeToolCalling: true, streaming: true },
    start: vi.fn(),
    stop: vi.fn(),
    calls,
    async *streamTurn(input: LlmTurnInput) {
      calls.push({ ...input, messages: [...input.messages] });
      const turn = turns[Math.min(calls.length - 1, turns.length - 1)];
      const chunks = typeof turn === "function" ? turn(input) : (turn ?? []);
      for (const chunk of chunks) {
        yield chunk;
      }
    },
  };
}

export function textChunks(...parts: string[]): LlmStreamChunk[] {
  return parts.map((content) => ({ delta: { content } }));
}

/** Streams one opening fragment per call, then the arguments in two halves. */
export function toolCallChunks(...calls: Array<{ id: string; name: string; args: string }>): LlmStreamChunk[] {
  const chunks: LlmStreamChunk[] = calls.map((call, index) => ({
    delta: { toolCalls: [{ index, id: call.id, name: call.name }] },
  }));
  calls.forEach((call, index) => {
    const half = Math.floor(call.args.length / 2);
    chunks.push({ delta: { toolCalls: [{ index, argumentsChunk: call.args.slice(0, half) }] } });
    chunks.push({ delta: { toolCalls: [{ index, argumentsChunk: call.args.slice(half) }] } });
  });
  return chunks;
}

export interface RecordedStage extends Stage {
  content: string;
  attachments: Attachment[];
  closed: boolean;
}

export interface RecordingProgress extends ProgressReporter {
  stages: RecordedStage[];
}

export function recordingStage(name: string): RecordedStage {
  const stage: RecordedStage = {
    name,
    content: "",
    attachments: [],
    closed: false,
    appendContent(text) {
      stage.content += text;
    },
    addAttachment(attachment) {
      stage.attachments.push(attachment);
    },
    close() {
      stage.closed = true;
    },
  };
  return stage;
}

export function recordingProgress(): RecordingProgress {
  const stages: RecordedStage[] = [];
  return {
    stages,
    openStage(name) {
      const stage = recordingStage(name);
      stages.push(stage);
      return stage;
    },
  };
}

export interface RecordingOutput extends OutputChannel {
  content: string;
  attachments: Attachment[];
}

export function recordingOutput(): RecordingOutput {
  const output: RecordingOutput = {
    content: "",
    attachments: [],
    appendContent(text) {
      output.content += text;
    },
    addAttachment(attachment) {
      output.attachments.push(attachment);
    },
  };
  return output;
}

export function echoTool(name: string, delayMs = 0): Tool {
  return {
    name,
    description: `Echoes its input (${name})`,
    parameters: { type: "object", properties: { text: { type: "string" } }, required: ["text"] },
    async execute({ args }) {
      if (delayMs > 0) await new Promise((resolve) => setTimeout(resolve, delayMs));
      return `${name}:${String(args["text"])}`;
    },
  };
}

export interface ToolContextFixture {
  context: ToolCallContext;
  stage: RecordedStage;
  output: RecordingOutput;
}

export function toolContext(
  args: Record<string, unknown>,
  overrides: Partial<Omit<ToolCallContext, "args" | "stage" | "output">> = {},
): ToolContextFixture {
  const stage = recordingStage("test");
  const output = recordingOutput();
  const invocation: ToolInvocation = overrides.invocation ?? {
    id: "call_1",
    name: "test",
    arguments: JSON.stringify(args),
  };
  return {
    stage,
    output,
    context: {
      invocation,
      args,
      conversationId: overrides.conversationId ?? "conv-1",
      ...(overrides.credential ? { credential: overrides.credential } : {}),
      stage,
      output,
      signal: overrides.signal ?? new AbortController().signal,
    },
  };
}

export interface FakeMcpClient extends McpClient {
  callTool: ReturnType<typeof vi.fn>;
  readResource: ReturnType<typeof vi.fn>;
  close: ReturnType<typeof vi.fn>;
}

export function fakeMcpClient(url: string, descriptors: McpToolDescriptor[]): FakeMcpClient {
  return {
    url,
    connect: vi.fn().mockResolvedValue(undefined),
    listTools: vi.fn().mockResolvedValue(descriptors),
    callTool: vi.fn().mockResolvedValue(null),
    readResource: vi.fn().mockResolvedValue(""),
    close: vi.fn().mockResolvedValue(undefined),
  };
}
