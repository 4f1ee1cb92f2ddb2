import Anthropic from "@anthropic-ai/sdk";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  ChatMessage,
  LlmStreamChunk,
  LlmToolSchema,
  LlmTurnInput,
} from "../../core/contracts/llm-protocol.js";
import { userMessageText } from "../../core/runtime/user-content.js";
import { devWarn } from "../../shared/index.js";

type ContentBlocks = Exclude<Anthropic.MessageParam["content"], string>;

let client: Anthropic | null = null;

interface AnthropicMessageBuild {
  system?: string;
  messages: Anthropic.MessageParam[];
}

function parseToolInput(raw: string, toolName: string): unknown {
  if (raw.trim().length === 0) return {};
  try {
    return JSON.parse(raw);
  } catch {
    devWarn(`Replaying malformed arguments of '${toolName}' as an empty object`);
    return {};
  }
}

function toAnthropicPayload(messages: readonly ChatMessage[]): AnthropicMessageBuild {
  const out: AnthropicMessageBuild = {
    messages: [],
  };
  // Anthropic wants every result of one round inside a single user turn.
  let pendingResults: ContentBlocks | null = null;

  for (const msg of messages) {
    if (msg.role !== "tool") {
      pendingResults = null;
    }

    switch (msg.role) {
      case "system":
        out.system = out.system ? `${out.system}\n\n${msg.content}` : msg.content;
        break;
      case "user":
        out.messages.push({ role: "user", content: userMessageText(msg) });
        break;
      case "assistant": {
        if (!msg.toolCalls || msg.toolCalls.length === 0) {
          out.messages.push({ role: "assistant", content: msg.content });
          break;
        }
        const blocks: ContentBlocks = [];
        if (msg.content.trim().length > 0) {
          blocks.push({ type: "text", text: msg.content });
        }
        for (const call of msg.toolCalls) {
          blocks.push({
            type: "tool_use",
            id: call.id,
            name: call.name,
            input: parseToolInput(call.arguments, call.name),
          });
        }
        out.messages.push({ role: "assistant", content: blocks });
        break;
      }
      case "tool": {
        const block = {
          type: "tool_result" as const,
          tool_use_id: msg.toolCallId,
          content: msg.content,
        };
        if (pendingResults) {
          pendingResults.push(block);
        } else {
          pendingResults = [block];
          out.messages.push({ role: "user", content: pendingResults });
        }
        break;
      }
    }
  }

  return out;
}

function toAnthropicTool(tool: LlmToolSchema): Anthropic.Tool {
  const inputSchema: Anthropic.Tool["input_schema"] = { type: "object" };
  const properties = tool.parameters["properties"];
  if (properties !== undefined) inputSchema["properties"] = properties;
  const required = tool.parameters["required"];
  if (Array.isArray(required)) {
    inputSchema["required"] = required.filter((key): key is string => typeof key === "string");
  }
  return { name: tool.name, description: tool.description, input_schema: inputSchema };
}

function readMaxTokens(): number {
  const parsed = Number.parseInt(process.env["ANTHROPIC_MAX_TOKENS"] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 4096;
}

function clientFor(credential: string | undefined): Anthropic {
  if (!client) {
    throw new Error("Anthropic provider not started.");
  }
  return credential ? new Anthropic({ apiKey: credential }) : client;
}

const provider: LlmProvider = {
  name: "anthropic",
  version: "2.0.0",
  capabilities: {
    nativeToolCalling: true,
    streaming: true,
  },

  start() {
    const apiKey = process.env["ANTHROPIC_API_KEY"];
    if (!apiKey) {
      throw new Error("Missing ANTHROPIC_API_KEY environment variable.");
    }
    client = new Anthropic({ apiKey });
  },

  stop() {
    client = null;
  },

  async *streamTurn(input: LlmTurnInput): AsyncGenerator<LlmStreamChunk> {
    const anthropic = clientFor(input.credential);
    const model = input.model ?? process.env["ANTHROPIC_MODEL"] ?? "claude-sonnet-4-5-20250929";
    const payload = toAnthropicPayload(input.messages);

    const params: Anthropic.MessageCreateParamsStreaming = {
      model,
      max_tokens: readMaxTokens(),
      messages: payload.messages,
      stream: true,
    };
    if (payload.system) params.system = payload.system;
    if (input.tools && input.tools.length > 0) {
      params.tools = input.tools.map(toAnthropicTool);
      params.tool_choice = input.toolChoice === "none" ? { type: "none" } : { type: "auto" };
    }

    const stream = await anthropic.messages.create(
      params,
      input.signal ? { signal: input.signal } : undefined,
    );
    for await (const event of stream) {
      if (event.type === "content_block_start") {
        const block = event.content_block;
        if (block.type === "tool_use") {
          yield { delta: { toolCalls: [{ index: event.index, id: block.id, name: block.name }] } };
        } else if (block.type === "text" && block.text.length > 0) {
          yield { delta: { content: block.text } };
        }
        continue;
      }

      if (event.type === "content_block_delta") {
        const delta = event.delta;
        if (delta.type === "text_delta") {
          yield { delta: { content: delta.text } };
        } else if (delta.type === "input_json_delta" && delta.partial_json.length > 0) {
          yield { delta: { toolCalls: [{ index: event.index, argumentsChunk: delta.partial_json }] } };
        }
      }
    }
  },
};

export default provider;
