import OpenAI from "openai";
import type { LlmProvider } from "../../core/contracts/provider.js";
import type {
  Attachment,
  ChatMessage,
  LlmStreamChunk,
  LlmStreamDelta,
  LlmToolSchema,
  LlmTurnInput,
  ToolInvocationFragment,
} from "../../core/contracts/llm-protocol.js";
import { userMessageText } from "../../core/runtime/user-content.js";
import { isRecord } from "../../tools/arguments.js";

type ChatParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChunkDelta = OpenAI.Chat.Completions.ChatCompletionChunk.Choice.Delta;

let client: OpenAI | null = null;
let started = false;
const requestClients = new Map<string, OpenAI>();
const MAX_REQUEST_CLIENTS = 32;

interface ToolNameMaps {
  canonicalToOpenAi: Map<string, string>;
  openAiToCanonical: Map<string, string>;
}

const OPENAI_TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function encodeToolName(name: string): string {
  return `tool_${Buffer.from(name, "utf8").toString("base64url")}`;
}

function toOpenAiToolName(name: string, maps: ToolNameMaps): string {
  const mapped = maps.canonicalToOpenAi.get(name);
  if (mapped) return mapped;
  if (OPENAI_TOOL_NAME_PATTERN.test(name)) return name;
  return encodeToolName(name);
}

function toCanonicalToolName(name: string, maps: ToolNameMaps): string {
  return maps.openAiToCanonical.get(name) ?? name;
}

function buildToolNameMaps(tools?: LlmToolSchema[]): ToolNameMaps {
  const canonicalToOpenAi = new Map<string, string>();
  const openAiToCanonical = new Map<string, string>();

  for (const tool of tools ?? []) {
    let openAiName = OPENAI_TOOL_NAME_PATTERN.test(tool.name)
      ? tool.name
      : encodeToolName(tool.name);
    let suffix = 1;
    while (openAiToCanonical.has(openAiName)) {
      openAiName = `${openAiName}_${suffix}`;
      suffix++;
    }
    canonicalToOpenAi.set(tool.name, openAiName);
    openAiToCanonical.set(openAiName, tool.name);
  }

  return { canonicalToOpenAi, openAiToCanonical };
}

function toOpenAiMessages(messages: readonly ChatMessage[], maps: ToolNameMaps): ChatParam[] {
  const out: ChatParam[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case "system":
        out.push({ role: "system", content: msg.content });
        break;
      case "user":
        out.push({ role: "user", content: userMessageText(msg) });
        break;
      case "assistant":
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          out.push({
            role: "assistant",
            content: msg.content.length > 0 ? msg.content : null,
            tool_calls: msg.toolCalls.map((call) => ({
              id: call.id,
              type: "function",
              function: {
                name: toOpenAiToolName(call.name, maps),
                arguments: call.arguments,
              },
            })),
          });
        } else {
          out.push({ role: "assistant", content: msg.content });
        }
        break;
      case "tool":
        out.push({ role: "tool", tool_call_id: msg.toolCallId, content: msg.content });
        break;
    }
  }

  return out;
}

function toOpenAiTools(
  tools: LlmToolSchema[] | undefined,
  maps: ToolNameMaps,
): OpenAI.Chat.Completions.ChatCompletionTool[] | undefined {
  if (!tools || tools.length === 0) return undefined;

  return tools.map((tool) => ({
    type: "function",
    function: {
      name: toOpenAiToolName(tool.name, maps),
      description: tool.description,
      parameters: tool.parameters,
    },
  }));
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

// OpenAI-compatible gateways may stream generated files as custom_content.attachments.
function readGatewayAttachments(delta: ChunkDelta): Attachment[] | undefined {
  if (!("custom_content" in delta)) return undefined;
  const custom = delta.custom_content;
  if (!isRecord(custom) || !Array.isArray(custom["attachments"])) return undefined;

  const attachments: Attachment[] = [];
  for (const raw of custom["attachments"]) {
    if (!isRecord(raw)) continue;
    const attachment: Attachment = {};
    const type = readString(raw, "type");
    const title = readString(raw, "title");
    const url = readString(raw, "url");
    const data = readString(raw, "data");
    const referenceUrl = readString(raw, "reference_url");
    const referenceType = readString(raw, "reference_type");
    if (type) attachment.type = type;
    if (title) attachment.title = title;
    if (url) attachment.url = url;
    if (data) attachment.data = data;
    if (referenceUrl) attachment.referenceUrl = referenceUrl;
    if (referenceType) attachment.referenceType = referenceType;
    attachments.push(attachment);
  }
  return attachments.length > 0 ? attachments : undefined;
}

function toStreamDelta(delta: ChunkDelta, maps: ToolNameMaps): LlmStreamDelta {
  const out: LlmStreamDelta = {};
  if (delta.content) out.content = delta.content;

  if (delta.tool_calls && delta.tool_calls.length > 0) {
    out.toolCalls = delta.tool_calls.map((call) => {
      const fragment: ToolInvocationFragment = { index: call.index };
      if (call.id) {
        fragment.id = call.id;
        fragment.name = toCanonicalToolName(call.function?.name ?? "", maps);
      }
      if (call.function?.arguments) fragment.argumentsChunk = call.function.arguments;
      return fragment;
    });
  }

  const attachments = readGatewayAttachments(delta);
  if (attachments) out.attachments = attachments;
  return out;
}

function clientFor(credential: string | undefined): OpenAI {
  if (!started) {
    throw new Error("OpenAI provider not started.");
  }
  if (!credential) {
    if (!client) {
      throw new Error("Missing OpenAI API key: set OPENAI_API_KEY or supply a request credential.");
    }
    return client;
  }

  const cached = requestClients.get(credential);
  if (cached) return cached;

  if (requestClients.size >= MAX_REQUEST_CLIENTS) {
    const oldest = requestClients.keys().next().value;
    if (oldest !== undefined) requestClients.delete(oldest);
  }
  const baseURL = process.env["OPENAI_BASE_URL"];
  const created = new OpenAI({ apiKey: credential, ...(baseURL ? { baseURL } : {}) });
  requestClients.set(credential, created);
  return created;
}

const provider: LlmProvider = {
  name: "openai",
  version: "2.0.0",
  capabilities: {
    nativeToolCalling: true,
    streaming: true,
  },

  start() {
    const apiKey = process.env["OPENAI_API_KEY"];
    const baseURL = process.env["OPENAI_BASE_URL"];
    if (!apiKey && !baseURL) {
      throw new Error("Missing OPENAI_API_KEY environment variable.");
    }
    client = apiKey ? new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) }) : null;
    started = true;
  },

  stop() {
    client = null;
    started = false;
    requestClients.clear();
  },

  async *streamTurn(input: LlmTurnInput): AsyncGenerator<LlmStreamChunk> {
    const openai = clientFor(input.credential);
    const model = input.model ?? process.env["OPENAI_MODEL"] ?? "gpt-4o";
    const nameMaps = buildToolNameMaps(input.tools);
    const tools = toOpenAiTools(input.tools, nameMaps);

    const params: OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming &
      Record<string, unknown> = {
      ...input.extraBody,
      model,
      messages: toOpenAiMessages(input.messages, nameMaps),
      stream: true,
      ...(tools ? { tools, tool_choice: input.toolChoice ?? "auto" } : {}),
    };

    const stream = await openai.chat.completions.create(
      params,
      input.signal ? { signal: input.signal } : undefined,
    );
    for await (const chunk of stream) {
      const delta = chunk.choices[0]?.delta;
      if (!delta) continue;
      yield { delta: toStreamDelta(delta, nameMaps) };
    }
  },
};

export default provider;
