import type { Attachment } from "../../core/contracts/llm-protocol.js";
import { ConfigError, ToolExecutionError } from "../../shared/index.js";
import { isRecord, requireString } from "../arguments.js";
import type { FileStore } from "../files/file-store.js";
import type { McpClient } from "../mcp/mcp-client.js";
import type { Tool, ToolCallContext } from "../types.js";

export const CODE_INTERPRETER_TOOL_NAME = "execute_code";
export const OUTPUT_ENTRY_LIMIT = 200;
export const FILES_DELIVERED_INSTRUCTIONS =
  "Generated files have been provided to user, DON'T include links to them in response!";

export interface ProducedFile {
  name: string;
  mimeType: string;
  uri: string;
}

export interface ExecutionResult {
  /** Every field the interpreter sent, passed back to the model. */
  raw: Record<string, unknown>;
  output: string[];
  files: ProducedFile[];
}

function parseProducedFile(value: unknown): ProducedFile | null {
  if (!isRecord(value)) return null;
  const { name, mime_type: mimeType, uri } = value;
  if (typeof name !== "string" || typeof mimeType !== "string" || typeof uri !== "string") {
    return null;
  }
  return { name, mimeType, uri };
}

function listField(record: Record<string, unknown>, key: string): unknown[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ToolExecutionError(`Unexpected code interpreter response: '${key}' must be a list.`);
  }
  return value;
}

export function parseExecutionResult(text: string): ExecutionResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ToolExecutionError(`Unexpected code interpreter response: ${text.slice(0, 200)}`, err);
  }
  if (!isRecord(parsed)) {
    throw new ToolExecutionError("Unexpected code interpreter response: expected a JSON object.");
  }

  const output = listField(parsed, "output");
  const producedFiles: ProducedFile[] = [];
  for (const entry of listField(parsed, "files")) {
    const file = parseProducedFile(entry);
    if (!file) {
      throw new ToolExecutionError("Unexpected code interpreter response: malformed file entry.");
    }
    producedFiles.push(file);
  }

  return {
    raw: parsed,
    output: output.map((entry) => (typeof entry === "string" ? entry : JSON.stringify(entry))),
    files: producedFiles,
  };
}

function isTextMime(mimeType: string): boolean {
  return mimeType.startsWith("text/") || mimeType === "application/json" || mimeType === "application/xml";
}

export interface CodeInterpreterToolOptions {
  client: McpClient;
  /** Name of the remote tool that runs code. */
  toolName?: string;
  /** Without a store, produced files are attached inline. */
  fileStore?: FileStore;
}

async function deliverFile(
  file: ProducedFile,
  options: CodeInterpreterToolOptions,
  context: ToolCallContext,
): Promise<Attachment> {
  const resource = await options.client.readResource(file.uri, context.signal);
  if (!options.fileStore) {
    return { type: file.mimeType, title: file.name, data: resource };
  }

  const data = isTextMime(file.mimeType) ? Buffer.from(resource, "utf8") : Buffer.from(resource, "base64");
  const url = await options.fileStore.upload({
    name: file.name,
    mimeType: file.mimeType,
    data,
    ...(context.credential ? { credential: context.credential } : {}),
    signal: context.signal,
  });
  return { url, type: file.mimeType, title: file.name };
}

/**
 * Wraps the interpreter server's code execution tool. Files the code produces
 * are fetched as MCP resources and handed to the user directly.
 */
export async function createCodeInterpreterTool(options: CodeInterpreterToolOptions): Promise<Tool> {
  const toolName = options.toolName ?? CODE_INTERPRETER_TOOL_NAME;
  const descriptor = (await options.client.listTools()).find((tool) => tool.name === toolName);
  if (!descriptor) {
    throw new ConfigError(`MCP server ${options.client.url} doesn't have the '${toolName}' tool`);
  }

  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: descriptor.parameters,
    showInStage: false,

    async execute(context) {
      const { args, stage, signal } = context;
      const code = requireString(args, "code");
      const sessionId = args["session_id"];

      stage.appendContent("## Request arguments: \n");
      stage.appendContent(`\`\`\`python\n${code}\n\`\`\`\n`);
      if (sessionId) {
        stage.appendContent(`**session_id**: ${String(sessionId)}\n\r`);
      } else {
        stage.appendContent("New session will be created\n");
      }
      stage.appendContent("## Response: \n");

      const content = await options.client.callTool(descriptor.name, args, signal);
      if (content === null) {
        throw new ToolExecutionError("Code interpreter returned no content.");
      }
      const result = parseExecutionResult(content);
      const reply: Record<string, unknown> = { ...result.raw };

      if (result.files.length > 0) {
        for (const file of result.files) {
          signal.throwIfAborted();
          const attachment = await deliverFile(file, options, context);
          // The stage may already be closed once the deadline passed.
          signal.throwIfAborted();
          stage.addAttachment(attachment);
          context.output.addAttachment(attachment);
        }
        reply["instructions"] = FILES_DELIVERED_INSTRUCTIONS;
      }

      if (result.output.length > 0) {
        reply["output"] = result.output.map((entry) => entry.slice(0, OUTPUT_ENTRY_LIMIT));
      }

      stage.appendContent(`\`\`\`json\n\r${JSON.stringify(reply, null, 2)}\n\r\`\`\`\n\r`);
      return JSON.stringify(reply);
    },
  };
}
