import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import { ToolExecutionError, devLog, devWarn, errorMessage } from "../../shared/index.js";
import { isRecord } from "../arguments.js";

export interface McpToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/** The slice of an MCP session the tools rely on. */
export interface McpClient {
  readonly url: string;
  connect(): Promise<void>;
  listTools(): Promise<McpToolDescriptor[]>;
  /** Text of the first content block, the JSON of a non-text block, or null when empty. */
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<string | null>;
  /** Text resources come back as-is, binary ones base64-encoded. */
  readResource(uri: string, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

const CLIENT_INFO = { name: "conductor-agent", version: "0.1.0" };

function firstBlockText(content: unknown): string | null {
  if (!Array.isArray(content) || content.length === 0) return null;
  const first: unknown = content[0];
  if (isRecord(first) && first["type"] === "text" && typeof first["text"] === "string") {
    return first["text"];
  }
  return JSON.stringify(first);
}

export class StreamableHttpMcpClient implements McpClient {
  private client: Client | null = null;

  constructor(readonly url: string) {}

  static async create(url: string): Promise<StreamableHttpMcpClient> {
    const mcp = new StreamableHttpMcpClient(url);
    await mcp.connect();
    return mcp;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(new StreamableHTTPClientTransport(new URL(this.url)));
    this.client = client;
    devLog(`MCP client connected: ${this.url}`);
  }

  async listTools(): Promise<McpToolDescriptor[]> {
    const response = await this.session().listTools();
    return response.tools.map((tool) => {
      const schema: unknown = tool.inputSchema;
      return {
        name: tool.name,
        description: tool.description ?? "",
        parameters: isRecord(schema) ? schema : { type: "object", properties: {} },
      };
    });
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const result: unknown = await this.session().callTool(
      { name, arguments: args },
      undefined,
      signal ? { signal } : undefined,
    );
    if (!isRecord(result)) return null;

    const text = firstBlockText(result["content"]);
    if (result["isError"] === true) {
      throw new ToolExecutionError(text ?? `MCP tool '${name}' reported an error.`);
    }
    return text;
  }

  async readResource(uri: string, signal?: AbortSignal): Promise<string> {
    const result: unknown = await this.session().readResource({ uri }, signal ? { signal } : undefined);
    const contents = isRecord(result) ? result["contents"] : undefined;
    if (!Array.isArray(contents) || contents.length === 0) {
      throw new ToolExecutionError(`No content in resource: ${uri}`);
    }

    const first: unknown = contents[0];
    if (isRecord(first)) {
      if (typeof first["text"] === "string") return first["text"];
      if (typeof first["blob"] === "string") return first["blob"];
    }
    throw new ToolExecutionError(`Unexpected content in resource: ${uri}`);
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (!client) return;

    try {
      await client.close();
    } catch (err) {
      devWarn(`Error closing MCP client ${this.url}: ${errorMessage(err)}`);
    }
  }

  private session(): Client {
    if (!this.client) {
      throw new Error("MCP client not connected.");
    }
    return this.client;
  }
}
