import type { LlmProvider } from "../core/contracts/provider.js";
import { devLog } from "../shared/index.js";
import { createCodeInterpreterTool } from "./code-interpreter/code-interpreter-tool.js";
import { createImageGenerationTool } from "./deployment/image-generation.js";
import type { DocumentSource } from "./files/document-source.js";
import { createFileContentTool } from "./files/file-content-tool.js";
import type { FileStore } from "./files/file-store.js";
import type { McpClient } from "./mcp/mcp-client.js";
import { createMcpTools } from "./mcp/mcp-tool.js";
import type { DocumentRetriever } from "./rag/retriever.js";
import { createRagTool } from "./rag/rag-tool.js";
import type { Tool } from "./types.js";

export interface ToolCatalogOptions {
  provider: LlmProvider;
  source: DocumentSource;
  retriever: DocumentRetriever;
  fileStore?: FileStore;
  /** Model the RAG tool answers with. */
  model?: string;
  imageDeployment?: string;
  codeInterpreterUrl?: string;
  mcpServerUrls?: readonly string[];
  connectMcp: (url: string) => Promise<McpClient>;
}

export interface ToolCatalog {
  tools: Tool[];
  clients: McpClient[];
  close(): Promise<void>;
}

async function closeAll(clients: readonly McpClient[]): Promise<void> {
  await Promise.all(clients.map((client) => client.close()));
}

/**
 * Builds the tool set in a fixed order: file content, RAG, image generation,
 * code interpreter, then every remote MCP server's tools. MCP clients opened
 * before a failure are closed again.
 */
export async function buildToolCatalog(options: ToolCatalogOptions): Promise<ToolCatalog> {
  const clients: McpClient[] = [];
  const tools: Tool[] = [
    createFileContentTool({ source: options.source }),
    createRagTool({
      provider: options.provider,
      source: options.source,
      retriever: options.retriever,
      ...(options.model ? { model: options.model } : {}),
    }),
    createImageGenerationTool({
      provider: options.provider,
      ...(options.imageDeployment ? { deployment: options.imageDeployment } : {}),
    }),
  ];

  try {
    if (options.codeInterpreterUrl) {
      const client = await options.connectMcp(options.codeInterpreterUrl);
      clients.push(client);
      tools.push(
        await createCodeInterpreterTool({
          client,
          ...(options.fileStore ? { fileStore: options.fileStore } : {}),
        }),
      );
    }

    for (const url of options.mcpServerUrls ?? []) {
      const client = await options.connectMcp(url);
      clients.push(client);
      const remote = await createMcpTools(client);
      devLog(`Loaded ${remote.length} tool(s) from ${url}`);
      tools.push(...remote);
    }
  } catch (err) {
    await closeAll(clients);
    throw err;
  }

  return { tools, clients, close: () => closeAll(clients) };
}
