export type {
  OutputChannel,
  ProgressReporter,
  Stage,
  Tool,
  ToolCallContext,
  ToolOutcome,
  ToolReply,
} from "./types.js";
export { isRecord, optionalInteger, parseToolArguments, requireString } from "./arguments.js";
export { createToolRegistry } from "./registry.js";
export type { ToolRegistry, ValidationResult } from "./registry.js";
export {
  TOOL_ERROR_PREFIX,
  guardTool,
  isToolErrorMessage,
  toolErrorMessage,
  unknownTool,
} from "./guarded-tool.js";
export type { GuardOptions, GuardedTool, ToolEnvironment } from "./guarded-tool.js";
export { buildToolCatalog } from "./catalog.js";
export type { ToolCatalog, ToolCatalogOptions } from "./catalog.js";
export { createDeploymentTool, runDeployment } from "./deployment/deployment-tool.js";
export type { DeploymentToolOptions } from "./deployment/deployment-tool.js";
export { createImageGenerationTool } from "./deployment/image-generation.js";
export { createFileContentTool, paginate, PAGE_SIZE } from "./files/file-content-tool.js";
export { HttpDocumentSource } from "./files/document-source.js";
export type { DocumentSource } from "./files/document-source.js";
export { HttpFileStore } from "./files/file-store.js";
export type { FileStore, FileUpload } from "./files/file-store.js";
export { createRagTool, augmentPrompt } from "./rag/rag-tool.js";
export { ChunkedKeywordRetriever } from "./rag/retriever.js";
export type { DocumentRetriever, RetrievalRequest } from "./rag/retriever.js";
export { splitText } from "./rag/text-splitter.js";
export { StreamableHttpMcpClient } from "./mcp/mcp-client.js";
export type { McpClient, McpToolDescriptor } from "./mcp/mcp-client.js";
export { createMcpTool, createMcpTools } from "./mcp/mcp-tool.js";
export { createCodeInterpreterTool, parseExecutionResult } from "./code-interpreter/code-interpreter-tool.js";
