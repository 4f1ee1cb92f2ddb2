import type { LlmProvider } from "../../core/contracts/provider.js";
import type { LlmTurnInput } from "../../core/contracts/llm-protocol.js";
import { requireString } from "../arguments.js";
import type { DocumentSource } from "../files/document-source.js";
import { FILE_NOT_FOUND } from "../files/file-content-tool.js";
import type { Tool } from "../types.js";
import type { DocumentRetriever } from "./retriever.js";

export const RAG_TOOL_NAME = "rag_tool";
export const RAG_TOP_K = 3;

export const RAG_SYSTEM_PROMPT = `You are a helpful assistant that answers questions based on provided document context.

You will receive:
- CONTEXT: Retrieved relevant excerpts from a document
- REQUEST: The user's question or search query

Instructions:
- Answer the request using only the information in the provided context
- If the context doesn't contain enough information to answer, clearly state that
- Be concise and direct in your response
`;

export function augmentPrompt(request: string, chunks: readonly string[]): string {
  return `CONTEXT:\n${chunks.join("\n\n")}\n---\nREQUEST: ${request}`;
}

export interface RagToolOptions {
  provider: LlmProvider;
  source: DocumentSource;
  retriever: DocumentRetriever;
  /** Model that writes the grounded answer. */
  model?: string;
}

export function createRagTool(options: RagToolOptions): Tool {
  return {
    name: RAG_TOOL_NAME,
    description:
      "Performs search on documents to find and answer questions based on relevant content. " +
      "Supports: TXT, CSV, JSON, Markdown, HTML. " +
      "Use this tool when user asks questions about document content, needs specific information from large files, " +
      "or wants to search for particular topics/keywords. " +
      "Don't use it when: user wants to read entire document sequentially. " +
      "HOW IT WORKS: Splits document into chunks, finds top 3 most relevant sections, " +
      "then generates answer based only on those sections.",
    parameters: {
      type: "object",
      properties: {
        request: {
          type: "string",
          description: "The search query or question to search for in the document",
        },
        file_url: {
          type: "string",
          description: "File URL",
        },
      },
      required: ["request", "file_url"],
    },
    showInStage: false,

    async execute({ args, stage, credential, conversationId, signal }) {
      const request = requireString(args, "request");
      const fileUrl = requireString(args, "file_url");

      stage.appendContent("## Request arguments: \n");
      stage.appendContent(`**Request**: ${request}\n\r`);
      stage.appendContent(`**File URL**: ${fileUrl}\n\r`);

      const chunks = await options.retriever.retrieve({
        key: `${conversationId}:${fileUrl}`,
        load: () => options.source.fetchText(fileUrl, credential, signal),
        query: request,
        limit: RAG_TOP_K,
      });

      if (chunks.length === 0) {
        stage.appendContent("## Response: \n");
        stage.appendContent(`${FILE_NOT_FOUND}\n`);
        return FILE_NOT_FOUND;
      }

      const augmented = augmentPrompt(request, chunks);
      stage.appendContent("## RAG Request: \n");
      stage.appendContent(`\`\`\`text\n\r${augmented}\n\r\`\`\`\n\r`);
      stage.appendContent("## Response: \n");

      const input: LlmTurnInput = {
        messages: [
          { role: "system", content: RAG_SYSTEM_PROMPT },
          { role: "user", content: augmented },
        ],
        signal,
      };
      if (options.model) input.model = options.model;
      if (credential) input.credential = credential;

      let content = "";
      for await (const chunk of options.provider.streamTurn(input)) {
        const text = chunk.delta?.content;
        if (!text) continue;
        stage.appendContent(text);
        content += text;
      }
      return content;
    },
  };
}
