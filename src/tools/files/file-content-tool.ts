import { optionalInteger, requireString } from "../arguments.js";
import type { Tool } from "../types.js";
import type { DocumentSource } from "./document-source.js";

export const FILE_CONTENT_TOOL_NAME = "file_content_extraction_tool";
export const PAGE_SIZE = 10_000;
export const FILE_NOT_FOUND = "Error: File content not found.";

export interface PageResult {
  content: string;
  /** False when the requested page lies past the end. */
  found: boolean;
}

/**
 * Content up to PAGE_SIZE chars comes back whole. Longer content is cut into
 * PAGE_SIZE pages and the page carries a `**Page #X. Total pages: Y**` footer.
 * Pages below 1 read as page 1.
 */
export function paginate(content: string, requestedPage: number): PageResult {
  if (content.length <= PAGE_SIZE) return { content, found: true };

  const totalPages = Math.ceil(content.length / PAGE_SIZE);
  const page = requestedPage < 1 ? 1 : requestedPage;
  if (page > totalPages) {
    return { content: `Error: Page ${page} does not exist. Total pages: ${totalPages}`, found: false };
  }

  const start = (page - 1) * PAGE_SIZE;
  const pageContent = content.slice(start, start + PAGE_SIZE);
  return { content: `${pageContent}\n\n**Page #${page}. Total pages: ${totalPages}**`, found: true };
}

export interface FileContentToolOptions {
  source: DocumentSource;
}

export function createFileContentTool(options: FileContentToolOptions): Tool {
  return {
    name: FILE_CONTENT_TOOL_NAME,
    description:
      "Extracts text content from files. Supported: TXT, PDF, CSV (as a markdown table), JSON, Markdown, HTML/HTM. " +
      "PAGINATION: Files >10,000 chars are paginated. Response format: `**Page #X. Total pages: Y**` appears at end if paginated. " +
      "USAGE: Start with page=1. If paginated, call again with page=2, page=3, etc. to get remaining content. " +
      "Always check response end for pagination info before answering user queries about file content.",
    parameters: {
      type: "object",
      properties: {
        file_url: {
          type: "string",
          description: "File URL",
        },
        page: {
          type: "integer",
          description: "For large documents pagination is enabled. Each page consists of 10000 characters.",
          default: 1,
        },
      },
      required: ["file_url"],
    },
    showInStage: false,

    async execute({ args, stage, credential, signal }) {
      const fileUrl = requireString(args, "file_url");
      const page = optionalInteger(args, "page", 1);

      stage.appendContent("## Request arguments: \n");
      stage.appendContent(`**File URL**: ${fileUrl}\n\r`);
      if (page > 1) {
        stage.appendContent(`**Page**: ${page}\n\r`);
      }
      stage.appendContent("## Response: \n");

      const text = await options.source.fetchText(fileUrl, credential, signal);
      const result = paginate(text.length > 0 ? text : FILE_NOT_FOUND, page);
      if (!result.found) return result.content;

      stage.appendContent(`\`\`\`text\n\r${result.content}\n\r\`\`\`\n\r`);
      return result.content;
    },
  };
}
