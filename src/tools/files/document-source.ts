import { ToolExecutionError } from "../../shared/index.js";
import { authHeaders, fileNameOf, resolveFileUrl } from "./files-api.js";
import { extractText } from "./text-decoding.js";

/** Turns a file reference from the conversation into plain text. */
export interface DocumentSource {
  fetchText(url: string, credential?: string, signal?: AbortSignal): Promise<string>;
}

export class HttpDocumentSource implements DocumentSource {
  constructor(private readonly endpoint: string) {}

  async fetchText(url: string, credential?: string, signal?: AbortSignal): Promise<string> {
    const response = await fetch(resolveFileUrl(this.endpoint, url), {
      headers: authHeaders(credential),
      ...(signal ? { signal } : {}),
    });
    if (!response.ok) {
      throw new ToolExecutionError(`Failed to download '${url}': HTTP ${response.status}`);
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    return extractText(bytes, fileNameOf(url));
  }
}
