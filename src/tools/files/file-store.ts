import { Blob } from "node:buffer";
import { ToolExecutionError } from "../../shared/index.js";
import { isRecord } from "../arguments.js";
import { authHeaders, resolveFileUrl } from "./files-api.js";

export interface FileUpload {
  name: string;
  mimeType: string;
  data: Buffer;
  credential?: string;
  signal?: AbortSignal;
}

/** Stores generated files and returns the reference attachments point at. */
export interface FileStore {
  upload(file: FileUpload): Promise<string>;
}

/**
 * Uploads into the caller's app-data folder of the files service:
 * `files/<appdata>/<name>`.
 */
export class HttpFileStore implements FileStore {
  constructor(private readonly endpoint: string) {}

  async upload(file: FileUpload): Promise<string> {
    file.signal?.throwIfAborted();
    const home = await this.appDataHome(file.credential, file.signal);
    const reference = `files/${home}/${encodeURIComponent(file.name)}`;

    const form = new FormData();
    form.append("attachment", new Blob([file.data], { type: file.mimeType }), file.name);

    const response = await fetch(resolveFileUrl(this.endpoint, reference), {
      method: "PUT",
      headers: authHeaders(file.credential),
      body: form,
      ...(file.signal ? { signal: file.signal } : {}),
    });
    if (!response.ok) {
      throw new ToolExecutionError(`Failed to upload '${file.name}': HTTP ${response.status}`);
    }
    return reference;
  }

  private async appDataHome(credential: string | undefined, signal: AbortSignal | undefined): Promise<string> {
    const response = await fetch(resolveFileUrl(this.endpoint, "bucket"), {
      headers: authHeaders(credential),
      ...(signal ? { signal } : {}),
    });
    if (!response.ok) {
      throw new ToolExecutionError(`Failed to resolve the files bucket: HTTP ${response.status}`);
    }

    const body: unknown = await response.json();
    if (isRecord(body)) {
      if (typeof body["appdata"] === "string") return body["appdata"];
      if (typeof body["bucket"] === "string") return body["bucket"];
    }
    throw new ToolExecutionError("Files service returned no bucket.");
  }
}
