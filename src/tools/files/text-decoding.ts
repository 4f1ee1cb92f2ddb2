import jschardet from "jschardet";
import iconv from "iconv-lite";
import { devWarn } from "../../shared/index.js";
import { csvToMarkdownTable } from "./csv-table.js";
import { extractPdfText } from "./pdf-text.js";

export type DocumentKind = "txt" | "markdown" | "json" | "html" | "csv" | "pdf" | "unknown";

export function inferKindFromName(fileName: string): DocumentKind {
  const lowered = fileName.toLowerCase();
  if (lowered.endsWith(".md") || lowered.endsWith(".markdown")) return "markdown";
  if (lowered.endsWith(".json")) return "json";
  if (lowered.endsWith(".html") || lowered.endsWith(".htm")) return "html";
  if (lowered.endsWith(".csv")) return "csv";
  if (lowered.endsWith(".pdf")) return "pdf";
  if (lowered.endsWith(".txt")) return "txt";
  return "unknown";
}

export function decodeText(bytes: Buffer): string {
  const detection = jschardet.detect(bytes);
  const encoding = typeof detection.encoding === "string" ? detection.encoding : "utf-8";

  try {
    if (iconv.encodingExists(encoding)) {
      return iconv.decode(bytes, encoding);
    }
  } catch (err) {
    devWarn(`Decoding as ${encoding} failed, falling back to UTF-8: ${String(err)}`);
  }

  return bytes.toString("utf8");
}

const HTML_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: "\"",
  apos: "'",
  nbsp: " ",
};

/** Visible text of an HTML page, one block per line; scripts and styles dropped. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, "")
    .replace(/<[^>]+>/g, "\n")
    .replace(/&(amp|lt|gt|quot|apos|nbsp);/g, (_, name: string) => HTML_ENTITIES[name] ?? "")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/** PDFs yield their page text, CSV a markdown table, HTML its visible text. */
export async function extractText(bytes: Buffer, fileName: string): Promise<string> {
  const kind = inferKindFromName(fileName);
  if (kind === "pdf") return extractPdfText(bytes, fileName);

  const decoded = decodeText(bytes);
  switch (kind) {
    case "html":
      return htmlToText(decoded);
    case "csv":
      return csvToMarkdownTable(decoded);
    default:
      return decoded;
  }
}
