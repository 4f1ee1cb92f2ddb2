import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { devWarn } from "../shared/index.js";

const SYSTEM_PROMPT_FILE = "system_prompt.md";
export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful assistant. Explain briefly why you use a tool before calling it, " +
  "interpret tool results for the user, and never print URLs of generated files.";

// Sources run from src/prompts, builds from dist/src/prompts.
function candidatePaths(): string[] {
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return [
    resolve(thisDir, "..", "..", "context", SYSTEM_PROMPT_FILE),
    resolve(thisDir, "..", "..", "..", "context", SYSTEM_PROMPT_FILE),
  ];
}

export async function loadSystemPrompt(paths: readonly string[] = candidatePaths()): Promise<string> {
  for (const filePath of paths) {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch {
      continue;
    }
    const trimmed = raw.trim();
    if (trimmed.length > 0) return trimmed;
  }

  devWarn("System prompt missing or empty. Using fallback system prompt.");
  return DEFAULT_SYSTEM_PROMPT;
}
