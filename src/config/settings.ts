import { ConfigError } from "../shared/index.js";

export type ProviderName = "openai" | "anthropic";

export interface AgentSettings {
  provider: ProviderName;
  model?: string;
  maxRounds: number;
  toolTimeoutMs: number;
  port: number;
  filesEndpoint: string;
  imageDeployment: string;
  /** Unset means no code interpreter tool. */
  codeInterpreterUrl?: string;
  mcpServerUrls: string[];
}

export function readPositiveIntEnv(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

function readProvider(env: NodeJS.ProcessEnv): ProviderName {
  const raw = (env["LLM_PROVIDER"] ?? "openai").trim().toLowerCase();
  if (raw === "openai" || raw === "anthropic") return raw;
  throw new ConfigError(`Unsupported LLM_PROVIDER '${raw}'. Expected 'openai' or 'anthropic'.`);
}

function readList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): AgentSettings {
  const provider = readProvider(env);
  const model = provider === "openai" ? env["OPENAI_MODEL"] : env["ANTHROPIC_MODEL"];
  const codeInterpreterUrl = env["PYINTERPRETER_MCP_URL"]?.trim();

  return {
    provider,
    ...(model ? { model } : {}),
    maxRounds: readPositiveIntEnv("AGENT_MAX_ROUNDS", env) ?? 10,
    toolTimeoutMs: readPositiveIntEnv("AGENT_TOOL_TIMEOUT_MS", env) ?? 120_000,
    port: readPositiveIntEnv("AGENT_PORT", env) ?? 5030,
    filesEndpoint: env["FILES_ENDPOINT"]?.trim() || "http://localhost:8080",
    imageDeployment: env["IMAGE_DEPLOYMENT"]?.trim() || "dall-e-3",
    ...(codeInterpreterUrl ? { codeInterpreterUrl } : {}),
    mcpServerUrls: readList(env["MCP_SERVER_URLS"]),
  };
}
