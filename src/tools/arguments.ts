import { ToolArgumentsError } from "../shared/index.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parses the accumulated argument text of an invocation. Providers may close a
 * stream without sending any argument text for parameterless tools, so blank
 * input reads as `{}`.
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim().length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolArgumentsError(`Malformed tool arguments: ${raw.slice(0, 200)}`, err);
  }

  if (!isRecord(parsed)) {
    throw new ToolArgumentsError("Tool arguments must be a JSON object.");
  }
  return parsed;
}

export function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ToolArgumentsError(`Missing required string argument '${key}'.`);
  }
  return value;
}

export function optionalInteger(
  args: Record<string, unknown>,
  key: string,
  fallback: number,
): number {
  const value = args[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value, 10);
  }
  throw new ToolArgumentsError(`Argument '${key}' must be an integer.`);
}
