import type { LlmToolSchema } from "../core/contracts/llm-protocol.js";
import { devWarn } from "../shared/index.js";
import { isRecord } from "./arguments.js";
import type { Tool } from "./types.js";

export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; schema: Record<string, unknown> };

/** Read-only name → tool lookup, fixed for the lifetime of an orchestrator. */
export interface ToolRegistry {
  lookup(name: string): Tool | undefined;
  list(): string[];
  tools(): Tool[];
  schemas(): LlmToolSchema[];
  validate(toolName: string, input: unknown): ValidationResult;
}

const JSON_SCHEMA_TYPES = new Set(["string", "number", "integer", "boolean", "array", "object"]);
const MAX_DESCRIPTION_CHARS = 1024;

function matchesType(value: unknown, expectedType: string): boolean {
  if (!JSON_SCHEMA_TYPES.has(expectedType)) return true;
  if (expectedType === "integer") return typeof value === "number" && Number.isInteger(value);
  if (expectedType === "array") return Array.isArray(value);
  if (expectedType === "object") return isRecord(value);
  return typeof value === expectedType;
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function readRequired(schema: Record<string, unknown>): string[] {
  const required = schema["required"];
  if (!Array.isArray(required)) return [];
  return required.filter((field): field is string => typeof field === "string");
}

function readPropertyType(schema: Record<string, unknown>, key: string): string | undefined {
  const properties = schema["properties"];
  if (!isRecord(properties)) return undefined;
  const prop = properties[key];
  if (!isRecord(prop)) return undefined;
  return typeof prop["type"] === "string" ? prop["type"] : undefined;
}

export function createToolRegistry(tools: readonly Tool[]): ToolRegistry {
  const index = new Map<string, Tool>();

  for (const tool of tools) {
    if (index.has(tool.name)) {
      devWarn(`Duplicate tool name detected, keeping first and skipping: ${tool.name}`);
      continue;
    }
    if (tool.description.length > MAX_DESCRIPTION_CHARS) {
      devWarn(`Tool '${tool.name}' description exceeds ${MAX_DESCRIPTION_CHARS} chars`);
    }
    index.set(tool.name, tool);
  }

  return {
    lookup(name: string): Tool | undefined {
      return index.get(name);
    },

    list(): string[] {
      return [...index.keys()];
    },

    tools(): Tool[] {
      return [...index.values()];
    },

    schemas(): LlmToolSchema[] {
      return [...index.values()].map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      }));
    },

    validate(toolName: string, input: unknown): ValidationResult {
      const tool = index.get(toolName);
      if (!tool) {
        return {
          valid: false,
          error: `Unknown tool: ${toolName}`,
          schema: { availableTools: [...index.keys()] },
        };
      }

      const schema = tool.parameters;
      const obj = isRecord(input) ? input : {};

      for (const field of readRequired(schema)) {
        if (obj[field] === undefined || obj[field] === null) {
          return {
            valid: false,
            error: `Invalid input for '${toolName}': missing required field '${field}'`,
            schema,
          };
        }
      }

      for (const [key, value] of Object.entries(obj)) {
        const expected = readPropertyType(schema, key);
        if (expected && !matchesType(value, expected)) {
          return {
            valid: false,
            error: `Invalid input for '${toolName}': field '${key}' expected type '${expected}', got '${describeType(value)}'`,
            schema,
          };
        }
      }

      return { valid: true };
    },
  };
}
