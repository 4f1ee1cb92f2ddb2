import type { Tool } from "../types.js";
import type { McpClient, McpToolDescriptor } from "./mcp-client.js";

/** Exposes one remote MCP tool under its own name and schema. */
export function createMcpTool(client: McpClient, descriptor: McpToolDescriptor): Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: descriptor.parameters,

    async execute({ args, stage, signal }) {
      const content = (await client.callTool(descriptor.name, args, signal)) ?? "";
      stage.appendContent(content);
      return content;
    },
  };
}

export async function createMcpTools(client: McpClient): Promise<Tool[]> {
  const descriptors = await client.listTools();
  return descriptors.map((descriptor) => createMcpTool(client, descriptor));
}
