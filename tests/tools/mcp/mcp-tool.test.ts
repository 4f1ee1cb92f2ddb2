import { describe, it, expect } from "vitest";
import { createMcpTool, createMcpTools } from "../../../src/tools/mcp/mcp-tool.js";
import { fakeMcpClient, toolContext } from "../../helpers/fakes.js";

const weather = {
  name: "get_weather",
  description: "Current weather for a city",
  parameters: { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
};

describe("MCP tools", () => {
  it("should expose every remote tool with its own schema", async () => {
    const client = fakeMcpClient("http://mcp.local", [weather, { ...weather, name: "get_forecast" }]);

    const tools = await createMcpTools(client);

    expect(tools.map((tool) => tool.name)).toEqual(["get_weather", "get_forecast"]);
    expect(tools[0]?.parameters).toEqual(weather.parameters);
    expect(tools[0]?.description).toBe("Current weather for a city");
  });

  it("should call the remote tool and show its result", async () => {
    const client = fakeMcpClient("http://mcp.local", [weather]);
    client.callTool.mockResolvedValue("Sunny, 21C");
    const { context, stage } = toolContext({ city: "Lisbon" });

    const result = await createMcpTool(client, weather).execute(context);

    expect(result).toBe("Sunny, 21C");
    expect(stage.content).toBe("Sunny, 21C");
    expect(client.callTool).toHaveBeenCalledWith("get_weather", { city: "Lisbon" }, context.signal);
  });

  it("should return an empty result when the server sends no content", async () => {
    const client = fakeMcpClient("http://mcp.local", [weather]);
    const { context } = toolContext({ city: "Lisbon" });

    expect(await createMcpTool(client, weather).execute(context)).toBe("");
  });
});
