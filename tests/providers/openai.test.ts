import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("openai", () => {
  const MockOpenAI = vi.fn();
  return { default: MockOpenAI };
});

import OpenAI from "openai";
import type { LlmProvider } from "../../src/core/contracts/provider.js";
import type { LlmStreamChunk, LlmTurnInput } from "../../src/core/contracts/llm-protocol.js";

async function getProvider(): Promise<LlmProvider> {
  const mod = await import("../../src/providers/openai/index.js");
  return mod.default;
}

function mockOpenAIConstructor(mockCreate: ReturnType<typeof vi.fn>): void {
  vi.mocked(OpenAI).mockImplementation(function (this: unknown) {
    return { chat: { completions: { create: mockCreate } } } as unknown as OpenAI;
  } as never);
}

async function* streamOf(chunks: unknown[]): AsyncGenerator<unknown> {
  for (const chunk of chunks) {
    yield chunk;
  }
}

function deltaChunk(delta: Record<string, unknown>) {
  return { choices: [{ index: 0, delta }] };
}

async function collect(provider: LlmProvider, input: LlmTurnInput): Promise<LlmStreamChunk[]> {
  const out: LlmStreamChunk[] = [];
  for await (const chunk of provider.streamTurn(input)) {
    out.push(chunk);
  }
  return out;
}

describe("OpenAI provider", () => {
  const originalEnv = { ...process.env };
  let provider: LlmProvider;

  beforeEach(async () => {
    vi.clearAllMocks();
    delete process.env["OPENAI_BASE_URL"];
    delete process.env["OPENAI_MODEL"];
    provider = await getProvider();
    await provider.stop();
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("should throw when OPENAI_API_KEY is missing", () => {
    delete process.env["OPENAI_API_KEY"];
    expect(() => provider.start()).toThrow("Missing OPENAI_API_KEY environment variable.");
  });

  it("should initialize when API key is present", () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    expect(() => provider.start()).not.toThrow();
    expect(OpenAI).toHaveBeenCalledWith({ apiKey: "test-secret" });
  });

  it("should stream content deltas", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi.fn().mockResolvedValue(
      streamOf([deltaChunk({ role: "assistant", content: "Hel" }), deltaChunk({ content: "lo" }), { choices: [] }]),
    );
    mockOpenAIConstructor(mockCreate);

    await provider.start();
    const chunks = await collect(provider, {
      messages: [
        { role: "system", content: "System" },
        { role: "user", content: "Hi" },
      ],
    });

    expect(chunks).toEqual([{ delta: { content: "Hel" } }, { delta: { content: "lo" } }]);
    expect(mockCreate.mock.calls[0]?.[0]).toEqual({
      model: "gpt-4o",
      messages: [
        { role: "system", content: "System" },
        { role: "user", content: "Hi" },
      ],
      stream: true,
    });
  });

  it("should send tools, tool choice and round history", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi.fn().mockResolvedValue(streamOf([]));
    mockOpenAIConstructor(mockCreate);

    await provider.start();
    await collect(provider, {
      model: "gpt-test",
      toolChoice: "none",
      tools: [{ name: "lookup", description: "Looks up", parameters: { type: "object" } }],
      messages: [
        { role: "user", content: "find x" },
        { role: "assistant", content: "", toolCalls: [{ id: "call_1", name: "lookup", arguments: '{"q":"x"}' }] },
        { role: "tool", toolCallId: "call_1", name: "lookup", content: "x found" },
      ],
    });

    expect(mockCreate.mock.calls[0]?.[0]).toEqual({
      model: "gpt-test",
      stream: true,
      tool_choice: "none",
      tools: [{ type: "function", function: { name: "lookup", description: "Looks up", parameters: { type: "object" } } }],
      messages: [
        { role: "user", content: "find x" },
        {
          role: "assistant",
          content: null,
          tool_calls: [{ id: "call_1", type: "function", function: { name: "lookup", arguments: '{"q":"x"}' } }],
        },
        { role: "tool", tool_call_id: "call_1", content: "x found" },
      ],
    });
  });

  it("should list user attachments in the message text", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi.fn().mockResolvedValue(streamOf([]));
    mockOpenAIConstructor(mockCreate);

    await provider.start();
    await collect(provider, {
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "summarize this", attachments: [{ url: "files/b/report.txt" }] },
      ],
    });

    expect(mockCreate.mock.calls[0]?.[0]).toEqual({
      model: "gpt-4o",
      stream: true,
      messages: [
        { role: "system", content: "sys" },
        { role: "user", content: "summarize this\n\nAttached files:\n- url: files/b/report.txt" },
      ],
    });
  });

  it("should encode tool names OpenAI rejects and decode them on the way back", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const encoded = `tool_${Buffer.from("files.read", "utf8").toString("base64url")}`;
    const mockCreate = vi.fn().mockResolvedValue(
      streamOf([
        deltaChunk({ tool_calls: [{ index: 0, id: "call_1", type: "function", function: { name: encoded, arguments: "" } }] }),
        deltaChunk({ tool_calls: [{ index: 0, function: { arguments: '{"path":' } }] }),
        deltaChunk({ tool_calls: [{ index: 0, function: { arguments: '"a.txt"}' } }] }),
      ]),
    );
    mockOpenAIConstructor(mockCreate);

    await provider.start();
    const chunks = await collect(provider, {
      messages: [{ role: "user", content: "read" }],
      tools: [{ name: "files.read", description: "Reads", parameters: { type: "object" } }],
    });

    const sent = mockCreate.mock.calls[0]?.[0] as { tools: Array<{ function: { name: string } }> };
    expect(sent.tools[0]?.function.name).toBe(encoded);
    expect(encoded).toMatch(/^[a-zA-Z0-9_-]+$/);
    expect(chunks).toEqual([
      { delta: { toolCalls: [{ index: 0, id: "call_1", name: "files.read" }] } },
      { delta: { toolCalls: [{ index: 0, argumentsChunk: '{"path":' }] } },
      { delta: { toolCalls: [{ index: 0, argumentsChunk: '"a.txt"}' }] } },
    ]);
  });

  it("should pass gateway fields and read gateway attachments", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    const mockCreate = vi.fn().mockResolvedValue(
      streamOf([
        deltaChunk({
          custom_content: {
            attachments: [{ type: "image/png", url: "files/b1/img.png", reference_url: "https://example.test/ref" }],
          },
        }),
      ]),
    );
    mockOpenAIConstructor(mockCreate);
    const controller = new AbortController();

    await provider.start();
    const chunks = await collect(provider, {
      model: "dall-e-3",
      messages: [{ role: "user", content: "a cat" }],
      extraBody: { custom_fields: { configuration: { size: "1024x1024" } } },
      signal: controller.signal,
    });

    expect(chunks).toEqual([
      {
        delta: {
          attachments: [{ type: "image/png", url: "files/b1/img.png", referenceUrl: "https://example.test/ref" }],
        },
      },
    ]);
    expect(mockCreate.mock.calls[0]?.[0]).toEqual({
      custom_fields: { configuration: { size: "1024x1024" } },
      model: "dall-e-3",
      messages: [{ role: "user", content: "a cat" }],
      stream: true,
    });
    expect(mockCreate.mock.calls[0]?.[1]).toEqual({ signal: controller.signal });
  });

  it("should use a separate client for a request credential", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    mockOpenAIConstructor(vi.fn().mockImplementation(async () => streamOf([])));

    await provider.start();
    await collect(provider, { messages: [{ role: "user", content: "hi" }], credential: "user-secret" });
    await collect(provider, { messages: [{ role: "user", content: "hi" }], credential: "user-secret" });

    expect(OpenAI).toHaveBeenCalledTimes(2);
    expect(OpenAI).toHaveBeenLastCalledWith({ apiKey: "user-secret" });
  });

  it("should require a credential when only a gateway URL is configured", async () => {
    delete process.env["OPENAI_API_KEY"];
    process.env["OPENAI_BASE_URL"] = "http://gateway.local";

    await provider.start();

    await expect(collect(provider, { messages: [{ role: "user", content: "hi" }] })).rejects.toThrow(
      "Missing OpenAI API key: set OPENAI_API_KEY or supply a request credential.",
    );
  });

  it("should throw when streaming before start", async () => {
    await expect(collect(provider, { messages: [{ role: "user", content: "Hi" }] })).rejects.toThrow(
      "OpenAI provider not started.",
    );
  });

  it("should clean up on stop", async () => {
    process.env["OPENAI_API_KEY"] = "test-secret";
    mockOpenAIConstructor(vi.fn());

    await provider.start();
    await provider.stop();
    await expect(collect(provider, { messages: [{ role: "user", content: "Hi" }] })).rejects.toThrow(
      "OpenAI provider not started.",
    );
  });
});
