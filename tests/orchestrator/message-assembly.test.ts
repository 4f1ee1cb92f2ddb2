import { describe, it, expect } from "vitest";
import { assembleModelMessages, type VisibleMessage } from "../../src/orchestrator/message-assembly.js";
import type { ChatMessage } from "../../src/core/contracts/llm-protocol.js";

const hiddenRound: ChatMessage[] = [
  { role: "assistant", content: "", toolCalls: [{ id: "call_1", name: "lookup", arguments: '{"q":"x"}' }] },
  { role: "tool", toolCallId: "call_1", name: "lookup", content: "found x" },
];

describe("assembleModelMessages", () => {
  it("should put the system prompt first", () => {
    const out = assembleModelMessages("Be brief.", [{ role: "user", content: "hi" }], []);
    expect(out).toEqual([
      { role: "system", content: "Be brief." },
      { role: "user", content: "hi" },
    ]);
  });

  it("should restore hidden rounds before the answer that carried them", () => {
    const visible: VisibleMessage[] = [
      { role: "user", content: "what is x?" },
      { role: "assistant", content: "x is found", state: { tool_round_history: hiddenRound } },
      { role: "user", content: "thanks" },
    ];

    expect(assembleModelMessages("sys", visible, [])).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "what is x?" },
      ...hiddenRound,
      { role: "assistant", content: "x is found" },
      { role: "user", content: "thanks" },
    ]);
  });

  it("should skip malformed state and keep the visible message", () => {
    const visible: VisibleMessage[] = [
      { role: "user", content: "q" },
      { role: "assistant", content: "a", state: { tool_round_history: [{ role: "tool" }] } },
    ];

    expect(assembleModelMessages("sys", visible, [])).toEqual([
      { role: "system", content: "sys" },
      { role: "user", content: "q" },
      { role: "assistant", content: "a" },
    ]);
  });

  it("should append the current request's rounds last", () => {
    const out = assembleModelMessages("sys", [{ role: "user", content: "q" }], hiddenRound);
    expect(out.slice(2)).toEqual(hiddenRound);
  });

  it("should yield equal output for equal input", () => {
    const visible: VisibleMessage[] = [
      { role: "user", content: "q", attachments: [{ type: "text/plain", url: "files/a.txt" }] },
      { role: "assistant", content: "a", state: { tool_round_history: hiddenRound } },
    ];
    expect(assembleModelMessages("sys", visible, hiddenRound)).toEqual(
      assembleModelMessages("sys", visible, hiddenRound),
    );
  });
});
