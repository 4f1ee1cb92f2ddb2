import { describe, it, expect } from "vitest";
import { RoundHistory } from "../../src/orchestrator/round-history.js";
import type { AssistantMessage, ToolMessage } from "../../src/core/contracts/llm-protocol.js";

const assistant: AssistantMessage = {
  role: "assistant",
  content: "",
  toolCalls: [
    { id: "call_1", name: "a", arguments: "{}" },
    { id: "call_2", name: "b", arguments: '{"x":1}' },
  ],
};

function result(toolCallId: string, content: string): ToolMessage {
  return { role: "tool", toolCallId, content };
}

describe("RoundHistory", () => {
  it("should append an assistant message followed by its results", () => {
    const history = new RoundHistory();
    history.appendRound(assistant, [result("call_1", "one"), result("call_2", "two")]);

    expect(history.length).toBe(3);
    expect(history.rounds).toBe(1);
    expect(history.messages).toEqual([assistant, result("call_1", "one"), result("call_2", "two")]);
  });

  it("should reject an assistant message without invocations", () => {
    const history = new RoundHistory();
    expect(() => history.appendRound({ role: "assistant", content: "hi" }, [])).toThrow(
      "A round needs at least one tool invocation.",
    );
  });

  it("should reject a result count that does not match", () => {
    const history = new RoundHistory();
    expect(() => history.appendRound(assistant, [result("call_1", "one")])).toThrow(
      "Round has 2 invocation(s) but 1 result(s).",
    );
    expect(history.length).toBe(0);
  });

  it("should reject results out of invocation order", () => {
    const history = new RoundHistory();
    expect(() =>
      history.appendRound(assistant, [result("call_2", "two"), result("call_1", "one")]),
    ).toThrow("Result 0 does not answer invocation 'call_1'.");
  });

  it("should hand out copies of its messages", () => {
    const history = new RoundHistory();
    history.appendRound(assistant, [result("call_1", "one"), result("call_2", "two")]);

    const snapshot = history.messages;
    history.appendRound(
      { role: "assistant", content: "", toolCalls: [{ id: "call_3", name: "a", arguments: "" }] },
      [result("call_3", "three")],
    );

    expect(snapshot).toHaveLength(3);
    expect(history.length).toBe(5);
    expect(history.rounds).toBe(2);
  });

  it("should serialize to persisted state", () => {
    const history = new RoundHistory();
    history.appendRound(assistant, [result("call_1", "one"), result("call_2", "two")]);

    expect(history.toState()).toEqual({
      tool_round_history: [
        {
          role: "assistant",
          content: "",
          toolCalls: [
            { id: "call_1", name: "a", arguments: "{}" },
            { id: "call_2", name: "b", arguments: '{"x":1}' },
          ],
        },
        { role: "tool", toolCallId: "call_1", content: "one" },
        { role: "tool", toolCallId: "call_2", content: "two" },
      ],
    });
  });
});
