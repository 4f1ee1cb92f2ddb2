import { describe, it, expect } from "vitest";
import { userMessageText } from "../../src/core/runtime/user-content.js";

describe("userMessageText", () => {
  it("should return the content when nothing is attached", () => {
    expect(userMessageText({ role: "user", content: "hello" })).toBe("hello");
    expect(userMessageText({ role: "user", content: "hello", attachments: [] })).toBe("hello");
  });

  it("should list each attachment after the content", () => {
    const text = userMessageText({
      role: "user",
      content: "summarize these",
      attachments: [
        { title: "report.txt", type: "text/plain", url: "files/b/report.txt" },
        { url: "files/b/data.csv" },
      ],
    });

    expect(text).toBe(
      "summarize these\n\nAttached files:\n" +
        "- title: report.txt, type: text/plain, url: files/b/report.txt\n" +
        "- url: files/b/data.csv",
    );
  });

  it("should skip attachments that carry only inline data", () => {
    const text = userMessageText({
      role: "user",
      content: "look",
      attachments: [{ data: "AQID" }, { type: "image/png", referenceUrl: "https://example.test/ref" }],
    });

    expect(text).toBe("look\n\nAttached files:\n- type: image/png, reference_url: https://example.test/ref");
  });
});
