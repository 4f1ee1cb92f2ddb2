import { describe, it, expect, vi } from "vitest";
import { RAG_SYSTEM_PROMPT, augmentPrompt, createRagTool } from "../../../src/tools/rag/rag-tool.js";
import { ChunkedKeywordRetriever, type DocumentRetriever } from "../../../src/tools/rag/retriever.js";
import { FILE_NOT_FOUND } from "../../../src/tools/files/file-content-tool.js";
import { scriptedProvider, textChunks, toolContext } from "../../helpers/fakes.js";

const source = (text: string) => ({ fetchText: vi.fn().mockResolvedValue(text) });

describe("augmentPrompt", () => {
  it("should put the chunks before the request", () => {
    expect(augmentPrompt("why?", ["one", "two"])).toBe("CONTEXT:\none\n\ntwo\n---\nREQUEST: why?");
  });
});

describe("rag tool", () => {
  it("should answer from the retrieved chunks", async () => {
    const provider = scriptedProvider([textChunks("Mi", "lk.")]);
    const docs = source("cats like milk");
    const tool = createRagTool({ provider, source: docs, retriever: new ChunkedKeywordRetriever(), model: "mini" });
    const { context, stage } = toolContext(
      { request: "what do cats like?", file_url: "files/b1/a.txt" },
      { credential: "test-secret" },
    );

    const result = await tool.execute(context);

    const augmented = "CONTEXT:\ncats like milk\n---\nREQUEST: what do cats like?";
    expect(result).toBe("Milk.");
    expect(docs.fetchText).toHaveBeenCalledWith("files/b1/a.txt", "test-secret", context.signal);
    expect(provider.calls[0]).toEqual({
      messages: [
        { role: "system", content: RAG_SYSTEM_PROMPT },
        { role: "user", content: augmented },
      ],
      model: "mini",
      credential: "test-secret",
      signal: context.signal,
    });
    expect(stage.content).toBe(
      "## Request arguments: \n**Request**: what do cats like?\n\r**File URL**: files/b1/a.txt\n\r" +
        `## RAG Request: \n\`\`\`text\n\r${augmented}\n\r\`\`\`\n\r## Response: \nMilk.`,
    );
  });

  it("should key the document by conversation and file", async () => {
    const retrieve = vi.fn().mockResolvedValue(["chunk"]);
    const retriever: DocumentRetriever = { retrieve };
    const tool = createRagTool({ provider: scriptedProvider([textChunks("ok")]), source: source("x"), retriever });
    const { context } = toolContext({ request: "q", file_url: "files/b1/a.txt" }, { conversationId: "conv-9" });

    await tool.execute(context);

    expect(retrieve).toHaveBeenCalledWith(
      expect.objectContaining({ key: "conv-9:files/b1/a.txt", query: "q", limit: 3 }),
    );
  });

  it("should report a document without text", async () => {
    const provider = scriptedProvider([textChunks("unused")]);
    const tool = createRagTool({ provider, source: source(""), retriever: new ChunkedKeywordRetriever() });
    const { context, stage } = toolContext({ request: "q", file_url: "files/b1/empty.txt" });

    expect(await tool.execute(context)).toBe(FILE_NOT_FOUND);
    expect(stage.content.endsWith(`## Response: \n${FILE_NOT_FOUND}\n`)).toBe(true);
    expect(provider.calls).toHaveLength(0);
  });
});
