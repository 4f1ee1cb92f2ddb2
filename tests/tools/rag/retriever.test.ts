import { describe, it, expect, vi } from "vitest";
import { ChunkedKeywordRetriever, tokenize } from "../../../src/tools/rag/retriever.js";

const DOC = "cats like milk\n\ndogs chase cats and balls\n\nbirds sing songs";

describe("tokenize", () => {
  it("should lowercase and keep word characters", () => {
    expect(tokenize("Do DOGS chase_cats? 42!")).toEqual(["do", "dogs", "chase_cats", "42"]);
    expect(tokenize("   ")).toEqual([]);
  });
});

describe("ChunkedKeywordRetriever", () => {
  it("should rank chunks by how many query terms they share", async () => {
    const retriever = new ChunkedKeywordRetriever({ chunkSize: 30, chunkOverlap: 0 });

    const chunks = await retriever.retrieve({
      key: "c1:doc",
      load: async () => DOC,
      query: "Do dogs chase cats?",
      limit: 2,
    });

    expect(chunks).toEqual(["dogs chase cats and balls", "cats like milk"]);
  });

  it("should return every chunk when the limit exceeds them", async () => {
    const retriever = new ChunkedKeywordRetriever({ chunkSize: 30, chunkOverlap: 0 });
    const chunks = await retriever.retrieve({ key: "k", load: async () => DOC, query: "zebra", limit: 10 });
    expect(chunks).toEqual(["cats like milk", "dogs chase cats and balls", "birds sing songs"]);
  });

  it("should load each document once per key", async () => {
    const retriever = new ChunkedKeywordRetriever();
    const load = vi.fn().mockResolvedValue(DOC);

    await retriever.retrieve({ key: "k", load, query: "cats", limit: 1 });
    await retriever.retrieve({ key: "k", load, query: "birds", limit: 1 });
    await retriever.retrieve({ key: "other", load, query: "birds", limit: 1 });

    expect(load).toHaveBeenCalledTimes(2);
    expect(retriever.size).toBe(2);
  });

  it("should load again once the entry expired", async () => {
    let now = 0;
    const retriever = new ChunkedKeywordRetriever({ ttlMs: 100, now: () => now });
    const load = vi.fn().mockResolvedValue(DOC);

    await retriever.retrieve({ key: "k", load, query: "cats", limit: 1 });
    now = 100;
    await retriever.retrieve({ key: "k", load, query: "cats", limit: 1 });

    expect(load).toHaveBeenCalledTimes(2);
  });

  it("should not keep empty documents", async () => {
    const retriever = new ChunkedKeywordRetriever();

    expect(await retriever.retrieve({ key: "k", load: async () => "", query: "cats", limit: 3 })).toEqual([]);
    expect(retriever.size).toBe(0);
  });

  it("should not keep documents that failed to load", async () => {
    const retriever = new ChunkedKeywordRetriever();
    const load = vi.fn().mockRejectedValueOnce(new Error("offline")).mockResolvedValueOnce(DOC);

    await expect(retriever.retrieve({ key: "k", load, query: "cats", limit: 1 })).rejects.toThrow("offline");
    expect(retriever.size).toBe(0);

    expect(await retriever.retrieve({ key: "k", load, query: "milk", limit: 1 })).toEqual([DOC]);
  });
});
