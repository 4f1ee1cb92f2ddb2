import { devLog } from "../../shared/index.js";
import { splitText, type SplitOptions } from "./text-splitter.js";

export interface RetrievalRequest {
  /** Cache key; one document per conversation and file. */
  key: string;
  /** Loads the document text on a cache miss. */
  load: () => Promise<string>;
  query: string;
  limit: number;
}

export interface DocumentRetriever {
  /** Most relevant chunks first; empty when the document has no text. */
  retrieve(request: RetrievalRequest): Promise<string[]>;
}

interface IndexedChunk {
  text: string;
  tokens: Set<string>;
}

interface CacheEntry {
  chunks: Promise<IndexedChunk[]>;
  expiresAt: number;
}

export interface ChunkedKeywordRetrieverOptions extends SplitOptions {
  ttlMs?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 60 * 60 * 1000;

export function tokenize(text: string): string[] {
  if (!text || text.trim().length === 0) return [];
  const matches = text.toLowerCase().match(/[a-z0-9_]+/g);
  return matches ?? [];
}

function countOverlap(queryTokens: Set<string>, targetTokens: Set<string>): number {
  let count = 0;
  for (const token of queryTokens) {
    if (targetTokens.has(token)) count++;
  }
  return count;
}

/**
 * Splits each document once per key, keeps the chunks for `ttlMs`, and ranks
 * them by how many distinct query terms they contain. Ties keep document order.
 */
export class ChunkedKeywordRetriever implements DocumentRetriever {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly split: SplitOptions;

  constructor(options: ChunkedKeywordRetrieverOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
    this.split = { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap };
  }

  get size(): number {
    return this.cache.size;
  }

  async retrieve(request: RetrievalRequest): Promise<string[]> {
    const chunks = await this.chunksFor(request.key, request.load);
    if (chunks.length === 0) return [];

    const queryTokens = new Set(tokenize(request.query));
    const ranked = chunks
      .map((chunk, position) => ({ chunk, position, score: countOverlap(queryTokens, chunk.tokens) }))
      .sort((a, b) => b.score - a.score || a.position - b.position);

    return ranked.slice(0, Math.min(request.limit, ranked.length)).map((entry) => entry.chunk.text);
  }

  private chunksFor(key: string, load: () => Promise<string>): Promise<IndexedChunk[]> {
    this.evictExpired();

    const cached = this.cache.get(key);
    if (cached) return cached.chunks;

    const chunks = load().then((text) =>
      splitText(text, this.split).map((chunk) => ({ text: chunk, tokens: new Set(tokenize(chunk)) })),
    );
    this.cache.set(key, { chunks, expiresAt: this.now() + this.ttlMs });

    // Failed or empty documents are not kept, so a later call loads again.
    void chunks.then(
      (indexed) => {
        if (indexed.length === 0) this.forget(key, chunks);
        else devLog(`Indexed ${indexed.length} chunk(s) for ${key}`);
      },
      () => this.forget(key, chunks),
    );
    return chunks;
  }

  private forget(key: string, chunks: Promise<IndexedChunk[]>): void {
    if (this.cache.get(key)?.chunks === chunks) {
      this.cache.delete(key);
    }
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) this.cache.delete(key);
    }
  }
}
