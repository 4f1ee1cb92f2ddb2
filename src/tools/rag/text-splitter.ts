export interface SplitOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

/**
 * Packs paragraphs into chunks of at most `chunkSize` chars. Paragraphs that
 * are too long are cut on word boundaries, and words that are too long are cut
 * anywhere. Each chunk after the first opens with the last words of the
 * previous one, up to `chunkOverlap` chars, when they fit.
 */
export function splitText(text: string, options: SplitOptions = {}): string[] {
  const chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const chunkOverlap = Math.max(0, options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP);

  const pieces = text
    .split(/\n{2,}/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .flatMap((paragraph) =>
      paragraph.length > chunkSize ? splitLongParagraph(paragraph, chunkSize) : [paragraph],
    );

  const chunks: string[] = [];
  let current = "";

  for (const piece of pieces) {
    const candidate = current.length > 0 ? `${current}\n\n${piece}` : piece;
    if (candidate.length <= chunkSize) {
      current = candidate;
      continue;
    }

    chunks.push(current);
    const tail = overlapTail(current, chunkOverlap);
    current = tail.length > 0 && tail.length + 1 + piece.length <= chunkSize ? `${tail} ${piece}` : piece;
  }

  if (current.length > 0) {
    chunks.push(current);
  }
  return chunks;
}

function splitLongParagraph(text: string, chunkSize: number): string[] {
  const slices: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((entry) => entry.length > 0)) {
    if (word.length > chunkSize) {
      if (current.length > 0) {
        slices.push(current);
        current = "";
      }
      for (let start = 0; start < word.length; start += chunkSize) {
        slices.push(word.slice(start, start + chunkSize));
      }
      continue;
    }

    const candidate = current.length > 0 ? `${current} ${word}` : word;
    if (candidate.length > chunkSize) {
      slices.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current.length > 0) {
    slices.push(current);
  }
  return slices;
}

function overlapTail(chunk: string, chunkOverlap: number): string {
  if (chunkOverlap <= 0) return "";

  const kept: string[] = [];
  let length = 0;
  const words = chunk.split(/\s+/).filter((entry) => entry.length > 0);
  for (const word of words.reverse()) {
    const next = length + word.length + (kept.length > 0 ? 1 : 0);
    if (next > chunkOverlap) break;
    kept.unshift(word);
    length = next;
  }
  return kept.join(" ");
}
