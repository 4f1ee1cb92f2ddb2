import type { ToolInvocation, ToolInvocationFragment } from "../core/contracts/llm-protocol.js";
import { ProtocolViolationError } from "../shared/index.js";

interface PendingInvocation {
  id: string;
  name: string;
  chunks: string[];
}

/**
 * Merges streamed tool-invocation fragments of one round into complete
 * invocations. Build a fresh accumulator per round.
 *
 * Output order is the order in which each index was first opened. That order
 * is kept in `arrival`, independent of how the index map iterates.
 */
export class DeltaAccumulator {
  private readonly byIndex = new Map<number, PendingInvocation>();
  private readonly arrival: number[] = [];
  private finalized = false;

  ingest(fragment: ToolInvocationFragment): void {
    if (this.finalized) {
      throw new ProtocolViolationError("Tool fragment received after the round was finalized.");
    }

    if (fragment.id) {
      if (!this.byIndex.has(fragment.index)) {
        this.arrival.push(fragment.index);
      }
      // Newest identity wins if an index is ever opened twice.
      this.byIndex.set(fragment.index, {
        id: fragment.id,
        name: fragment.name ?? "",
        chunks: fragment.argumentsChunk ? [fragment.argumentsChunk] : [],
      });
      return;
    }

    const pending = this.byIndex.get(fragment.index);
    if (!pending) {
      throw new ProtocolViolationError(
        `Tool fragment references index ${fragment.index} before any invocation was opened there.`,
      );
    }
    if (fragment.argumentsChunk) {
      pending.chunks.push(fragment.argumentsChunk);
    }
  }

  ingestAll(fragments: readonly ToolInvocationFragment[]): void {
    for (const fragment of fragments) {
      this.ingest(fragment);
    }
  }

  get size(): number {
    return this.arrival.length;
  }

  finalize(): ToolInvocation[] {
    this.finalized = true;
    const invocations: ToolInvocation[] = [];
    for (const index of this.arrival) {
      const pending = this.byIndex.get(index);
      if (!pending) continue;
      invocations.push({ id: pending.id, name: pending.name, arguments: pending.chunks.join("") });
    }
    return invocations;
  }
}
