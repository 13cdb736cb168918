/**
 * InMemoryKnowledgeIndex - copy-on-write store of context chunks
 *
 * Writers build a new array and swap it in; readers keep whatever snapshot
 * they took, so a query never observes a half-applied update.
 */

import type {
  ContextChunk,
  IndexedChunk,
  KnowledgeIndex,
} from "../types/retrieval";
import { logger } from "../utils/logger";

export class InMemoryKnowledgeIndex implements KnowledgeIndex {
  private current: readonly IndexedChunk[] = Object.freeze([]);
  private sequence = 0;

  constructor(chunks: readonly ContextChunk[] = []) {
    if (chunks.length > 0) {
      this.replace(chunks);
    }
  }

  snapshot(): readonly IndexedChunk[] {
    return this.current;
  }

  get size(): number {
    return this.current.length;
  }

  /**
   * Publish a whole new set of chunks
   */
  replace(chunks: readonly ContextChunk[]): void {
    this.publish(chunks.map((chunk) => this.index(chunk)));
    logger.info(`[KnowledgeIndex] Published ${chunks.length} chunk(s)`);
  }

  /**
   * Add chunks, replacing those with the same id. Replaced chunks count as
   * newly indexed.
   */
  upsert(chunks: readonly ContextChunk[]): void {
    const incoming = new Set(chunks.map((chunk) => chunk.id));
    const kept = this.current.filter((entry) => !incoming.has(entry.chunk.id));
    this.publish([...kept, ...chunks.map((chunk) => this.index(chunk))]);
    logger.debug(`[KnowledgeIndex] Upserted ${chunks.length} chunk(s)`);
  }

  /**
   * Remove chunks by id, or every chunk of a source. Returns how many went.
   */
  remove(selector: { ids?: string[]; sourceId?: string }): number {
    const ids = new Set(selector.ids ?? []);
    const kept = this.current.filter(
      (entry) =>
        !ids.has(entry.chunk.id) && entry.chunk.sourceId !== selector.sourceId
    );
    const removed = this.current.length - kept.length;
    if (removed > 0) {
      this.publish(kept);
    }
    return removed;
  }

  private index(chunk: ContextChunk): IndexedChunk {
    return Object.freeze({
      chunk: Object.freeze({
        ...chunk,
        embedding: Object.freeze([...chunk.embedding]),
        metadata: Object.freeze({ ...chunk.metadata }),
      }),
      sequence: ++this.sequence,
    });
  }

  private publish(entries: IndexedChunk[]): void {
    this.current = Object.freeze(entries);
  }
}
