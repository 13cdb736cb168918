/**
 * ContextRetriever - ranks knowledge chunks against a query by cosine
 * similarity
 */

import type {
  ChunkMetadata,
  Embedder,
  IndexedChunk,
  KnowledgeIndex,
  QueryOptions,
  ScoredChunk,
} from "../types/retrieval";
import { logger } from "../utils/logger";
import { throwIfAborted } from "../utils/retry";
import { cosineSimilarity } from "../utils/similarity";

export class ContextRetriever {
  constructor(
    private readonly index: KnowledgeIndex,
    private readonly embedder: Embedder
  ) {}

  /**
   * Top `k` chunks for the text, best first. Equal scores put the most
   * recently indexed chunk first, then the smaller id.
   */
  async query(
    text: string,
    k: number,
    options: QueryOptions = {}
  ): Promise<ScoredChunk[]> {
    const snapshot = this.index.snapshot();
    if (text.trim().length === 0 || k <= 0 || snapshot.length === 0) {
      return [];
    }

    const candidates = options.filter
      ? snapshot.filter((entry) => matchesFilter(entry, options.filter))
      : snapshot;
    if (candidates.length === 0) {
      return [];
    }

    throwIfAborted(options.signal);
    const queryEmbedding = await this.embedder.embed(text, options.signal);
    throwIfAborted(options.signal);

    const scored: Array<ScoredChunk & { sequence: number }> = [];
    let mismatched = 0;
    for (const { chunk, sequence } of candidates) {
      if (chunk.embedding.length !== queryEmbedding.length) {
        mismatched++;
        continue;
      }
      const score = cosineSimilarity(queryEmbedding, chunk.embedding);
      if (options.minScore !== undefined && score < options.minScore) {
        continue;
      }
      scored.push({ chunk, score, sequence });
    }

    if (mismatched > 0) {
      logger.warn(
        `[ContextRetriever] Skipped ${mismatched} chunk(s) whose embedding length differs from ${queryEmbedding.length}`
      );
    }

    scored.sort(
      (a, b) =>
        b.score - a.score ||
        b.sequence - a.sequence ||
        compareIds(a.chunk.id, b.chunk.id)
    );

    return scored
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk, score }));
  }
}

function matchesFilter(entry: IndexedChunk, filter?: ChunkMetadata): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(
    ([key, value]) => entry.chunk.metadata[key] === value
  );
}

function compareIds(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
