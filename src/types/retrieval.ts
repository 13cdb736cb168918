/**
 * Knowledge retrieval types
 */

export type ChunkMetadata = Record<string, string | number | boolean | null>;

/**
 * One retrievable unit of background knowledge
 */
export interface ContextChunk {
  readonly id: string;
  readonly sourceId: string;
  readonly text: string;
  readonly embedding: readonly number[];
  readonly metadata: Readonly<ChunkMetadata>;
}

/**
 * A chunk as stored in an index snapshot. Higher sequence means indexed later.
 */
export interface IndexedChunk {
  readonly chunk: ContextChunk;
  readonly sequence: number;
}

export interface ScoredChunk {
  chunk: ContextChunk;
  score: number;
}

/**
 * Read side of the knowledge index. A snapshot never changes once returned.
 */
export interface KnowledgeIndex {
  snapshot(): readonly IndexedChunk[];
}

/**
 * Text embedding collaborator
 */
export interface Embedder {
  readonly name: string;
  readonly dimensions?: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface QueryOptions {
  /** Chunks scoring below are left out */
  minScore?: number;
  /** Every key must equal the chunk's metadata value */
  filter?: ChunkMetadata;
  signal?: AbortSignal;
}
