/**
 * ContextRetriever and InMemoryKnowledgeIndex Tests
 *
 * Cosine ranking, tie-breaking, filtering and snapshot isolation
 */
import fc from "fast-check";
import { describe, expect, test } from "vitest";
import {
  ContextRetriever,
  InMemoryKnowledgeIndex,
  cosineSimilarity,
  type ContextChunk,
  type Embedder,
} from "../src/index";

function chunk(
  id: string,
  embedding: number[],
  metadata: ContextChunk["metadata"] = {},
  sourceId = "test"
): ContextChunk {
  return { id, sourceId, text: `text of ${id}`, embedding, metadata };
}

/**
 * Embeds every text to the same vector and counts calls
 */
class FixedEmbedder implements Embedder {
  readonly name = "fixed";
  calls = 0;

  constructor(private readonly vector: number[]) {}

  async embed(): Promise<number[]> {
    this.calls++;
    return this.vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls++;
    return texts.map(() => this.vector);
  }
}

describe("ContextRetriever.query", () => {
  test("should rank chunks by cosine similarity", async () => {
    const index = new InMemoryKnowledgeIndex([
      chunk("far", [0, 1]),
      chunk("close", [1, 0.1]),
      chunk("middle", [1, 1]),
    ]);
    const retriever = new ContextRetriever(index, new FixedEmbedder([1, 0]));

    const results = await retriever.query("terrace", 2);

    expect(results.map((r) => r.chunk.id)).toEqual(["close", "middle"]);
    expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 10);
  });

  test("should prefer the most recently indexed chunk on equal scores", async () => {
    const index = new InMemoryKnowledgeIndex([chunk("a", [1, 0]), chunk("b", [2, 0])]);
    index.upsert([chunk("c", [3, 0])]);
    const retriever = new ContextRetriever(index, new FixedEmbedder([1, 0]));

    const results = await retriever.query("anything", 3);

    expect(results.map((r) => r.chunk.id)).toEqual(["c", "b", "a"]);
  });

  test("should break remaining ties by id", async () => {
    const retriever = new ContextRetriever(
      {
        snapshot: () => [
          { chunk: chunk("b", [1, 0]), sequence: 1 },
          { chunk: chunk("a", [1, 0]), sequence: 1 },
        ],
      },
      new FixedEmbedder([1, 0])
    );

    const results = await retriever.query("anything", 2);

    expect(results.map((r) => r.chunk.id)).toEqual(["a", "b"]);
  });

  test("should return nothing for empty text without embedding", async () => {
    const embedder = new FixedEmbedder([1, 0]);
    const retriever = new ContextRetriever(
      new InMemoryKnowledgeIndex([chunk("a", [1, 0])]),
      embedder
    );

    await expect(retriever.query("   ", 3)).resolves.toEqual([]);
    await expect(retriever.query("text", 0)).resolves.toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  test("should return nothing for an empty index", async () => {
    const embedder = new FixedEmbedder([1, 0]);
    const retriever = new ContextRetriever(new InMemoryKnowledgeIndex(), embedder);

    await expect(retriever.query("terrace", 3)).resolves.toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  test("should only consider chunks matching the filter", async () => {
    const index = new InMemoryKnowledgeIndex([
      chunk("terrace", [0, 1], { hasTerrace: true }),
      chunk("indoor", [1, 0], { hasTerrace: false }),
    ]);
    const retriever = new ContextRetriever(index, new FixedEmbedder([1, 0]));

    const results = await retriever.query("outside", 5, { filter: { hasTerrace: true } });

    expect(results.map((r) => r.chunk.id)).toEqual(["terrace"]);
  });

  test("should drop chunks below the minimum score", async () => {
    const index = new InMemoryKnowledgeIndex([chunk("a", [1, 0]), chunk("b", [0, 1])]);
    const retriever = new ContextRetriever(index, new FixedEmbedder([1, 0]));

    const results = await retriever.query("text", 5, { minScore: 0.5 });

    expect(results.map((r) => r.chunk.id)).toEqual(["a"]);
  });

  test("should skip chunks with a different embedding length", async () => {
    const index = new InMemoryKnowledgeIndex([chunk("short", [1]), chunk("ok", [1, 0])]);
    const retriever = new ContextRetriever(index, new FixedEmbedder([1, 0]));

    const results = await retriever.query("text", 5);

    expect(results.map((r) => r.chunk.id)).toEqual(["ok"]);
  });

  test("should be deterministic and bounded by k", async () => {
    const vector = fc.array(fc.integer({ min: -5, max: 5 }), { minLength: 3, maxLength: 3 });

    await fc.assert(
      fc.asyncProperty(
        fc.array(vector, { minLength: 1, maxLength: 12 }),
        vector,
        fc.integer({ min: 1, max: 15 }),
        async (embeddings, query, k) => {
          const index = new InMemoryKnowledgeIndex(
            embeddings.map((embedding, i) => chunk(`chunk-${i}`, embedding))
          );
          const retriever = new ContextRetriever(index, new FixedEmbedder(query));

          const first = await retriever.query("query", k);
          const second = await retriever.query("query", k);

          expect(first.length).toBeLessThanOrEqual(k);
          expect(second.map((r) => r.chunk.id)).toEqual(first.map((r) => r.chunk.id));
          for (let i = 1; i < first.length; i++) {
            expect(first[i - 1].score).toBeGreaterThanOrEqual(first[i].score);
          }
        }
      )
    );
  });
});

describe("InMemoryKnowledgeIndex", () => {
  test("should keep earlier snapshots unchanged", () => {
    const index = new InMemoryKnowledgeIndex([chunk("a", [1, 0])]);
    const before = index.snapshot();

    index.replace([chunk("b", [0, 1])]);

    expect(before.map((entry) => entry.chunk.id)).toEqual(["a"]);
    expect(index.snapshot().map((entry) => entry.chunk.id)).toEqual(["b"]);
  });

  test("should replace chunks with the same id on upsert", () => {
    const index = new InMemoryKnowledgeIndex([chunk("a", [1, 0]), chunk("b", [0, 1])]);

    index.upsert([chunk("a", [5, 5])]);

    expect(index.snapshot().map((entry) => [entry.chunk.id, entry.sequence])).toEqual([
      ["b", 2],
      ["a", 3],
    ]);
  });

  test("should remove chunks by id or source", () => {
    const index = new InMemoryKnowledgeIndex([
      chunk("a", [1], {}, "menu"),
      chunk("b", [1], {}, "menu"),
      chunk("c", [1], {}, "guide"),
    ]);

    expect(index.remove({ ids: ["c"] })).toBe(1);
    expect(index.remove({ sourceId: "menu" })).toBe(2);
    expect(index.remove({ sourceId: "menu" })).toBe(0);
    expect(index.size).toBe(0);
  });

  test("should freeze indexed chunks", () => {
    const embedding = [1, 2];
    const index = new InMemoryKnowledgeIndex([chunk("a", embedding)]);

    embedding[0] = 9;

    const [entry] = index.snapshot();
    expect(entry.chunk.embedding).toEqual([1, 2]);
    expect(Object.isFrozen(entry.chunk)).toBe(true);
  });
});

describe("cosineSimilarity", () => {
  test("should score parallel, orthogonal and zero vectors", () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  test("should reject vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(RangeError);
  });
});
