import { describe, expect, it } from "vitest";
import { EmbeddingServiceError } from "../../../src/errors.js";
import { VectorIndex, normalizeVector } from "../../../src/retrieval/VectorIndex.js";
import type { EmbeddingProvider } from "../../../src/services/llmTypes.js";
import { ConceptEmbedder } from "../../helpers/ConceptEmbedder.js";
import { makeChunk } from "../../helpers/chunkFactory.js";

class StaticEmbedder implements EmbeddingProvider {
  calls = 0;

  constructor(private readonly vectors: Record<string, number[]>) {}

  async generateEmbedding(text: string): Promise<number[]> {
    this.calls += 1;
    return this.vectors[text] ?? [];
  }
}

describe("VectorIndex", () => {
  it("ranks by cosine similarity", async () => {
    const index = VectorIndex.fromEntries([
      { chunkId: "z", vector: [0, 3] },
      { chunkId: "y", vector: [3, 4] },
      { chunkId: "x", vector: [2, 0] }
    ]);
    const hits = await index.search("q", new StaticEmbedder({ q: [5, 0] }), 3);

    expect(hits.map((hit) => hit.chunkId)).toEqual(["x", "y", "z"]);
    expect(hits[0]?.score).toBeCloseTo(1, 6);
    expect(hits[1]?.score).toBeCloseTo(0.6, 6);
    expect(hits[2]?.score).toBeCloseTo(0, 6);
    expect(index.dimension).toBe(2);
  });

  it("breaks similarity ties by chunk id and honours topK", async () => {
    const index = VectorIndex.fromEntries([
      { chunkId: "b", vector: [1, 0] },
      { chunkId: "a", vector: [2, 0] },
      { chunkId: "c", vector: [0, 1] }
    ]);
    const hits = await index.search("q", new StaticEmbedder({ q: [1, 0] }), 2);

    expect(hits.map((hit) => hit.chunkId)).toEqual(["a", "b"]);
  });

  it("embeds every chunk once and skips precomputed vectors", async () => {
    const embedder = new ConceptEmbedder();
    const chunks = [
      makeChunk("pricing:0", "pricing in euros"),
      makeChunk("office:0", "office address"),
      makeChunk("careers:0", "open vacancies")
    ];

    const { index, entries } = await VectorIndex.build(chunks, embedder, {
      concurrency: 2,
      precomputed: new Map([["office:0", [0, 0, 9, 0, 0]]])
    });

    expect(embedder.calls.sort()).toEqual(["open vacancies", "pricing in euros"]);
    expect(entries).toEqual([
      { chunkId: "pricing:0", vector: [0, 2, 0, 0, 0] },
      { chunkId: "office:0", vector: [0, 0, 9, 0, 0] },
      { chunkId: "careers:0", vector: [0, 0, 0, 1, 0] }
    ]);
    expect(index.size).toBe(3);

    const hits = await index.search("where is your office", embedder, 1);
    expect(hits.map((hit) => hit.chunkId)).toEqual(["office:0"]);
  });

  it("wraps embedding failures", async () => {
    const embedder = new ConceptEmbedder();
    const index = VectorIndex.fromEntries([{ chunkId: "a", vector: [1, 0, 0, 0, 0] }]);
    const timeout = new Error("Upstream call timed out after 10ms");
    embedder.failWith = timeout;

    const failure = index.search("pricing", embedder, 3);
    await expect(failure).rejects.toBeInstanceOf(EmbeddingServiceError);
    await expect(failure).rejects.toMatchObject({ code: "EMBEDDING_SERVICE", cause: timeout });
  });

  it("rejects empty and mismatched vectors", async () => {
    const index = VectorIndex.fromEntries([{ chunkId: "a", vector: [1, 0] }]);

    await expect(index.search("unknown", new StaticEmbedder({}), 3)).rejects.toThrow(/empty vector/);
    await expect(index.search("q", new StaticEmbedder({ q: [1, 0, 0] }), 3)).rejects.toThrow(
      EmbeddingServiceError
    );
    expect(() =>
      VectorIndex.fromEntries([
        { chunkId: "a", vector: [1, 0] },
        { chunkId: "b", vector: [1, 0, 0] }
      ])
    ).toThrow(EmbeddingServiceError);
    await expect(
      VectorIndex.build([makeChunk("a:0", "nothing here")], new StaticEmbedder({}))
    ).rejects.toThrow(EmbeddingServiceError);
  });

  it("does not embed the query when the index is empty", async () => {
    const embedder = new StaticEmbedder({ q: [1] });
    expect(await VectorIndex.fromEntries([]).search("q", embedder, 3)).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it("normalises to unit length and leaves zero vectors at zero", () => {
    expect(Array.from(normalizeVector([3, 4]))).toEqual([Math.fround(0.6), Math.fround(0.8)]);
    expect(Array.from(normalizeVector([0, 0]))).toEqual([0, 0]);
  });
});
