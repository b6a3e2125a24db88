import type { Chunk, EmbeddingEntry, RankedHit } from "@siteqa/shared";
import { EmbeddingServiceError, describeError } from "../errors.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { runWithConcurrency } from "../utils/concurrency.js";
import { byScoreThenId } from "../utils/text.js";

export interface VectorIndexBuildOptions {
  concurrency?: number;
  /** Vectors already known for a chunk id; these are not re-embedded. */
  precomputed?: ReadonlyMap<string, number[]>;
}

export function normalizeVector(vector: readonly number[]): Float32Array {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  norm = Math.sqrt(norm);

  const normalized = new Float32Array(vector.length);
  if (norm === 0) {
    return normalized;
  }
  for (let i = 0; i < vector.length; i += 1) {
    normalized[i] = (vector[i] ?? 0) / norm;
  }
  return normalized;
}

function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

async function embedOrThrow(embedder: EmbeddingProvider, text: string, label: string): Promise<number[]> {
  let vector: number[];
  try {
    vector = await embedder.generateEmbedding(text);
  } catch (error) {
    throw new EmbeddingServiceError(`Embedding failed for ${label}: ${describeError(error)}`, { cause: error });
  }
  if (vector.length === 0) {
    throw new EmbeddingServiceError(`Embedding service returned an empty vector for ${label}`);
  }
  return vector;
}

/** Exact cosine search over unit-length chunk vectors. */
export class VectorIndex {
  private constructor(
    private readonly ids: string[],
    private readonly vectors: Float32Array[],
    readonly dimension: number
  ) {}

  static fromEntries(entries: readonly EmbeddingEntry[]): VectorIndex {
    const first = entries[0];
    const dimension = first ? first.vector.length : 0;
    const ids: string[] = [];
    const vectors: Float32Array[] = [];

    for (const entry of entries) {
      if (entry.vector.length !== dimension) {
        throw new EmbeddingServiceError(
          `Embedding for ${entry.chunkId} has ${entry.vector.length} dimensions, expected ${dimension}`
        );
      }
      ids.push(entry.chunkId);
      vectors.push(normalizeVector(entry.vector));
    }

    return new VectorIndex(ids, vectors, dimension);
  }

  static async build(
    chunks: readonly Chunk[],
    embedder: EmbeddingProvider,
    options: VectorIndexBuildOptions = {}
  ): Promise<{ index: VectorIndex; entries: EmbeddingEntry[] }> {
    const entries = await runWithConcurrency(chunks, options.concurrency ?? 5, async (chunk) => {
      const known = options.precomputed?.get(chunk.id);
      const vector = known ?? (await embedOrThrow(embedder, chunk.text, `chunk ${chunk.id}`));
      return { chunkId: chunk.id, vector };
    });

    return { index: VectorIndex.fromEntries(entries), entries };
  }

  get size(): number {
    return this.ids.length;
  }

  async search(query: string, embedder: EmbeddingProvider, topK: number): Promise<RankedHit[]> {
    if (topK <= 0 || this.ids.length === 0) {
      return [];
    }

    const raw = await embedOrThrow(embedder, query, "query");
    if (raw.length !== this.dimension) {
      throw new EmbeddingServiceError(
        `Query embedding has ${raw.length} dimensions, index expects ${this.dimension}`
      );
    }

    const queryVector = normalizeVector(raw);
    const hits: RankedHit[] = this.vectors.map((vector, i) => ({
      chunkId: this.ids[i] ?? "",
      score: dot(queryVector, vector)
    }));

    return hits.sort(byScoreThenId).slice(0, topK);
  }
}
