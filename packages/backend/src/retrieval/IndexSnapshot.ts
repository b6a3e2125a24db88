import type { Bm25Params, Chunk, IndexMeta, IndexStatsResponse, PersistedIndex } from "@siteqa/shared";
import { IndexNotBuiltError } from "../errors.js";
import { LexicalIndex } from "./LexicalIndex.js";
import { VectorIndex } from "./VectorIndex.js";

/** Chunks plus both indices built over them. Never mutated after construction. */
export class IndexSnapshot {
  private readonly chunksById: ReadonlyMap<string, Chunk>;

  constructor(
    readonly chunks: readonly Chunk[],
    readonly lexical: LexicalIndex,
    readonly vector: VectorIndex,
    readonly meta: IndexMeta
  ) {
    this.chunksById = new Map(chunks.map((chunk) => [chunk.id, chunk]));
  }

  static fromPersisted(persisted: PersistedIndex, bm25: Bm25Params): IndexSnapshot {
    return new IndexSnapshot(
      persisted.chunks,
      LexicalIndex.build(persisted.chunks, bm25),
      VectorIndex.fromEntries(persisted.embeddings),
      persisted.meta
    );
  }

  getChunk(chunkId: string): Chunk | undefined {
    return this.chunksById.get(chunkId);
  }

  stats(): IndexStatsResponse {
    return {
      ready: true,
      chunkCount: this.chunks.length,
      documentCount: this.meta.documentCount,
      vocabularySize: this.lexical.stats().vocabularySize,
      dimension: this.vector.dimension,
      builtAt: this.meta.builtAt.toISOString(),
      embeddingModel: this.meta.embeddingModel
    };
  }
}

export const emptyIndexStats: IndexStatsResponse = {
  ready: false,
  chunkCount: 0,
  documentCount: 0,
  vocabularySize: 0,
  dimension: 0,
  builtAt: null,
  embeddingModel: null
};

export class IndexSnapshotHolder {
  private snapshot: IndexSnapshot | null;

  constructor(initial: IndexSnapshot | null = null) {
    this.snapshot = initial;
  }

  current(): IndexSnapshot {
    if (!this.snapshot) {
      throw new IndexNotBuiltError();
    }
    return this.snapshot;
  }

  peek(): IndexSnapshot | null {
    return this.snapshot;
  }

  isReady(): boolean {
    return this.snapshot !== null;
  }

  /** Replaces the served snapshot; searches already running keep the one they started with. */
  swap(next: IndexSnapshot): IndexSnapshot | null {
    const previous = this.snapshot;
    this.snapshot = next;
    return previous;
  }

  stats(): IndexStatsResponse {
    return this.snapshot ? this.snapshot.stats() : emptyIndexStats;
  }
}
