import type { Chunk, ChunkingOptions } from "./types/corpus.js";
import type { EmbeddingEntry } from "./types/retrieval.js";

export interface IndexMeta {
  builtAt: Date;
  embeddingModel: string;
  dimension: number;
  documentCount: number;
  chunking: ChunkingOptions;
}

export interface PersistedIndex {
  chunks: Chunk[];
  embeddings: EmbeddingEntry[];
  meta: IndexMeta;
}

export interface ChunkStore {
  loadChunks(): Promise<Chunk[]>;
}

export interface EmbeddingStore {
  loadEmbeddings(): Promise<EmbeddingEntry[]>;
}

/**
 * Persisted chunk + vector layout. Both halves are keyed by chunk id and can be read
 * without the build pipeline; `replace` swaps the whole index in one transaction.
 */
export interface IndexStore extends ChunkStore, EmbeddingStore {
  replace(index: PersistedIndex): Promise<void>;
  load(): Promise<PersistedIndex | null>;
  loadMeta(): Promise<IndexMeta | null>;
  close(): void;
}
