import type { Chunk, EmbeddingEntry, IndexMeta, IndexStore, PersistedIndex } from "@siteqa/shared";

export class InMemoryIndexStore implements IndexStore {
  replaceCalls = 0;
  private current: PersistedIndex | null = null;

  async replace(index: PersistedIndex): Promise<void> {
    this.replaceCalls += 1;
    this.current = {
      chunks: index.chunks.map((chunk) => ({ ...chunk })),
      embeddings: index.embeddings.map((entry) => ({ chunkId: entry.chunkId, vector: [...entry.vector] })),
      meta: { ...index.meta }
    };
  }

  async load(): Promise<PersistedIndex | null> {
    return this.current;
  }

  async loadMeta(): Promise<IndexMeta | null> {
    return this.current?.meta ?? null;
  }

  async loadChunks(): Promise<Chunk[]> {
    return this.current?.chunks ?? [];
  }

  async loadEmbeddings(): Promise<EmbeddingEntry[]> {
    return this.current?.embeddings ?? [];
  }

  close(): void {
    this.current = null;
  }
}
