import type { Bm25Params, Chunk, ChunkingOptions, CorpusDocument, IndexStore } from "@siteqa/shared";
import { CorpusError, IndexNotBuiltError } from "../errors.js";
import { Chunker } from "../retrieval/Chunker.js";
import { IndexSnapshot } from "../retrieval/IndexSnapshot.js";
import { LexicalIndex } from "../retrieval/LexicalIndex.js";
import { VectorIndex } from "../retrieval/VectorIndex.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

export interface IndexBuilderOptions {
  chunking: ChunkingOptions;
  bm25: Bm25Params;
  embeddingConcurrency: number;
  /** Stored with the index; vectors from a different model are never reused. */
  embeddingModel: string;
  /** Requested vector size; stored vectors of another size are never reused. */
  embeddingDimensions?: number;
}

export interface IndexBuildStats {
  documentCount: number;
  chunkCount: number;
  duplicateChunks: number;
  reusedEmbeddings: number;
  embeddedChunks: number;
  dimension: number;
  vocabularySize: number;
  durationMs: number;
}

export class IndexBuilder {
  private readonly chunker: Chunker;

  constructor(
    private readonly store: IndexStore,
    private readonly embedder: EmbeddingProvider,
    private readonly options: IndexBuilderOptions
  ) {
    this.chunker = new Chunker(options.chunking);
  }

  async build(documents: readonly CorpusDocument[]): Promise<{ snapshot: IndexSnapshot; stats: IndexBuildStats }> {
    const startedAt = Date.now();
    const { chunks, duplicates } = this.chunkAll(documents);
    if (chunks.length === 0) {
      throw new CorpusError("Corpus produced no chunks to index");
    }

    const precomputed = await this.reusableEmbeddings(chunks);
    logger.info(
      { documents: documents.length, chunks: chunks.length, duplicates, reused: precomputed.size },
      "Embedding chunks"
    );

    const { index: vector, entries } = await VectorIndex.build(chunks, this.embedder, {
      concurrency: this.options.embeddingConcurrency,
      precomputed
    });
    const lexical = LexicalIndex.build(chunks, this.options.bm25);

    const meta = {
      builtAt: new Date(),
      embeddingModel: this.options.embeddingModel,
      dimension: vector.dimension,
      documentCount: documents.length,
      chunking: this.chunker.options
    };
    await this.store.replace({ chunks, embeddings: entries, meta });

    const stats: IndexBuildStats = {
      documentCount: documents.length,
      chunkCount: chunks.length,
      duplicateChunks: duplicates,
      reusedEmbeddings: precomputed.size,
      embeddedChunks: chunks.length - precomputed.size,
      dimension: vector.dimension,
      vocabularySize: lexical.stats().vocabularySize,
      durationMs: Date.now() - startedAt
    };
    logger.info(stats, "Index built");

    return { snapshot: new IndexSnapshot(chunks, lexical, vector, meta), stats };
  }

  private chunkAll(documents: readonly CorpusDocument[]): { chunks: Chunk[]; duplicates: number } {
    const chunks: Chunk[] = [];
    const seenHashes = new Set<string>();
    let duplicates = 0;

    for (const document of documents) {
      for (const chunk of this.chunker.chunk(document)) {
        if (seenHashes.has(chunk.hash)) {
          duplicates += 1;
          continue;
        }
        seenHashes.add(chunk.hash);
        chunks.push(chunk);
      }
    }

    return { chunks, duplicates };
  }

  private async reusableEmbeddings(chunks: readonly Chunk[]): Promise<Map<string, number[]>> {
    const reusable = new Map<string, number[]>();
    const meta = await this.store.loadMeta();
    if (!meta || meta.embeddingModel !== this.options.embeddingModel) {
      return reusable;
    }
    const { embeddingDimensions } = this.options;
    if (embeddingDimensions !== undefined && meta.dimension !== embeddingDimensions) {
      return reusable;
    }

    // exact text, since the content hash ignores case and spacing
    const previousTexts = new Map((await this.store.loadChunks()).map((chunk) => [chunk.id, chunk.text]));
    const previousVectors = new Map(
      (await this.store.loadEmbeddings()).map((entry) => [entry.chunkId, entry.vector])
    );

    for (const chunk of chunks) {
      const vector = previousVectors.get(chunk.id);
      if (vector && previousTexts.get(chunk.id) === chunk.text) {
        reusable.set(chunk.id, vector);
      }
    }
    return reusable;
  }
}

export async function loadSnapshot(store: IndexStore, bm25: Bm25Params): Promise<IndexSnapshot> {
  const persisted = await store.load();
  if (!persisted || persisted.chunks.length === 0) {
    throw new IndexNotBuiltError("No persisted index found; run the index build first");
  }
  return IndexSnapshot.fromPersisted(persisted, bm25);
}
