import type { RetrievedChunk } from "@siteqa/shared";
import { InvalidConfigError } from "../errors.js";
import type { EmbeddingProvider } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import type { IndexSnapshotHolder } from "./IndexSnapshot.js";
import { DEFAULT_RRF_CONSTANT, reciprocalRankFusion } from "./rankFusion.js";

export interface HybridRetrieverOptions {
  topK: number;
  overfetchFactor: number;
  rrfConstant: number;
  lexicalTopK?: number;
  vectorTopK?: number;
}

export const defaultRetrieverOptions: HybridRetrieverOptions = {
  topK: 4,
  overfetchFactor: 3,
  rrfConstant: DEFAULT_RRF_CONSTANT
};

export interface RetrieverLike {
  retrieve(query: string, topK?: number): Promise<RetrievedChunk[]>;
}

export class HybridRetriever implements RetrieverLike {
  private readonly options: HybridRetrieverOptions;

  constructor(
    private readonly holder: IndexSnapshotHolder,
    private readonly embedder: EmbeddingProvider,
    options: Partial<HybridRetrieverOptions> = {}
  ) {
    this.options = { ...defaultRetrieverOptions, ...options };

    const { topK, overfetchFactor, rrfConstant } = this.options;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidConfigError(`Retrieval topK must be a positive integer, got ${topK}`);
    }
    if (!(overfetchFactor >= 1)) {
      throw new InvalidConfigError(`Overfetch factor must be at least 1, got ${overfetchFactor}`);
    }
    if (!(rrfConstant >= 0)) {
      throw new InvalidConfigError(`Fusion constant must be non-negative, got ${rrfConstant}`);
    }
  }

  async retrieve(query: string, topK: number = this.options.topK): Promise<RetrievedChunk[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidConfigError(`Retrieval topK must be a positive integer, got ${topK}`);
    }

    const snapshot = this.holder.current();
    const candidates = Math.ceil(topK * this.options.overfetchFactor);

    const [lexicalHits, vectorHits] = await Promise.all([
      Promise.resolve(snapshot.lexical.search(query, this.options.lexicalTopK ?? candidates)),
      snapshot.vector.search(query, this.embedder, this.options.vectorTopK ?? candidates)
    ]);

    const fused = reciprocalRankFusion([lexicalHits, vectorHits], this.options.rrfConstant);
    const results: RetrievedChunk[] = [];
    for (const hit of fused) {
      if (results.length >= topK) {
        break;
      }
      const chunk = snapshot.getChunk(hit.chunkId);
      if (!chunk) {
        continue;
      }
      results.push({
        chunkId: hit.chunkId,
        score: hit.score,
        chunk,
        lexicalRank: hit.ranks[0] ?? null,
        vectorRank: hit.ranks[1] ?? null
      });
    }

    logger.debug(
      { lexicalHits: lexicalHits.length, vectorHits: vectorHits.length, returned: results.length },
      "Hybrid retrieval finished"
    );
    return results;
  }
}
