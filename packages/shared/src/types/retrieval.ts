import type { Chunk } from "./corpus.js";

export interface RankedHit {
  chunkId: string;
  score: number;
}

export interface RetrievedChunk {
  chunkId: string;
  score: number;
  chunk: Chunk;
  lexicalRank: number | null;
  vectorRank: number | null;
}

export interface EmbeddingEntry {
  chunkId: string;
  vector: number[];
}

export interface Bm25Params {
  k1: number;
  b: number;
}
