import type { Bm25Params, Chunk, RankedHit } from "@siteqa/shared";
import { InvalidConfigError } from "../errors.js";
import { byScoreThenId } from "../utils/text.js";
import { tokenize } from "./tokenizer.js";

export const defaultBm25Params: Bm25Params = { k1: 1.5, b: 0.75 };

interface Posting {
  chunkId: string;
  termFrequency: number;
}

export interface LexicalIndexStats {
  documentCount: number;
  vocabularySize: number;
  averageLength: number;
}

/**
 * Okapi BM25 over chunk texts. Built once from a chunk list and never mutated;
 * a rebuild produces a new instance.
 */
export class LexicalIndex {
  private readonly postings = new Map<string, Posting[]>();
  private readonly lengths = new Map<string, number>();
  private readonly averageLength: number;

  private constructor(
    chunks: readonly Chunk[],
    private readonly params: Bm25Params,
    private readonly tokenizer: (text: string) => string[]
  ) {
    let totalLength = 0;

    for (const chunk of chunks) {
      const terms = this.tokenizer(chunk.text);
      this.lengths.set(chunk.id, terms.length);
      totalLength += terms.length;

      const frequencies = new Map<string, number>();
      for (const term of terms) {
        frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
      }
      for (const [term, termFrequency] of frequencies) {
        const list = this.postings.get(term);
        if (list) {
          list.push({ chunkId: chunk.id, termFrequency });
        } else {
          this.postings.set(term, [{ chunkId: chunk.id, termFrequency }]);
        }
      }
    }

    this.averageLength = chunks.length > 0 ? totalLength / chunks.length : 0;
  }

  static build(
    chunks: readonly Chunk[],
    params: Bm25Params = defaultBm25Params,
    tokenizer: (text: string) => string[] = tokenize
  ): LexicalIndex {
    if (!(params.k1 >= 0) || !(params.b >= 0 && params.b <= 1)) {
      throw new InvalidConfigError(`BM25 parameters out of range: k1=${params.k1}, b=${params.b}`);
    }
    return new LexicalIndex(chunks, params, tokenizer);
  }

  get size(): number {
    return this.lengths.size;
  }

  stats(): LexicalIndexStats {
    return {
      documentCount: this.lengths.size,
      vocabularySize: this.postings.size,
      averageLength: this.averageLength
    };
  }

  idf(term: string): number {
    const documentFrequency = this.postings.get(term)?.length ?? 0;
    const total = this.lengths.size;
    return Math.log(1 + (total - documentFrequency + 0.5) / (documentFrequency + 0.5));
  }

  /** Chunks with a positive score, best first; equal scores ordered by chunk id. */
  search(query: string, topK: number): RankedHit[] {
    if (topK <= 0 || this.lengths.size === 0) {
      return [];
    }

    const terms = new Set(this.tokenizer(query));
    const scores = new Map<string, number>();
    const { k1, b } = this.params;

    for (const term of terms) {
      const postings = this.postings.get(term);
      if (!postings) {
        continue;
      }
      const idf = this.idf(term);
      for (const { chunkId, termFrequency } of postings) {
        const length = this.lengths.get(chunkId) ?? 0;
        const norm = this.averageLength > 0 ? length / this.averageLength : 0;
        const weight =
          (idf * termFrequency * (k1 + 1)) / (termFrequency + k1 * (1 - b + b * norm));
        scores.set(chunkId, (scores.get(chunkId) ?? 0) + weight);
      }
    }

    return [...scores]
      .filter(([, score]) => score > 0)
      .map(([chunkId, score]) => ({ chunkId, score }))
      .sort(byScoreThenId)
      .slice(0, topK);
  }
}
