import type { RankedHit } from "@siteqa/shared";
import { byScoreThenId } from "../utils/text.js";

export const DEFAULT_RRF_CONSTANT = 60;

export interface FusedHit {
  chunkId: string;
  score: number;
  /** 1-based rank in each input list, `null` where the chunk is absent. */
  ranks: Array<number | null>;
}

/**
 * Reciprocal-rank fusion: each list contributes `1 / (rank + constant)` for the chunks
 * it contains. Raw scores are ignored, so lists on different scales combine directly.
 */
export function reciprocalRankFusion(
  lists: ReadonlyArray<readonly RankedHit[]>,
  constant: number = DEFAULT_RRF_CONSTANT
): FusedHit[] {
  const fused = new Map<string, FusedHit>();

  lists.forEach((list, listIndex) => {
    list.forEach((hit, position) => {
      let entry = fused.get(hit.chunkId);
      if (!entry) {
        entry = { chunkId: hit.chunkId, score: 0, ranks: lists.map(() => null) };
        fused.set(hit.chunkId, entry);
      }
      // a chunk listed twice in one list keeps its best rank
      if (entry.ranks[listIndex] !== null) {
        return;
      }
      const rank = position + 1;
      entry.ranks[listIndex] = rank;
      entry.score += 1 / (rank + constant);
    });
  });

  return [...fused.values()].sort(byScoreThenId);
}
