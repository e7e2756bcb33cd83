import type { DocId, SearchHit, Term } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";

export interface RankContext {
  index: Pick<InvertedIndex, "zscore">;
}

/**
 * Scores the documents a boolean query matched.
 *
 * Output is sorted by relevance descending; ties are ordered by docId.
 */
export interface Ranker {
  rank(candidates: Iterable<DocId>, queryTerms: Term[], ctx: RankContext): SearchHit[];
}
