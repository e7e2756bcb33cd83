import type { DocId, SearchHit, Term } from "../types.js";
import type { RankContext, Ranker } from "../ranker.js";

/**
 * Relevance is the mean of the non-zero z-scores of the query terms.
 *
 * A term that is absent from the document and a term whose frequency sits
 * exactly on the mean both score 0 and are left out of the mean alike.
 */
export class ZScoreRanker implements Ranker {
  rank(candidates: Iterable<DocId>, queryTerms: Term[], ctx: RankContext): SearchHit[] {
    const hits: SearchHit[] = [];

    for (const docId of candidates) {
      const zScores = queryTerms.map((t) => ctx.index.zscore(t, docId));
      const nonZero = zScores.filter((z) => z !== 0);
      const relevance = nonZero.length ? nonZero.reduce((s, z) => s + z, 0) / nonZero.length : 0;
      hits.push({ docId, relevance, zScores });
    }

    hits.sort((a, b) => b.relevance - a.relevance || (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0));
    return hits;
  }
}
