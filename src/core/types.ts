/** Shared core types used by module contracts. */

/** Corpus-relative POSIX path of a document, e.g. `business/001.txt`. */
export type DocId = string;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  startOffset: number;
  endOffset: number;
}

export interface DocumentMetadata {
  /** UTF-8 byte length of the stored text. */
  size: number;
  wordCount: number;
  uniqueWords: number;
}

export interface GlobalStats {
  totalDocuments: number;
  totalTokens: number;
  distinctTerms: number;
}

export interface SearchHit {
  docId: DocId;
  relevance: number;
  /** z-score of each query term in this document, in query-term order. */
  zScores: number[];
}

export interface SearchResult extends SearchHit {
  snippetHtml: string;
}
