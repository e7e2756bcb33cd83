import type { DocId, DocumentMetadata, GlobalStats, Term } from "./types.js";
import type { PrefixCompletion } from "./prefixTree.js";

/**
 * Inverted index mapping term -> (document -> term frequency).
 *
 * Contract notes:
 * - mutated only by ingestion, `load` and `reset`; never concurrently
 * - `postings` returns a copy, empty for unknown terms
 * - a term with no postings behaves exactly like an unknown term
 */
export interface InvertedIndex {
  /** Not idempotent: ingesting the same id twice adds its frequencies twice. */
  ingestDocument(docId: DocId, text: string): void;
  /** Returns the number of documents ingested. Throws NotFoundError when `root` is missing. */
  ingestCorpus(root: string): number;

  postings(term: Term): Map<DocId, number>;
  zscore(term: Term, docId: DocId): number;
  complete(prefix: string, limit?: number): PrefixCompletion[];

  text(docId: DocId): string | undefined;
  title(docId: DocId): string;
  metadata(docId: DocId): DocumentMetadata | undefined;
  /** in ingestion order */
  documentIds(): DocId[];
  stats(): GlobalStats;
  /** True once anything was ingested or a load succeeded, until the next reset. */
  isLoaded(): boolean;

  save(path: string): void;
  /** Replaces the whole index. Returns false when the file is absent or malformed; the index is then empty. */
  load(path: string, corpusRoot: string): boolean;
  reset(): void;
}
