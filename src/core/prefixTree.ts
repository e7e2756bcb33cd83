import type { DocId, Term } from "./types.js";

export interface PrefixCompletion {
  term: Term;
  /** number of documents containing the term */
  weight: number;
}

/** Read-only view of one node, for inspection and tests. */
export interface PrefixTreeNodeView {
  terminal: boolean;
  documents: DocId[];
  /** edge label -> child, labels in ascending order */
  children: Array<{ label: string; node: PrefixTreeNodeView }>;
}

/**
 * Compact prefix tree mapping terms to the documents that contain them.
 *
 * Contract notes:
 * - sibling edge labels never share a non-empty prefix
 * - every non-root node is terminal or has at least one child
 */
export interface PrefixTree {
  insert(term: Term, docId: DocId): void;
  /** Returns false when the term or the document was not recorded. */
  remove(term: Term, docId: DocId): boolean;
  has(term: Term): boolean;
  documents(term: Term): ReadonlySet<DocId>;

  /** Returns up to `limit` terms that share the prefix, most documents first. */
  complete(prefix: string, limit?: number): PrefixCompletion[];

  nodeCount(): number;
  view(): PrefixTreeNodeView;
}
