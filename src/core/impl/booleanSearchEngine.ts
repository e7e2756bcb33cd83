import { noopLogger, type Logger } from "../../logger.js";
import type { SearchResult } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { Ranker } from "../ranker.js";
import { compileQuery, evaluatePostfix } from "./booleanQuery.js";
import { DEFAULT_SNIPPET_WINDOW, buildSnippet } from "./snippet.js";

export interface SearchOptions {
  /** characters of context on each side of the first match */
  snippetWindow?: number;
}

export interface EngineDeps {
  index: InvertedIndex;
  ranker: Ranker;
  logger?: Logger;
}

/**
 * Boolean retrieval over an InvertedIndex: compile, evaluate, rank, snippet.
 * Holds no state of its own beyond the injected dependencies.
 */
export class BooleanSearchEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: EngineDeps) {
    this.logger = deps.logger ?? noopLogger;
  }

  search(rawQuery: string, options?: SearchOptions): SearchResult[] {
    const { index, ranker } = this.deps;
    if (!index.isLoaded()) return [];

    const window = options?.snippetWindow ?? DEFAULT_SNIPPET_WINDOW;

    try {
      const compiled = compileQuery(rawQuery);
      if (!compiled.ok) return [];

      const candidates = evaluatePostfix(compiled.postfix, (term) => index.postings(term).keys());
      const hits = ranker.rank(candidates, compiled.terms, { index });

      return hits.map((hit) => ({
        ...hit,
        snippetHtml: buildSnippet(index.text(hit.docId), compiled.terms, window),
      }));
    } catch (e) {
      this.logger.error(`search failed for query "${rawQuery}"`, e);
      return [];
    }
  }
}
