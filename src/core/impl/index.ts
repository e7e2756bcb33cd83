export { RadixTree } from "./radixTree.js";
export { SimpleTokenizer } from "./simpleTokenizer.js";
export { MemoryInvertedIndex, type MemoryInvertedIndexOptions } from "./memoryInvertedIndex.js";
export { ZScoreRanker } from "./zScoreRanker.js";
export { BooleanSearchEngine, type EngineDeps, type SearchOptions } from "./booleanSearchEngine.js";
export {
  compileQuery,
  evaluatePostfix,
  insertImplicitAnd,
  queryTerms,
  toPostfix,
  tokenizeQuery,
} from "./booleanQuery.js";
export { DEFAULT_SNIPPET_WINDOW, buildSnippet, escapeHtml, highlight } from "./snippet.js";
export { parseIndexFile, serializeIndex, type IndexSnapshot } from "./indexFile.js";
export { DEFAULT_CATEGORIES, listCorpusFiles, resolveDocumentPath, type CorpusFile } from "./corpus.js";
