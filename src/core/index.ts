export type * from "./types.js";
export type * from "./prefixTree.js";
export type * from "./invertedIndex.js";
export type * from "./tokenizer.js";
export type * from "./ranker.js";
export type * from "./query.js";
export * from "./errors.js";
export * from "./impl/index.js";
