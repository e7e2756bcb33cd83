import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** Tokens of this length or shorter are dropped. Defaults to 2. */
  maxIgnoredLength?: number;
}

/**
 * Turns document text into a stream of index terms.
 *
 * Contract notes:
 * - deterministic for given input+options
 * - terms are lowercase
 * - positions count only the tokens that are yielded
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
