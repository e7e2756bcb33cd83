import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

function isAlphaNum(code: number): boolean {
  return (
    (code >= 48 && code <= 57) ||
    (code >= 65 && code <= 90) ||
    (code >= 97 && code <= 122)
  );
}

/**
 * ASCII tokenizer:
 * - splits on anything that is not [A-Za-z0-9]
 * - lowercases
 * - drops short tokens (1-2 characters by default)
 */
export class SimpleTokenizer implements Tokenizer {
  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const maxIgnored = options?.maxIgnoredLength ?? 2;

    const n = text.length;
    let i = 0;
    let position = 0;

    while (i < n) {
      // skip separators
      while (i < n && !isAlphaNum(text.charCodeAt(i))) i++;
      if (i >= n) break;

      const start = i;
      while (i < n && isAlphaNum(text.charCodeAt(i))) i++;
      const end = i;

      if (end - start <= maxIgnored) continue;

      yield { term: text.slice(start, end).toLowerCase(), position, startOffset: start, endOffset: end };
      position++;
    }
  }
}
