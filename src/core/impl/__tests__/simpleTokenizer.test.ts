import { describe, expect, it } from "vitest";
import { SimpleTokenizer } from "../simpleTokenizer.js";

describe("SimpleTokenizer", () => {
  it("lowercases, splits on punctuation and drops short tokens", () => {
    const tokens = Array.from(new SimpleTokenizer().tokenize("Hello, World! an A1 x42 it's"));
    expect(tokens).toEqual([
      { term: "hello", position: 0, startOffset: 0, endOffset: 5 },
      { term: "world", position: 1, startOffset: 7, endOffset: 12 },
      { term: "x42", position: 2, startOffset: 20, endOffset: 23 },
    ]);
  });

  it("treats non-ASCII letters as separators", () => {
    const terms = Array.from(new SimpleTokenizer().tokenize("café_latte naïve"), (t) => t.term);
    expect(terms).toEqual(["caf", "latte"]);
  });

  it("honours a custom minimum length", () => {
    const terms = Array.from(new SimpleTokenizer().tokenize("a bb ccc", { maxIgnoredLength: 0 }), (t) => t.term);
    expect(terms).toEqual(["a", "bb", "ccc"]);
  });
});
