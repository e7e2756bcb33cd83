import { describe, expect, it } from "vitest";
import { buildSnippet, escapeHtml, highlight } from "../snippet.js";

describe("highlight", () => {
  it("marks every occurrence, keeping the original case", () => {
    expect(highlight("Dogs like dogs", ["dogs"])).toBe("<mark>Dogs</mark> like <mark>dogs</mark>");
  });

  it("prefers the longest term and never nests marks", () => {
    expect(highlight("concatenate cats", ["cat", "cats"])).toBe("con<mark>cat</mark>enate <mark>cats</mark>");
  });

  it("does not touch the markup it inserts", () => {
    expect(highlight("mark the market", ["mark"])).toBe("<mark>mark</mark> the <mark>mark</mark>et");
  });

  it("escapes the text around matches", () => {
    expect(highlight("a <b> & fox", ["fox"])).toBe("a &lt;b&gt; &amp; <mark>fox</mark>");
    expect(highlight("1+1 (sum)", [])).toBe("1+1 (sum)");
  });
});

describe("buildSnippet", () => {
  it("returns short text whole", () => {
    expect(buildSnippet("the quick fox", ["fox"])).toBe("the quick <mark>fox</mark>");
  });

  it("cuts a window around the match", () => {
    const text = "x".repeat(10) + " fox " + "y".repeat(10);
    expect(buildSnippet(text, ["fox"], 5)).toBe("...xxxx <mark>fox</mark> yyyy...");
  });

  it("centres on the earliest matching term", () => {
    expect(buildSnippet("dogs chase cats", ["cats", "dogs"], 3)).toBe("<mark>dogs</mark> ch...");
  });

  it("falls back to the start of the text", () => {
    expect(buildSnippet("abcdefgh", ["zzz"], 3)).toBe("abcdef...");
    expect(buildSnippet("abc", ["zzz"], 3)).toBe("abc");
  });

  it("keeps the window on the match when lowercasing changes length", () => {
    expect(buildSnippet("İ".repeat(30) + " the fox ran", ["fox"], 10)).toBe("...İİİİİ the <mark>fox</mark> ran");
  });

  it("counts astral characters as one and never splits them", () => {
    expect(buildSnippet("a" + "😀".repeat(10), ["zzz"], 1)).toBe("a😀...");
    expect(buildSnippet("😀😀😀 fox 😀😀😀", ["fox"], 2)).toBe("...😀 <mark>fox</mark> 😀...");
  });

  it("is empty without text", () => {
    expect(buildSnippet(undefined, ["fox"])).toBe("");
    expect(buildSnippet("", ["fox"])).toBe("");
  });
});

describe("escapeHtml", () => {
  it("escapes the five special characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
  });
});
