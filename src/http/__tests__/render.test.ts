import { describe, expect, it } from "vitest";
import { documentHref, documentPage, errorPage, homePage, resultsPage, searchHref } from "../render.js";

describe("render", () => {
  it("builds encoded links", () => {
    expect(searchHref("a & b", 2)).toBe("/search?q=a%20%26%20b&page=2");
    expect(documentHref("tech/001.txt")).toBe("/document?id=tech%2F001.txt");
  });

  it("shows index totals on the home page", () => {
    const html = homePage({ totalDocuments: 3, totalTokens: 40, distinctTerms: 12 });
    expect(html).toContain("<p>3 documents, 12 distinct terms, 40 tokens indexed.</p>");
  });

  it("summarises an empty result", () => {
    const html = resultsPage({ query: "<cats>", rows: [], total: 0, page: 1, pageSize: 10 });
    expect(html).toContain("<p>No documents match <strong>&lt;cats&gt;</strong>.</p>");
    expect(html).toContain('<nav class="pages"></nav>');
  });

  it("paginates results", () => {
    const html = resultsPage({
      query: "a & b",
      rows: [{ docId: "tech/011.txt", title: "Chips <new>", relevance: 1.23456, snippetHtml: "<mark>a</mark>" }],
      total: 25,
      page: 2,
      pageSize: 10,
    });
    expect(html).toContain("<p>Results 11-20 of 25 for <strong>a &amp; b</strong>.</p>");
    expect(html).toContain('<a href="/document?id=tech%2F011.txt">Chips &lt;new&gt;</a>');
    expect(html).toContain("tech/011.txt &middot; relevance 1.235");
    expect(html).toContain("<div><mark>a</mark></div>");
    expect(html).toContain('<a href="/search?q=a%20%26%20b&amp;page=1">&larr; previous</a>');
    expect(html).toContain('<a href="/search?q=a%20%26%20b&amp;page=3">next &rarr;</a>');
  });

  it("has no next link on the last page", () => {
    const html = resultsPage({ query: "x", rows: [], total: 25, page: 3, pageSize: 10 });
    expect(html).toContain("<p>Results 21-25 of 25 for <strong>x</strong>.</p>");
    expect(html).not.toContain("next &rarr;");
  });

  it("renders a document with escaped text", () => {
    const html = documentPage({
      docId: "tech/001.txt",
      title: "Big News",
      text: "Big News\n<b>bold</b>",
      metadata: { size: 20, wordCount: 3, uniqueWords: 3 },
    });
    expect(html).toContain("<title>Big News</title>");
    expect(html).toContain("<pre>Big News\n&lt;b&gt;bold&lt;/b&gt;</pre>");
    expect(html).toContain('<p class="meta">20 bytes, 3 words, 3 unique</p>');
  });

  it("notes a document whose text is missing", () => {
    const html = documentPage({ docId: "d", title: "d", text: undefined, metadata: undefined });
    expect(html).toContain("<p>The document text is not available.</p>");
  });

  it("renders error pages", () => {
    expect(errorPage(404, "No document with id <x>.")).toContain("<h1>404</h1>\n<p>No document with id &lt;x&gt;.</p>");
  });
});
