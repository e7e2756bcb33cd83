import { escapeHtml } from "../core/impl/snippet.js";
import type { DocumentMetadata, GlobalStats } from "../core/types.js";

export interface ResultRow {
  docId: string;
  title: string;
  relevance: number;
  snippetHtml: string;
}

export interface ResultsView {
  query: string;
  rows: ResultRow[];
  total: number;
  page: number;
  pageSize: number;
}

export interface DocumentView {
  docId: string;
  title: string;
  text: string | undefined;
  metadata: DocumentMetadata | undefined;
}

const STYLE = `
body { font-family: system-ui, sans-serif; max-width: 52rem; margin: 2rem auto; padding: 0 1rem; color: #222; }
form { display: flex; gap: .5rem; margin-bottom: 1.5rem; }
input[type=search] { flex: 1; padding: .4rem; font-size: 1rem; }
.result { margin-bottom: 1.25rem; }
.result .meta { color: #666; font-size: .85rem; }
mark { background: #ffe58a; }
pre { white-space: pre-wrap; }
nav.pages { display: flex; gap: 1rem; }
`;

function layout(title: string, body: string): string {
  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
<style>${STYLE}</style>
</head>
<body>
${body}
</body>
</html>
`;
}

function searchForm(query = ""): string {
  return `<form action="/search" method="get">
<input type="search" name="q" value="${escapeHtml(query)}" placeholder="climate AND (change OR warming)" autofocus>
<button type="submit">Search</button>
</form>`;
}

export function searchHref(query: string, page: number): string {
  return `/search?q=${encodeURIComponent(query)}&page=${page}`;
}

export function documentHref(docId: string): string {
  return `/document?id=${encodeURIComponent(docId)}`;
}

export function homePage(stats: GlobalStats): string {
  return layout(
    "Search",
    `<h1>Search</h1>
${searchForm()}
<p>${stats.totalDocuments} documents, ${stats.distinctTerms} distinct terms, ${stats.totalTokens} tokens indexed.</p>
<p>Combine terms with <code>AND</code>, <code>OR</code> and parentheses. Adjacent terms are joined with <code>AND</code>.</p>`,
  );
}

export function resultsPage(view: ResultsView): string {
  const first = view.total === 0 ? 0 : (view.page - 1) * view.pageSize + 1;
  const last = Math.min(view.total, view.page * view.pageSize);
  const lastPage = Math.max(1, Math.ceil(view.total / view.pageSize));

  const rows = view.rows
    .map(
      (r) => `<div class="result">
<a href="${escapeHtml(documentHref(r.docId))}">${escapeHtml(r.title)}</a>
<div class="meta">${escapeHtml(r.docId)} &middot; relevance ${r.relevance.toFixed(3)}</div>
<div>${r.snippetHtml}</div>
</div>`,
    )
    .join("\n");

  const links: string[] = [];
  if (view.page > 1) links.push(`<a href="${escapeHtml(searchHref(view.query, view.page - 1))}">&larr; previous</a>`);
  if (view.page < lastPage) links.push(`<a href="${escapeHtml(searchHref(view.query, view.page + 1))}">next &rarr;</a>`);

  const summary =
    view.total === 0
      ? `<p>No documents match <strong>${escapeHtml(view.query)}</strong>.</p>`
      : `<p>Results ${first}-${last} of ${view.total} for <strong>${escapeHtml(view.query)}</strong>.</p>`;

  return layout(
    `${view.query} - Search`,
    `${searchForm(view.query)}
${summary}
${rows}
<nav class="pages">${links.join("\n")}</nav>`,
  );
}

export function documentPage(view: DocumentView): string {
  const meta = view.metadata
    ? `<p class="meta">${view.metadata.size} bytes, ${view.metadata.wordCount} words, ${view.metadata.uniqueWords} unique</p>`
    : "";
  const body = view.text === undefined ? "<p>The document text is not available.</p>" : `<pre>${escapeHtml(view.text)}</pre>`;

  return layout(
    view.title,
    `${searchForm()}
<h1>${escapeHtml(view.title)}</h1>
<p class="meta">${escapeHtml(view.docId)}</p>
${meta}
${body}`,
  );
}

export function errorPage(status: number, message: string): string {
  return layout(`${status}`, `${searchForm()}\n<h1>${status}</h1>\n<p>${escapeHtml(message)}</p>`);
}
