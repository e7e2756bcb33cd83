import type { Term } from "../types.js";

export const DEFAULT_SNIPPET_WINDOW = 80;
const ELLIPSIS = "...";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive alternation of the distinct non-empty terms, longest first. */
function termPattern(terms: Term[], flags: string): RegExp | undefined {
  const unique = Array.from(new Set(terms.filter((t) => t.length > 0))).sort((a, b) => b.length - a.length);
  return unique.length ? new RegExp(unique.map(escapeRegExp).join("|"), flags) : undefined;
}

/**
 * Wraps every case-insensitive occurrence of any term in `<mark>`, escaping
 * the rest. One pass, longest term first, so marks never nest.
 */
export function highlight(excerpt: string, terms: Term[]): string {
  const pattern = termPattern(terms, "gi");
  if (!pattern) return escapeHtml(excerpt);

  let out = "";
  let last = 0;

  for (const m of excerpt.matchAll(pattern)) {
    const start = m.index ?? 0;
    out += escapeHtml(excerpt.slice(last, start)) + "<mark>" + escapeHtml(m[0]) + "</mark>";
    last = start + m[0].length;
  }
  return out + escapeHtml(excerpt.slice(last));
}

/** Earliest case-insensitive occurrence of any term, as a UTF-16 index and the matched text. */
function firstMatch(text: string, terms: Term[]): { index: number; match: string } | undefined {
  const m = termPattern(terms, "i")?.exec(text);
  return m ? { index: m.index, match: m[0] } : undefined;
}

/**
 * HTML excerpt around the earliest occurrence of any query term: `window`
 * characters on each side, with ellipses where the text was cut. Without
 * an occurrence, the first `2 * window` characters. Characters are code
 * points, so a cut never splits a surrogate pair.
 */
export function buildSnippet(text: string | undefined, terms: Term[], window: number = DEFAULT_SNIPPET_WINDOW): string {
  if (!text) return "";

  const chars = Array.from(text);
  const found = firstMatch(text, terms);

  if (!found) {
    const head = chars.slice(0, 2 * window).join("");
    return escapeHtml(head) + (chars.length > 2 * window ? ELLIPSIS : "");
  }

  const pos = Array.from(text.slice(0, found.index)).length;
  const start = Math.max(0, pos - window);
  const end = Math.min(chars.length, pos + Array.from(found.match).length + window);

  let snippet = highlight(chars.slice(start, end).join(""), terms);
  if (start > 0) snippet = ELLIPSIS + snippet;
  if (end < chars.length) snippet += ELLIPSIS;
  return snippet;
}
