import type { DocId, Term } from "./types.js";

export type Operator = "AND" | "OR";

export type QueryToken =
  | { kind: "term"; term: Term }
  | { kind: "op"; op: Operator }
  | { kind: "lparen" }
  | { kind: "rparen" };

/** Postfix form: operands and operators only, no parentheses. */
export type PostfixToken = Extract<QueryToken, { kind: "term" } | { kind: "op" }>;

export type CompileResult =
  | { ok: true; postfix: PostfixToken[]; terms: Term[] }
  | { ok: false; reason: "empty" };

/** Resolves a term to the documents that contain it. */
export type DocumentLookup = (term: Term) => Iterable<DocId>;
