import type { DocId, Term } from "../types.js";
import type { CompileResult, DocumentLookup, Operator, PostfixToken, QueryToken } from "../query.js";

const PRECEDENCE: Record<Operator, number> = { OR: 1, AND: 2 };

const NON_WORD = /[^\p{L}\p{N}_\s]/gu;

function classify(raw: string): QueryToken | undefined {
  const upper = raw.toUpperCase();
  if (upper === "AND" || upper === "OR") return { kind: "op", op: upper };
  if (raw === "(") return { kind: "lparen" };
  if (raw === ")") return { kind: "rparen" };

  const term = raw.toLowerCase().replace(NON_WORD, "");
  return term ? { kind: "term", term } : undefined;
}

/**
 * Splits a free-text query into terms, operators and parentheses.
 *
 * A `"` toggles literal mode: inside quotes whitespace and parentheses are
 * ordinary characters. Quotes also end the token being read.
 */
export function tokenizeQuery(query: string): QueryToken[] {
  const raw: string[] = [];
  let current = "";
  let quoted = false;

  const flush = () => {
    const t = current.trim();
    if (t) raw.push(t);
    current = "";
  };

  for (const ch of query) {
    if (ch === '"') {
      quoted = !quoted;
      flush();
    } else if ((ch === "(" || ch === ")") && !quoted) {
      flush();
      raw.push(ch);
    } else if (/\s/.test(ch) && !quoted) {
      flush();
    } else {
      current += ch;
    }
  }
  flush();

  const out: QueryToken[] = [];
  for (const r of raw) {
    const tok = classify(r);
    if (tok) out.push(tok);
  }
  return out;
}

/** Inserts AND between a term or `)` and a following term or `(`. */
export function insertImplicitAnd(tokens: QueryToken[]): QueryToken[] {
  const out: QueryToken[] = [];
  let prev: QueryToken | undefined;

  for (const tok of tokens) {
    const endsOperand = prev?.kind === "term" || prev?.kind === "rparen";
    const startsOperand = tok.kind === "term" || tok.kind === "lparen";
    if (endsOperand && startsOperand) out.push({ kind: "op", op: "AND" });
    out.push(tok);
    prev = tok;
  }
  return out;
}

/**
 * Shunting-yard conversion. Unmatched parentheses are tolerated: a stray `)`
 * drains the stack, a stray `(` is dropped at the end.
 */
export function toPostfix(tokens: QueryToken[]): PostfixToken[] {
  const output: PostfixToken[] = [];
  const stack: Array<Extract<QueryToken, { kind: "op" } | { kind: "lparen" }>> = [];

  for (const tok of tokens) {
    switch (tok.kind) {
      case "term":
        output.push(tok);
        break;
      case "lparen":
        stack.push(tok);
        break;
      case "rparen": {
        let top = stack.pop();
        while (top && top.kind === "op") {
          output.push(top);
          top = stack.pop();
        }
        break;
      }
      case "op": {
        let top = stack[stack.length - 1];
        while (top && top.kind === "op" && PRECEDENCE[top.op] >= PRECEDENCE[tok.op]) {
          output.push(top);
          stack.pop();
          top = stack[stack.length - 1];
        }
        stack.push(tok);
        break;
      }
    }
  }

  for (let top = stack.pop(); top; top = stack.pop()) {
    if (top.kind === "op") output.push(top);
  }
  return output;
}

/**
 * Evaluates a postfix expression over document sets. An operator with fewer
 * than two operands available is skipped; an empty stack yields no documents.
 */
export function evaluatePostfix(postfix: PostfixToken[], lookup: DocumentLookup): Set<DocId> {
  const stack: Array<Set<DocId>> = [];

  for (const tok of postfix) {
    if (tok.kind === "term") {
      stack.push(new Set(lookup(tok.term)));
      continue;
    }
    if (stack.length < 2) continue;

    const b = stack.pop() ?? new Set<DocId>();
    const a = stack.pop() ?? new Set<DocId>();
    if (tok.op === "AND") {
      stack.push(new Set([...a].filter((d) => b.has(d))));
    } else {
      stack.push(new Set([...a, ...b]));
    }
  }

  return stack[stack.length - 1] ?? new Set();
}

export function queryTerms(tokens: QueryToken[]): Term[] {
  const terms: Term[] = [];
  for (const tok of tokens) if (tok.kind === "term") terms.push(tok.term);
  return terms;
}

export function compileQuery(query: string): CompileResult {
  const tokens = tokenizeQuery(query);
  const terms = queryTerms(tokens);
  if (terms.length === 0) return { ok: false, reason: "empty" };
  return { ok: true, postfix: toPostfix(insertImplicitAnd(tokens)), terms };
}
