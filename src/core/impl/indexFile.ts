import { z } from "zod";

import { IndexFormatError } from "../errors.js";
import type { DocId, DocumentMetadata, GlobalStats, Term } from "../types.js";

/** Everything the flat index file carries. */
export interface IndexSnapshot {
  stats: GlobalStats;
  metadata: Map<DocId, DocumentMetadata>;
  /** in ingestion order */
  documents: DocId[];
  postings: Map<Term, Map<DocId, number>>;
}

const SECTIONS = {
  stats: "# GLOBAL_STATS",
  metadata: "# DOCUMENT_METADATA",
  documents: "# DOCUMENTS",
  postings: "# POSTINGS",
} as const;

type Section = keyof typeof SECTIONS;

const SECTION_ORDER: readonly Section[] = ["stats", "metadata", "documents", "postings"];

const HEADER_TO_SECTION = new Map<string, Section>(SECTION_ORDER.map((s) => [SECTIONS[s], s]));

const count = z.number().int().nonnegative();

const statsSchema = z.object({
  total_documents: count.default(0),
  total_tokens: count.default(0),
  distinct_terms: count.default(0),
});

const metadataSchema = z.record(
  z.string(),
  z.object({
    size: count,
    word_count: count,
    unique_words: count,
  }),
);

const documentsSchema = z.array(z.string().min(1));

function sortedKeys<K extends string>(keys: Iterable<K>): K[] {
  return Array.from(keys).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function serializeIndex(snapshot: IndexSnapshot): string {
  const lines: string[] = [];

  lines.push(SECTIONS.stats);
  lines.push(
    JSON.stringify({
      total_documents: snapshot.stats.totalDocuments,
      total_tokens: snapshot.stats.totalTokens,
      distinct_terms: snapshot.stats.distinctTerms,
    }),
  );

  lines.push(SECTIONS.metadata);
  const metadata: Record<string, { size: number; word_count: number; unique_words: number }> = {};
  for (const [docId, m] of snapshot.metadata) {
    metadata[docId] = { size: m.size, word_count: m.wordCount, unique_words: m.uniqueWords };
  }
  lines.push(JSON.stringify(metadata));

  lines.push(SECTIONS.documents);
  lines.push(JSON.stringify(snapshot.documents));

  lines.push(SECTIONS.postings);
  for (const term of sortedKeys(snapshot.postings.keys())) {
    const docs = snapshot.postings.get(term);
    if (!docs || docs.size === 0) continue;
    const pairs = sortedKeys(docs.keys()).map((docId) => `${docId}:${docs.get(docId) ?? 0}`);
    lines.push(`${term}|${pairs.join(";")}`);
  }

  return lines.join("\n") + "\n";
}

function parseJsonLine<S extends z.ZodTypeAny>(schema: S, line: string, lineNo: number): z.infer<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    throw new IndexFormatError(`invalid JSON (${e instanceof Error ? e.message : String(e)})`, lineNo);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new IndexFormatError(`unexpected value${where}: ${issue?.message ?? "invalid"}`, lineNo);
  }
  return parsed.data;
}

function parsePostingsLine(line: string, lineNo: number): { term: Term; docs: Map<DocId, number> } {
  const bar = line.indexOf("|");
  if (bar <= 0) throw new IndexFormatError("postings line must look like term|doc:tf;...", lineNo);

  const term = line.slice(0, bar);
  const serial = line.slice(bar + 1);
  const docs = new Map<DocId, number>();
  if (!serial) return { term, docs };

  for (const pair of serial.split(";")) {
    const colon = pair.lastIndexOf(":");
    if (colon <= 0) throw new IndexFormatError(`malformed posting "${pair}"`, lineNo);
    const tf = pair.slice(colon + 1);
    if (!/^[0-9]+$/.test(tf) || Number(tf) < 1) {
      throw new IndexFormatError(`term frequency must be a positive integer, got "${tf}"`, lineNo);
    }
    docs.set(pair.slice(0, colon), Number(tf));
  }

  return { term, docs };
}

/**
 * Parses the flat index format written by `serializeIndex`.
 * Throws IndexFormatError on any structural problem.
 */
export function parseIndexFile(text: string): IndexSnapshot {
  const seen = new Set<Section>();
  const jsonDone = new Set<Section>();
  let section: Section | undefined;

  let stats: z.infer<typeof statsSchema> = { total_documents: 0, total_tokens: 0, distinct_terms: 0 };
  let metadata: z.infer<typeof metadataSchema> = {};
  let documents: DocId[] = [];
  const postings = new Map<Term, Map<DocId, number>>();

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const lineNo = i + 1;
    if (!line.trim()) continue;

    if (line.startsWith("#")) {
      const next = HEADER_TO_SECTION.get(line.trimEnd());
      if (!next) throw new IndexFormatError(`unknown section header "${line}"`, lineNo);
      if (seen.has(next)) throw new IndexFormatError(`section "${line}" appears twice`, lineNo);
      seen.add(next);
      section = next;
      continue;
    }

    if (!section) throw new IndexFormatError("data before the first section header", lineNo);

    if (section === "postings") {
      const { term, docs } = parsePostingsLine(line, lineNo);
      if (docs.size === 0) continue;
      const existing = postings.get(term);
      if (existing) {
        for (const [docId, tf] of docs) existing.set(docId, tf);
      } else {
        postings.set(term, docs);
      }
      continue;
    }

    if (jsonDone.has(section)) throw new IndexFormatError(`${SECTIONS[section]} holds more than one line`, lineNo);
    jsonDone.add(section);

    if (section === "stats") stats = parseJsonLine(statsSchema, line, lineNo);
    else if (section === "metadata") metadata = parseJsonLine(metadataSchema, line, lineNo);
    else documents = parseJsonLine(documentsSchema, line, lineNo);
  }

  for (const s of SECTION_ORDER) {
    if (!seen.has(s)) throw new IndexFormatError(`missing section ${SECTIONS[s]}`);
  }

  return {
    stats: {
      totalDocuments: stats.total_documents,
      totalTokens: stats.total_tokens,
      distinctTerms: stats.distinct_terms,
    },
    metadata: new Map(
      Object.entries(metadata).map(([docId, m]) => [
        docId,
        { size: m.size, wordCount: m.word_count, uniqueWords: m.unique_words },
      ]),
    ),
    documents,
    postings,
  };
}
