import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { noopLogger, type Logger } from "../../logger.js";
import { NotFoundError, describeError } from "../errors.js";
import type { DocId, DocumentMetadata, GlobalStats, Term } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { PrefixCompletion, PrefixTree } from "../prefixTree.js";
import type { Tokenizer } from "../tokenizer.js";
import { DEFAULT_CATEGORIES, listCorpusFiles, resolveDocumentPath } from "./corpus.js";
import { parseIndexFile, serializeIndex, type IndexSnapshot } from "./indexFile.js";
import { RadixTree } from "./radixTree.js";
import { SimpleTokenizer } from "./simpleTokenizer.js";

export interface MemoryInvertedIndexOptions {
  tokenizer?: Tokenizer;
  createTree?: () => PrefixTree;
  /** category folders walked by `ingestCorpus` */
  categories?: readonly string[];
  logger?: Logger;
}

function emptyStats(): GlobalStats {
  return { totalDocuments: 0, totalTokens: 0, distinctTerms: 0 };
}

/**
 * In-memory inverted index.
 *
 * Data structure:
 * - term -> (docId -> tf)
 * - prefix tree of term -> docIds (presence only)
 * - docId -> raw text / metadata, plus ingestion order
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private readonly tokenizer: Tokenizer;
  private readonly createTree: () => PrefixTree;
  private readonly categories: readonly string[];
  private readonly logger: Logger;

  private tree: PrefixTree;
  private termToDocMap = new Map<Term, Map<DocId, number>>();
  private texts = new Map<DocId, string>();
  private docMeta = new Map<DocId, DocumentMetadata>();
  private order: DocId[] = [];
  private totals: GlobalStats = emptyStats();
  private loaded = false;

  constructor(opts: MemoryInvertedIndexOptions = {}) {
    this.tokenizer = opts.tokenizer ?? new SimpleTokenizer();
    this.createTree = opts.createTree ?? (() => new RadixTree());
    this.categories = opts.categories ?? DEFAULT_CATEGORIES;
    this.logger = opts.logger ?? noopLogger;
    this.tree = this.createTree();
  }

  ingestDocument(docId: DocId, text: string): void {
    const termFreqs = new Map<Term, number>();
    let length = 0;

    for (const tok of this.tokenizer.tokenize(text)) {
      length++;
      termFreqs.set(tok.term, (termFreqs.get(tok.term) ?? 0) + 1);
    }

    if (!this.docMeta.has(docId)) this.order.push(docId);
    this.texts.set(docId, text);
    this.docMeta.set(docId, {
      size: Buffer.byteLength(text, "utf8"),
      wordCount: length,
      uniqueWords: termFreqs.size,
    });

    for (const [term, tf] of termFreqs) {
      this.tree.insert(term, docId);

      let docMap = this.termToDocMap.get(term);
      if (!docMap) {
        docMap = new Map();
        this.termToDocMap.set(term, docMap);
      }
      docMap.set(docId, (docMap.get(docId) ?? 0) + tf);
    }

    this.totals.totalDocuments++;
    this.totals.totalTokens += length;
    this.totals.distinctTerms = this.termToDocMap.size;
    this.loaded = true;
  }

  ingestCorpus(root: string): number {
    if (!existsSync(root)) throw new NotFoundError(root, "corpus root");

    this.logger.info(`indexing corpus at ${root}`);
    let docs = 0;

    for (const file of listCorpusFiles(root, this.categories, this.logger)) {
      if (this.docMeta.has(file.docId)) {
        this.logger.warn(`already indexed, skipping ${file.docId}`);
        continue;
      }

      let content: string;
      try {
        content = readFileSync(file.path, "utf8").trim();
      } catch (e) {
        this.logger.warn(`could not read ${file.path}: ${describeError(e)}`);
        continue;
      }
      if (!content) continue;

      this.ingestDocument(file.docId, content);
      docs++;
      if (docs % 100 === 0) this.logger.debug(`documents processed: ${docs}`);
    }

    this.loaded = true;
    this.logger.info(`indexed ${docs} documents, ${this.termToDocMap.size} distinct terms`);
    return docs;
  }

  postings(term: Term): Map<DocId, number> {
    return new Map(this.termToDocMap.get(term));
  }

  /**
   * (tf - mean) / stddev, both taken over the documents that contain the term.
   * 0 when the term is unknown or every document has the same frequency.
   */
  zscore(term: Term, docId: DocId): number {
    const docMap = this.termToDocMap.get(term);
    if (!docMap || docMap.size === 0) return 0;

    const n = docMap.size;
    let sum = 0;
    for (const tf of docMap.values()) sum += tf;
    const mean = sum / n;

    let squares = 0;
    for (const tf of docMap.values()) squares += (tf - mean) ** 2;
    const variance = squares / n;
    if (variance <= 0) return 0;

    return ((docMap.get(docId) ?? 0) - mean) / Math.sqrt(variance);
  }

  complete(prefix: string, limit?: number): PrefixCompletion[] {
    return this.tree.complete(prefix, limit);
  }

  text(docId: DocId): string | undefined {
    return this.texts.get(docId);
  }

  title(docId: DocId): string {
    const text = this.texts.get(docId);
    if (text) {
      for (const line of text.split(/\r\n|\r|\n/)) {
        const trimmed = line.trim();
        if (trimmed) return trimmed;
      }
    }
    return path.posix.basename(docId);
  }

  metadata(docId: DocId): DocumentMetadata | undefined {
    const m = this.docMeta.get(docId);
    return m ? { ...m } : undefined;
  }

  documentIds(): DocId[] {
    return [...this.order];
  }

  stats(): GlobalStats {
    return { ...this.totals };
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  save(file: string): void {
    const snapshot: IndexSnapshot = {
      stats: this.totals,
      metadata: this.docMeta,
      documents: this.order,
      postings: this.termToDocMap,
    };
    mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    writeFileSync(file, serializeIndex(snapshot), "utf8");
    this.logger.info(`index saved to ${file}`);
  }

  load(file: string, corpusRoot: string): boolean {
    this.reset();
    if (!existsSync(file)) {
      this.logger.debug(`no index file at ${file}`);
      return false;
    }

    try {
      const snapshot = parseIndexFile(readFileSync(file, "utf8"));

      for (const [term, docs] of snapshot.postings) {
        this.termToDocMap.set(term, new Map(docs));
        // the tree only records presence: one insert per (term, doc)
        for (const docId of docs.keys()) this.tree.insert(term, docId);
      }

      this.docMeta = snapshot.metadata;
      this.order = [...snapshot.documents];
      this.totals = {
        totalDocuments: Math.max(snapshot.stats.totalDocuments, this.docMeta.size || this.order.length),
        totalTokens: snapshot.stats.totalTokens,
        distinctTerms: this.termToDocMap.size,
      };
    } catch (e) {
      this.logger.error(`failed to load index from ${file}`, e);
      this.reset();
      return false;
    }

    for (const docId of this.order) {
      const full = resolveDocumentPath(corpusRoot, docId);
      if (!full) {
        this.logger.warn(`document id outside the corpus root: ${docId}`);
        continue;
      }
      try {
        this.texts.set(docId, readFileSync(full, "utf8").trim());
      } catch (e) {
        this.logger.warn(`could not open ${full}: ${describeError(e)}`);
      }
    }

    this.loaded = true;
    this.logger.info(`index loaded from ${file}: ${this.totals.totalDocuments} documents`);
    return true;
  }

  reset(): void {
    this.tree = this.createTree();
    this.termToDocMap = new Map();
    this.texts = new Map();
    this.docMeta = new Map();
    this.order = [];
    this.totals = emptyStats();
    this.loaded = false;
  }
}
