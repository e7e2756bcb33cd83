import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";
import type { InvertedIndex } from "../core/invertedIndex.js";
import type { SearchResult } from "../core/types.js";
import { BooleanSearchEngine, MemoryInvertedIndex, ZScoreRanker } from "../core/impl/index.js";

interface Snapshot {
  index: InvertedIndex;
  engine: BooleanSearchEngine;
}

export interface SearchContextOptions {
  config: AppConfig;
  logger: Logger;
  /** override for tests */
  createIndex?: () => InvertedIndex;
}

/**
 * Process-wide search state, created once at startup and handed to every
 * request handler.
 *
 * `ensureLoaded()` is the single initialization barrier. Writers (`rebuild`)
 * are chained so only one runs at a time; they build a fresh index and swap
 * it in, so readers always see a complete snapshot.
 */
export class SearchContext {
  readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly createIndex: () => InvertedIndex;
  private current: Snapshot;
  private ready: Promise<void> | undefined;
  private writer: Promise<unknown> = Promise.resolve();

  constructor(opts: SearchContextOptions) {
    this.config = opts.config;
    this.logger = opts.logger;
    this.createIndex =
      opts.createIndex ??
      (() => new MemoryInvertedIndex({ categories: opts.config.categories, logger: opts.logger }));
    this.current = this.snapshot(this.createIndex());
  }

  get index(): InvertedIndex {
    return this.current.index;
  }

  search(query: string): SearchResult[] {
    return this.current.engine.search(query, { snippetWindow: this.config.snippetWindow });
  }

  /** Loads the saved index, or builds and saves one from the corpus when there is none. */
  ensureLoaded(): Promise<void> {
    this.ready ??= this.exclusive(() => {
      const { indexPath, corpusRoot } = this.config;
      const index = this.createIndex();
      if (!index.load(indexPath, corpusRoot)) {
        this.logger.info(`no usable index at ${indexPath}, building from ${corpusRoot}`);
        index.ingestCorpus(corpusRoot);
        index.save(indexPath);
      }
      this.current = this.snapshot(index);
    }).catch((e: unknown) => {
      // a failed start can be retried
      this.ready = undefined;
      throw e;
    });
    return this.ready;
  }

  /** Rebuilds from scratch, saves, and swaps the new index in. Resolves to the document count. */
  rebuild(): Promise<number> {
    return this.exclusive(() => {
      const { indexPath, corpusRoot } = this.config;
      const index = this.createIndex();
      const count = index.ingestCorpus(corpusRoot);
      index.save(indexPath);
      this.current = this.snapshot(index);
      this.ready = Promise.resolve();
      return count;
    });
  }

  private snapshot(index: InvertedIndex): Snapshot {
    return { index, engine: new BooleanSearchEngine({ index, ranker: new ZScoreRanker(), logger: this.logger }) };
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const run = this.writer.then(fn);
    // the chain only orders writers; callers see the failure through `run`
    this.writer = run.catch(() => undefined);
    return run;
  }
}
