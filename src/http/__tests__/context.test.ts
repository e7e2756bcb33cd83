import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SearchContext } from "../context.js";
import { NotFoundError } from "../../core/errors.js";
import { noopLogger } from "../../logger.js";
import type { AppConfig } from "../../config.js";

describe("SearchContext", () => {
  let dir: string;
  let config: AppConfig;

  function writeDoc(docId: string, text: string): void {
    const full = path.join(config.corpusRoot, docId);
    mkdirSync(path.dirname(full), { recursive: true });
    writeFileSync(full, text, "utf8");
  }

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "radix-search-ctx-"));
    config = {
      port: 0,
      host: "127.0.0.1",
      corpusRoot: path.join(dir, "corpus"),
      indexPath: path.join(dir, "index.dat"),
      categories: ["sport", "tech"],
      snippetWindow: 10,
      pageSize: 10,
      logLevel: "error",
    };
    writeDoc("sport/001.txt", "Cats win the cup");
    writeDoc("tech/001.txt", "Dogs build robots");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty", () => {
    const ctx = new SearchContext({ config, logger: noopLogger });
    expect(ctx.index.isLoaded()).toBe(false);
    expect(ctx.search("cats")).toEqual([]);
  });

  it("builds and saves an index when none exists", async () => {
    const ctx = new SearchContext({ config, logger: noopLogger });
    await ctx.ensureLoaded();

    expect(existsSync(config.indexPath)).toBe(true);
    expect(ctx.index.documentIds()).toEqual(["sport/001.txt", "tech/001.txt"]);
    expect(ctx.search("cats").map((r) => r.docId)).toEqual(["sport/001.txt"]);
  });

  it("loads the saved index on the next start", async () => {
    await new SearchContext({ config, logger: noopLogger }).ensureLoaded();
    writeDoc("tech/002.txt", "Cats use robots");

    const ctx = new SearchContext({ config, logger: noopLogger });
    await ctx.ensureLoaded();
    expect(ctx.index.stats().totalDocuments).toBe(2);
    expect(ctx.search("robots").map((r) => r.docId)).toEqual(["tech/001.txt"]);
  });

  it("initializes once", async () => {
    const ctx = new SearchContext({ config, logger: noopLogger });
    const first = ctx.ensureLoaded();
    expect(ctx.ensureLoaded()).toBe(first);
    await first;
  });

  it("can retry a failed start", async () => {
    const real = config.corpusRoot;
    config.corpusRoot = path.join(dir, "later");
    const ctx = new SearchContext({ config, logger: noopLogger });

    await expect(ctx.ensureLoaded()).rejects.toBeInstanceOf(NotFoundError);
    expect(ctx.index.isLoaded()).toBe(false);

    config.corpusRoot = real;
    await ctx.ensureLoaded();
    expect(ctx.index.isLoaded()).toBe(true);
    expect(ctx.index.documentIds()).toEqual(["sport/001.txt", "tech/001.txt"]);
  });

  it("uses the configured snippet window", async () => {
    writeDoc("tech/003.txt", "one two three four five six seven eight nine ten");
    const ctx = new SearchContext({ config, logger: noopLogger });
    await ctx.ensureLoaded();

    const [hit] = ctx.search("five");
    expect(hit?.snippetHtml).toBe("...hree four <mark>five</mark> six seven...");
  });

  it("rebuilds from the corpus and swaps the new index in", async () => {
    const ctx = new SearchContext({ config, logger: noopLogger });
    await ctx.ensureLoaded();
    const before = ctx.index;
    writeDoc("tech/002.txt", "Cats use robots");

    expect(await ctx.rebuild()).toBe(3);
    expect(ctx.index).not.toBe(before);
    expect(before.stats().totalDocuments).toBe(2);
    expect(ctx.search("cats").map((r) => r.docId)).toEqual(["sport/001.txt", "tech/002.txt"]);

    const reopened = new SearchContext({ config, logger: noopLogger });
    await reopened.ensureLoaded();
    expect(reopened.index.stats().totalDocuments).toBe(3);
  });

  it("keeps serving the old index when a rebuild fails", async () => {
    const ctx = new SearchContext({ config, logger: noopLogger });
    await ctx.ensureLoaded();

    const good = config.corpusRoot;
    config.corpusRoot = path.join(dir, "missing");
    await expect(ctx.rebuild()).rejects.toBeInstanceOf(NotFoundError);
    expect(ctx.search("cats").map((r) => r.docId)).toEqual(["sport/001.txt"]);

    config.corpusRoot = good;
    expect(await ctx.rebuild()).toBe(2);
  });
});
