import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { listCorpusFiles, resolveDocumentPath } from "../corpus.js";
import { noopLogger } from "../../../logger.js";

describe("listCorpusFiles", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "radix-search-corpus-"));
    mkdirSync(path.join(root, "tech", "nested.txt"), { recursive: true });
    writeFileSync(path.join(root, "tech", "b.txt"), "b");
    writeFileSync(path.join(root, "tech", "a.TXT"), "a");
    writeFileSync(path.join(root, "tech", "readme.md"), "r");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("lists text files by name, skipping folders", () => {
    expect(listCorpusFiles(root, ["tech"], noopLogger).map((f) => f.docId)).toEqual(["tech/a.TXT", "tech/b.txt"]);
  });

  it("follows symlinks to files but not to folders", () => {
    symlinkSync(path.join(root, "tech", "b.txt"), path.join(root, "tech", "c.txt"));
    symlinkSync(path.join(root, "tech", "nested.txt"), path.join(root, "tech", "d.txt"));

    expect(listCorpusFiles(root, ["tech"], noopLogger)).toEqual([
      { docId: "tech/a.TXT", path: path.join(root, "tech", "a.TXT") },
      { docId: "tech/b.txt", path: path.join(root, "tech", "b.txt") },
      { docId: "tech/c.txt", path: path.join(root, "tech", "c.txt") },
    ]);
  });
});

describe("resolveDocumentPath", () => {
  it("resolves ids under the root", () => {
    expect(resolveDocumentPath("/data/corpus", "tech/001.txt")).toBe(path.resolve("/data/corpus/tech/001.txt"));
  });

  it("works when the root is the filesystem root", () => {
    expect(resolveDocumentPath("/", "tech/001.txt")).toBe(path.resolve("/tech/001.txt"));
  });

  it("refuses ids that leave the root", () => {
    expect(resolveDocumentPath("/data/corpus", "../secret.txt")).toBeUndefined();
    expect(resolveDocumentPath("/data/corpus", "..")).toBeUndefined();
    expect(resolveDocumentPath("/data/corpus", "/etc/passwd")).toBeUndefined();
    expect(resolveDocumentPath("/data/corpus", "")).toBeUndefined();
  });

  it("accepts names that merely start with two dots", () => {
    expect(resolveDocumentPath("/data/corpus", "tech/..notes.txt")).toBe(path.resolve("/data/corpus/tech/..notes.txt"));
  });
});
