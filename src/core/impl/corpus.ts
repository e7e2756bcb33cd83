import { readdirSync, statSync } from "node:fs";
import path from "node:path";

import type { Logger } from "../../logger.js";
import { describeError } from "../errors.js";
import type { DocId } from "../types.js";

export const DEFAULT_CATEGORIES: readonly string[] = ["business", "entertainment", "politics", "sport", "tech"];

export interface CorpusFile {
  docId: DocId;
  path: string;
}

/**
 * Lists `<root>/<category>/*.txt` for each category, file names sorted.
 * Missing or unreadable category folders are logged and skipped. Symlinks
 * are listed unless they point at a directory; a dangling one fails later,
 * when it is read.
 */
export function listCorpusFiles(root: string, categories: readonly string[], logger: Logger): CorpusFile[] {
  const out: CorpusFile[] = [];

  for (const category of categories) {
    const dir = path.join(root, category);
    if (!statSync(dir, { throwIfNoEntry: false })?.isDirectory()) {
      logger.warn(`category folder missing: ${category}`);
      continue;
    }

    let names: string[];
    try {
      names = readdirSync(dir, { withFileTypes: true })
        .filter((e) => e.name.toLowerCase().endsWith(".txt"))
        .filter((e) => e.isFile() || (e.isSymbolicLink() && !statSync(path.join(dir, e.name), { throwIfNoEntry: false })?.isDirectory()))
        .map((e) => e.name)
        .sort();
    } catch (e) {
      logger.warn(`could not list ${dir}: ${describeError(e)}`);
      continue;
    }

    for (const name of names) {
      out.push({ docId: `${category}/${name}`, path: path.join(dir, name) });
    }
  }

  return out;
}

/** Resolves a document id against the corpus root; undefined if it would escape the root. */
export function resolveDocumentPath(root: string, docId: DocId): string | undefined {
  const base = path.resolve(root);
  const full = path.resolve(base, docId);
  const rel = path.relative(base, full);
  if (!rel || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return undefined;
  return full;
}
