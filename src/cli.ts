#!/usr/bin/env node
/**
 * radix-search CLI
 *
 *   radix-search index              rebuild the index from the corpus and save it
 *   radix-search search <query...>  print ranked results
 *   radix-search serve              serve the home, results and document pages
 */

import { Command, InvalidArgumentError } from "commander";

import { loadConfig, type AppConfig } from "./config.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { SearchContext } from "./http/context.js";
import { startServer } from "./http/server.js";

const VERSION = "0.1.0";

function parseIntOption(min: number, max: number) {
  return (value: string): number => {
    const n = Number(value);
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(`expected an integer between ${min} and ${max}`);
    }
    return n;
  };
}

/** Turns a snippet back into terminal text, with matches wrapped in `**`. */
function snippetToText(html: string): string {
  return html
    .replace(/<\/?mark>/g, "**")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, "&")
    .replace(/\s+/g, " ");
}

const program = new Command()
  .name("radix-search")
  .description("Boolean full-text search over a folder of text documents")
  .version(VERSION, "-v, --version", "Show version number")
  .option("--debug", "Enable debug output");

interface LocationFlags {
  corpus?: string;
  index?: string;
  port?: number;
  host?: string;
}

/** Environment first, command-line flags on top. */
function setup(flags: LocationFlags): { config: AppConfig; logger: Logger; context: SearchContext } {
  const config = loadConfig();
  if (flags.corpus) config.corpusRoot = flags.corpus;
  if (flags.index) config.indexPath = flags.index;
  if (flags.port !== undefined) config.port = flags.port;
  if (flags.host) config.host = flags.host;

  const debug = program.opts<{ debug?: boolean }>().debug ?? false;
  const logger = createConsoleLogger(debug ? "debug" : config.logLevel);
  return { config, logger, context: new SearchContext({ config, logger }) };
}

program
  .command("index")
  .description("Rebuild the index from the corpus and save it")
  .option("-c, --corpus <dir>", "corpus root folder")
  .option("-o, --out <file>", "index file to write")
  .action(async (opts: { corpus?: string; out?: string }) => {
    const { config, context } = setup({ corpus: opts.corpus, index: opts.out });
    const count = await context.rebuild();
    const stats = context.index.stats();
    console.log(`${count} documents, ${stats.distinctTerms} distinct terms, ${stats.totalTokens} tokens -> ${config.indexPath}`);
  });

program
  .command("search")
  .description("Run a boolean query and print the ranked results")
  .argument("<query...>", "query, e.g. climate AND (change OR warming)")
  .option("-c, --corpus <dir>", "corpus root folder")
  .option("-i, --index <file>", "index file to read")
  .option("-n, --limit <n>", "number of results to print", parseIntOption(1, 1000), 10)
  .action(async (words: string[], opts: { corpus?: string; index?: string; limit: number }) => {
    const { context } = setup(opts);
    await context.ensureLoaded();

    const results = context.search(words.join(" "));
    console.log(`${results.length} matching documents`);
    results.slice(0, opts.limit).forEach((r, i) => {
      console.log(`${i + 1}. ${context.index.title(r.docId)} [${r.docId}] relevance=${r.relevance.toFixed(4)}`);
      console.log(`   ${snippetToText(r.snippetHtml)}`);
    });
  });

program
  .command("serve")
  .description("Load the index once, then serve the search pages over HTTP")
  .option("-c, --corpus <dir>", "corpus root folder")
  .option("-i, --index <file>", "index file to read (built when missing)")
  .option("-p, --port <port>", "port to listen on", parseIntOption(0, 65535))
  .option("-H, --host <host>", "interface to bind")
  .action(async (opts: { corpus?: string; index?: string; port?: number; host?: string }) => {
    const { config, logger, context } = setup(opts);
    await context.ensureLoaded();

    const { server, port } = await startServer({ context, logger });

    const shutdown = (): void => {
      server.close(() => process.exit(0));
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);

    logger.info(`listening on http://${config.host}:${port}`);
  });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}
