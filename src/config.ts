import { z } from "zod";

import { DEFAULT_CATEGORIES } from "./core/impl/corpus.js";
import { DEFAULT_SNIPPET_WINDOW } from "./core/impl/snippet.js";
import type { LogLevel } from "./logger.js";

const intFrom = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  PORT: intFrom(3000, 0, 65535),
  HOST: z.string().min(1).default("127.0.0.1"),
  CORPUS_ROOT: z.string().min(1).default("./corpus"),
  INDEX_PATH: z.string().min(1).default("./index.dat"),
  CATEGORIES: z
    .string()
    .transform((s) => s.split(",").map((c) => c.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1))
    .default(DEFAULT_CATEGORIES.join(",")),
  SNIPPET_WINDOW: intFrom(DEFAULT_SNIPPET_WINDOW, 1, 10_000),
  PAGE_SIZE: intFrom(10, 1, 100),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DEBUG: z.string().optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  corpusRoot: string;
  indexPath: string;
  categories: string[];
  snippetWindow: number;
  pageSize: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Reads configuration from environment variables; unset or empty values take defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v !== "") present[k] = v;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    corpusRoot: e.CORPUS_ROOT,
    indexPath: e.INDEX_PATH,
    categories: e.CATEGORIES,
    snippetWindow: e.SNIPPET_WINDOW,
    pageSize: e.PAGE_SIZE,
    logLevel: e.DEBUG === "1" || e.DEBUG === "true" ? "debug" : e.LOG_LEVEL,
  };
}
