import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { intParam, pushErr, stringParam } from "./validation.js";
import { documentPage, errorPage, homePage, resultsPage } from "./render.js";
import type { SearchContext } from "./context.js";
import { noopLogger, type Logger } from "../logger.js";

const SERVICE = "radix-search";
const VERSION = "0.1.0";
const MAX_QUERY_LENGTH = 4096;

export interface ServerOptions {
  context: SearchContext;
  port?: number;
  host?: string;
  logger?: Logger;
}

/** What a route produces; `createServer` writes it to the response. */
export interface Reply {
  status: number;
  contentType: string;
  body: string;
  headers?: Record<string, string>;
}

export interface RequestLine {
  method?: string;
  url?: string;
}

const json = (status: number, body: unknown): Reply => ({ status, contentType: "application/json", body: JSON.stringify(body) });
const html = (status: number, body: string): Reply => ({ status, contentType: "text/html; charset=utf-8", body });
const problemReply = (body: Problem, headers?: Record<string, string>): Reply => ({
  status: body.status,
  contentType: PROBLEM_CONTENT_TYPE,
  body: JSON.stringify(body),
  headers,
});

/** Routes one request against the context. Never throws. */
export function createHandler(opts: ServerOptions): (req: RequestLine) => Reply {
  const start = Date.now();
  const { context } = opts;
  const logger = opts.logger ?? noopLogger;
  const pageSize = context.config.pageSize;

  return (req) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", "http://localhost");

    try {
      if (req.method !== "GET" && req.method !== "HEAD") {
        return problemReply(
          problem("METHOD_NOT_ALLOWED", { detail: `${req.method ?? "?"} not allowed`, instance: url.pathname, requestId }),
          { allow: "GET, HEAD" },
        );
      }

      if (url.pathname === "/health") {
        return json(200, {
          status: context.index.isLoaded() ? "ok" : "loading",
          service: SERVICE,
          version: VERSION,
          documents: context.index.stats().totalDocuments,
          uptimeMs: Date.now() - start,
        });
      }

      if (url.pathname === "/") {
        return html(200, homePage(context.index.stats()));
      }

      if (url.pathname === "/search") {
        const query = stringParam(url.searchParams, "q");
        if (query.length > MAX_QUERY_LENGTH) {
          return html(400, errorPage(400, `Queries are limited to ${MAX_QUERY_LENGTH} characters.`));
        }
        const page = intParam(url.searchParams, "page", { min: 1, max: 10_000, fallback: 1 }, []);
        const results = query ? context.search(query) : [];
        const offset = (page - 1) * pageSize;

        return html(
          200,
          resultsPage({
            query,
            total: results.length,
            page,
            pageSize,
            rows: results.slice(offset, offset + pageSize).map((r) => ({
              docId: r.docId,
              title: context.index.title(r.docId),
              relevance: r.relevance,
              snippetHtml: r.snippetHtml,
            })),
          }),
        );
      }

      if (url.pathname === "/document") {
        const id = stringParam(url.searchParams, "id");
        const metadata = id ? context.index.metadata(id) : undefined;
        if (!metadata) {
          return html(404, errorPage(404, id ? `No document with id ${id}.` : "Missing document id."));
        }
        return html(200, documentPage({ docId: id, title: context.index.title(id), text: context.index.text(id), metadata }));
      }

      if (url.pathname === "/api/search") {
        const errors: FieldError[] = [];
        const query = stringParam(url.searchParams, "q");
        if (!query) pushErr(errors, "q", "must be non-empty");
        if (query.length > MAX_QUERY_LENGTH) pushErr(errors, "q", "too long");
        const offset = intParam(url.searchParams, "offset", { min: 0, max: 1_000_000, fallback: 0 }, errors);
        const limit = intParam(url.searchParams, "limit", { min: 1, max: 100, fallback: pageSize }, errors);

        if (errors.length) {
          return problemReply(problem("INVALID_ARGUMENT", { detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const started = Date.now();
        const results = context.search(query);
        return json(200, {
          total: results.length,
          offset,
          limit,
          results: results.slice(offset, offset + limit).map((r) => ({
            id: r.docId,
            title: context.index.title(r.docId),
            relevance: r.relevance,
            zScores: r.zScores,
            snippet: r.snippetHtml,
          })),
          tookMs: Date.now() - started,
        });
      }

      if (url.pathname === "/api/suggest") {
        const errors: FieldError[] = [];
        const prefix = stringParam(url.searchParams, "prefix").toLowerCase();
        if (!prefix) pushErr(errors, "prefix", "must be non-empty");
        const limit = intParam(url.searchParams, "limit", { min: 1, max: 50, fallback: 10 }, errors);

        if (errors.length) {
          return problemReply(problem("INVALID_ARGUMENT", { detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        return json(200, { prefix, suggestions: context.index.complete(prefix, limit) });
      }

      return problemReply(problem("NOT_FOUND", { detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      logger.error(`request ${requestId} failed`, e);
      return problemReply(problem("INTERNAL", { detail: "internal error", instance: url.pathname, requestId }));
    }
  };
}

export function createServer(opts: ServerOptions): http.Server {
  const handle = createHandler(opts);

  return http.createServer((req, res) => {
    const reply = handle({ method: req.method, url: req.url });
    res.statusCode = reply.status;
    res.setHeader("content-type", reply.contentType);
    for (const [name, value] of Object.entries(reply.headers ?? {})) res.setHeader(name, value);
    res.end(req.method === "HEAD" ? undefined : reply.body);
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? opts.context.config.port;
  const host = opts.host ?? opts.context.config.host;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}
