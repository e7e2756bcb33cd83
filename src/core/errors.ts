export type ErrorCode = "NOT_FOUND" | "INDEX_FORMAT";

export class SearchEngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends SearchEngineError {
  readonly path: string;

  constructor(path: string, what = "path") {
    super("NOT_FOUND", `${what} not found: ${path}`);
    this.path = path;
  }
}

/** Raised while parsing a persisted index file; `line` is 1-based. */
export class IndexFormatError extends SearchEngineError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super("INDEX_FORMAT", line === undefined ? message : `line ${line}: ${message}`);
    this.line = line;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
