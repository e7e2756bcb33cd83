/** RFC 7807 problem documents for the JSON endpoints. */

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  code?: string;
  requestId?: string;
  errors?: FieldError[];
}

export type ProblemCode = "INVALID_ARGUMENT" | "NOT_FOUND" | "METHOD_NOT_ALLOWED" | "INTERNAL";

export interface ProblemExtras {
  detail?: string;
  instance?: string;
  requestId?: string;
  errors?: FieldError[];
}

export const PROBLEM_CONTENT_TYPE = "application/problem+json";

const PROBLEM_BASE = "https://errors.radix-search.local/";

const KNOWN: Record<ProblemCode, { status: number; title: string }> = {
  INVALID_ARGUMENT: { status: 400, title: "Invalid argument" },
  NOT_FOUND: { status: 404, title: "Not found" },
  METHOD_NOT_ALLOWED: { status: 405, title: "Method not allowed" },
  INTERNAL: { status: 500, title: "Internal error" },
};

export function problem(code: ProblemCode, extras: ProblemExtras = {}): Problem {
  const { status, title } = KNOWN[code];
  return {
    type: PROBLEM_BASE + code.toLowerCase().replace(/_/g, "-"),
    title,
    status,
    code,
    ...extras,
  };
}
