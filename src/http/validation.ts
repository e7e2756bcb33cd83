import type { FieldError } from "./problem.js";

export interface IntParamRule {
  min: number;
  max: number;
  fallback: number;
}

/** Reads an integer query parameter; records an error and returns the fallback when it is invalid. */
export function intParam(params: URLSearchParams, name: string, rule: IntParamRule, errors: FieldError[]): number {
  const raw = params.get(name);
  if (raw === null || raw === "") return rule.fallback;

  const n = Number(raw);
  if (!Number.isInteger(n)) {
    pushErr(errors, name, "must be an integer");
    return rule.fallback;
  }
  if (n < rule.min || n > rule.max) {
    pushErr(errors, name, `must be between ${rule.min} and ${rule.max}`);
    return rule.fallback;
  }
  return n;
}

export function stringParam(params: URLSearchParams, name: string): string {
  return (params.get(name) ?? "").trim();
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
