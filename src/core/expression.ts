import type { TriggerEvent } from "../types/pipeline.js";

const EXPRESSION_RE = /\$\{\{\s*([^}]+?)\s*\}\}/g;

/** Values reachable from `${{ ... }}` placeholders. */
export type ExpressionScope = {
  matrix: Readonly<Record<string, string>>;
  env: Readonly<Record<string, string>>;
  run?: { id: string };
  event?: TriggerEvent;
  job?: { id: string; template: string };
  runner?: { os: string };
};

/** Render every placeholder in `input`. Unknown paths render as "". */
export function renderString(input: string, scope: ExpressionScope): string {
  return input.replace(EXPRESSION_RE, (_, expr: string) => {
    const value = lookup(expr.trim(), scope);
    return value ?? "";
  });
}

/** Render placeholders in every string value of a flat record. */
export function renderRecord(
  input: Readonly<Record<string, string>>,
  scope: ExpressionScope,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    out[key] = renderString(value, scope);
  }
  return out;
}

function lookup(expr: string, scope: ExpressionScope): string | undefined {
  const [root, ...rest] = expr.split(".");
  const key = rest.join(".");
  switch (root) {
    case "matrix":
      return own(scope.matrix, key);
    case "env":
      return own(scope.env, key);
    case "run":
      return key === "id" ? scope.run?.id : undefined;
    case "event":
      if (!scope.event) return undefined;
      if (key === "kind") return scope.event.kind;
      if (key === "ref") return scope.event.ref;
      if (key === "repository") return scope.event.repository;
      if (key === "sha") return scope.event.sha;
      return undefined;
    case "job":
      if (!scope.job) return undefined;
      if (key === "id") return scope.job.id;
      if (key === "template") return scope.job.template;
      return undefined;
    case "runner":
      return key === "os" ? scope.runner?.os : undefined;
    default:
      return undefined;
  }
}

function own(record: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}
