import { isAbsolute, resolve } from "node:path";
import type { EnvValue } from "../types/pipeline.js";

export const REDACTED = "***";

/** External secret store. The orchestrator never persists what it returns. */
export interface SecretStore {
  get(name: string): string | undefined;
}

/** Resolves secret references from the orchestrator's own environment. */
export class EnvSecretStore implements SecretStore {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === "" ? undefined : value;
  }
}

/**
 * Collects every secret value handed to a step and masks it in text
 * before that text reaches a log file or the reporter.
 */
export class Redactor {
  private readonly values = new Set<string>();

  add(value: string): void {
    // Very short values would mask unrelated output.
    if (value.length >= 3) this.values.add(value);
  }

  redact(text: string): string {
    if (!text) return "";
    let result = text;
    // Longest first so a secret containing another is masked whole.
    const ordered = [...this.values].sort((a, b) => b.length - a.length);
    for (const value of ordered) {
      result = result.split(value).join(REDACTED);
    }
    return result;
  }
}

export type ResolvedEnv = {
  env: Record<string, string>;
  missing: string[];
};

/**
 * Resolve `{ secret: NAME }` env values. Missing secrets resolve to an empty
 * string and are reported so the caller can warn.
 */
export function resolveEnv(
  env: Readonly<Record<string, EnvValue>>,
  store: SecretStore,
  redactor: Redactor,
  render: (value: string) => string = (v) => v,
): ResolvedEnv {
  const out: Record<string, string> = {};
  const missing: string[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string") {
      out[key] = render(value);
      continue;
    }
    const secret = store.get(value.secret);
    if (secret === undefined) {
      missing.push(value.secret);
      out[key] = "";
    } else {
      redactor.add(secret);
      out[key] = secret;
    }
  }
  return { env: out, missing };
}

/**
 * Sanitize path component to prevent path traversal attacks.
 * @throws Error if path component is invalid
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Resolve `relative` inside `base`, refusing anything that escapes it.
 * @throws Error if path traversal is detected
 */
export function resolveInside(base: string, relative: string): string {
  if (!isAbsolute(base)) {
    throw new Error(`Base path must be absolute: ${base}`);
  }
  const normalizedBase = resolve(base);
  const fullPath = resolve(normalizedBase, relative);
  if (fullPath !== normalizedBase && !fullPath.startsWith(normalizedBase + "/") && !fullPath.startsWith(normalizedBase + "\\")) {
    throw new Error(`Path escapes ${normalizedBase}: ${relative}`);
  }
  return fullPath;
}
