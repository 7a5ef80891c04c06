import type { Writable } from "node:stream";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type OutputFormat = "human" | "jsonl";

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Sink for orchestrator diagnostics. */
export interface Reporter {
  emit(d: Diagnostic): void;
}

/**
 * Render diagnostics as human lines (errors and warnings on stderr) or as
 * one JSON object per line on stdout. `mask` runs over every message before
 * it is written.
 */
export function createReporter(opts: {
  format: OutputFormat;
  stdout?: Writable;
  stderr?: Writable;
  mask?: (text: string) => string;
}): Reporter {
  const stdout = opts.stdout ?? process.stdout;
  const stderr = opts.stderr ?? process.stderr;
  const mask = opts.mask ?? ((t: string) => t);

  return {
    emit(d: Diagnostic) {
      const masked: Diagnostic = { ...d, message: mask(d.message) };
      if (opts.format === "jsonl") {
        stdout.write(JSON.stringify(masked) + "\n");
        return;
      }
      const line = d.level === "info" ? masked.message : `${d.level}: ${masked.message}`;
      (d.level === "info" ? stdout : stderr).write(line + "\n");
    },
  };
}

/** Reporter that keeps diagnostics in memory (tests, nested runs). */
export class MemoryReporter implements Reporter {
  readonly diagnostics: Diagnostic[] = [];

  emit(d: Diagnostic): void {
    this.diagnostics.push(d);
  }

  codes(): string[] {
    return this.diagnostics.map((d) => d.code);
  }
}
