import type { ExpressionScope } from "./expression.js";
import type { Redactor } from "../security/secrets.js";
import type { JobSpec, JobWarning } from "../types/job.js";
import type { TriggerEvent } from "../types/pipeline.js";

/**
 * Per-job mutable state. Created at job start, discarded after artifact
 * collection and teardown. Never shared between jobs.
 */
export type ExecutionContext = {
  readonly runId: string;
  readonly job: JobSpec;
  readonly jobSlug: string;
  readonly event: TriggerEvent;
  /** Accumulated environment: job env, resource exports, step exports. */
  env: Record<string, string>;
  failed: boolean;
  readonly signal: AbortSignal;
  /** The job's own workspace: step cwd and base of artifact paths. */
  readonly workdir: string;
  /** Scratch directory for env files and kubeconfigs. */
  readonly jobDir: string;
  readonly logsDir: string;
  readonly redactor: Redactor;
  readonly warnings: JobWarning[];
};

export function createExecutionContext(init: {
  runId: string;
  job: JobSpec;
  jobSlug: string;
  event: TriggerEvent;
  signal: AbortSignal;
  workdir: string;
  jobDir: string;
  logsDir: string;
  redactor: Redactor;
}): ExecutionContext {
  return {
    ...init,
    env: { ...init.job.env },
    failed: false,
    warnings: [],
  };
}

/** Placeholder scope as seen by the current step. */
export function expressionScope(ctx: ExecutionContext): ExpressionScope {
  const runsOn = ctx.job.runsOn;
  const os = runsOn === null ? "" : typeof runsOn === "string" ? runsOn : (runsOn[0] ?? "");
  return {
    matrix: ctx.job.matrix,
    env: ctx.env,
    run: { id: ctx.runId },
    event: ctx.event,
    job: { id: ctx.job.id, template: ctx.job.template },
    runner: { os },
  };
}

/** Merge exported variables into the context; returns the keys that were set. */
export function applyExports(ctx: ExecutionContext, exports: Readonly<Record<string, string>>): string[] {
  const keys = Object.keys(exports);
  if (keys.length > 0) {
    ctx.env = { ...ctx.env, ...exports };
  }
  return keys;
}
