import { matches } from "./matrix.js";
import type { RunCondition, TriggerEvent } from "../types/pipeline.js";
import type { SkipReason } from "../types/job.js";

/** The slice of the execution context a run-condition may look at. */
export type ConditionContext = {
  failed: boolean;
  cancelled: boolean;
  event: TriggerEvent;
  matrix: Readonly<Record<string, string>>;
};

export type ConditionVerdict = { run: true } | { run: false; reason: SkipReason };

/**
 * Pure function: decide whether a step runs.
 *
 * `always` runs unconditionally, after failures and after cancellation.
 * `on_failure` runs only once the failure flag is set.
 * Every other condition first requires a clean, uncancelled job.
 */
export function evaluateCondition(condition: RunCondition, ctx: ConditionContext): ConditionVerdict {
  switch (condition.kind) {
    case "always":
      return { run: true };
    case "on_failure":
      return ctx.failed ? { run: true } : { run: false, reason: "condition" };
    case "on_success":
    case "on_event":
    case "on_matrix": {
      if (ctx.cancelled) return { run: false, reason: "cancelled" };
      if (ctx.failed) return { run: false, reason: "prior_failure" };
      if (condition.kind === "on_event" && ctx.event.kind !== condition.event) {
        return { run: false, reason: "condition" };
      }
      if (condition.kind === "on_matrix" && !matches(ctx.matrix, condition.values)) {
        return { run: false, reason: "condition" };
      }
      return { run: true };
    }
  }
}

/** Cleanup steps run regardless of outcome and never decide the job status. */
export function isCleanup(condition: RunCondition): boolean {
  return condition.kind === "always";
}

/** Short label used in results and logs. */
export function describeCondition(condition: RunCondition): string {
  switch (condition.kind) {
    case "always":
    case "on_success":
    case "on_failure":
      return condition.kind;
    case "on_event":
      return `on_event(${condition.event})`;
    case "on_matrix":
      return `on_matrix(${Object.entries(condition.values)
        .map(([k, v]) => `${k}=${v}`)
        .join(",")})`;
  }
}
