import { type RunState, type RunSummary, listRuns, loadRunState } from "../core/run-store.js";
import type { SchemaRegistry } from "../schema/registry.js";

export type StatusResult = { ok: true; state: RunState } | { ok: false; error: string };

/**
 * Read the state of one run.
 */
export function status(opts: { runsDir: string; runId: string; registry?: SchemaRegistry }): StatusResult {
  return loadRunState(opts.runsDir, opts.runId, opts.registry);
}

/**
 * List all runs with their current status, newest first.
 */
export function listRunStatuses(opts: { runsDir: string; registry?: SchemaRegistry }): RunSummary[] {
  return listRuns(opts.runsDir, opts.registry);
}

/** One line per job: "<phase>  <status>  <job id>". */
export function formatRunState(state: RunState): string {
  const lines = [`${state.run_id}  ${state.status}  ${state.pipeline}  ${state.event.kind} ${state.event.ref}`.trimEnd()];
  for (const [jobId, record] of Object.entries(state.jobs)) {
    lines.push(`  ${record.phase.padEnd(12)} ${(record.status ?? "-").padEnd(9)} ${jobId}`);
  }
  return lines.join("\n");
}
