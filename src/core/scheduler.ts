import { OrchestratorError, errorMessage } from "./errors.js";
import type { JobRunner } from "./orchestrator.js";
import type { JobResult, JobSpec, PipelineResult, PipelineStatus } from "../types/job.js";
import type { TriggerEvent } from "../types/pipeline.js";

export type SchedulerOptions = {
  /** Cancel the remaining jobs once one fails. */
  failFast: boolean;
  /** 0 starts every job at once. */
  maxParallel: number;
};

export type ScheduleRun = {
  runId: string;
  event: TriggerEvent;
  /** External stop (SIGINT, SIGTERM). */
  signal?: AbortSignal;
};

/** failed > cancelled > passed */
export function aggregateStatus(jobs: readonly Pick<JobResult, "status">[]): PipelineStatus {
  if (jobs.some((j) => j.status === "failed")) return "failed";
  if (jobs.some((j) => j.status === "cancelled")) return "cancelled";
  return "passed";
}

/**
 * Runs independent jobs concurrently. A job's outcome never affects its
 * siblings unless `failFast` is set; external cancellation and internal
 * errors stop everything that has not finished.
 */
export class JobScheduler {
  constructor(
    private readonly runner: JobRunner,
    private readonly opts: SchedulerOptions,
  ) {}

  async run(jobs: readonly JobSpec[], run: ScheduleRun): Promise<PipelineResult> {
    const startedAt = new Date().toISOString();
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(new Error("cancelled"));
    if (run.signal?.aborted) onExternalAbort();
    else run.signal?.addEventListener("abort", onExternalAbort, { once: true });

    const results = new Map<string, JobResult>();
    const crash: { error: OrchestratorError | null } = { error: null };
    let next = 0;

    const worker = async (): Promise<void> => {
      for (let i = next++; i < jobs.length; i = next++) {
        const job = jobs[i];
        try {
          const result = await this.runner.runJob(job, controller.signal);
          // Each job writes only its own key.
          results.set(job.id, result);
          if (this.opts.failFast && result.status === "failed" && !controller.signal.aborted) {
            controller.abort(new Error(`fail-fast: ${job.id} failed`));
          }
        } catch (e: unknown) {
          crash.error ??=
            e instanceof OrchestratorError ? e : new OrchestratorError(`Job "${job.id}" crashed: ${errorMessage(e)}`, { cause: e });
          controller.abort(crash.error);
        }
      }
    };

    const width = this.opts.maxParallel > 0 ? Math.min(this.opts.maxParallel, jobs.length) : jobs.length;
    try {
      await Promise.all(Array.from({ length: width }, () => worker()));
    } finally {
      run.signal?.removeEventListener("abort", onExternalAbort);
    }

    // Every worker has settled, so the other jobs are torn down by now.
    if (crash.error) throw crash.error;

    const ordered: JobResult[] = [];
    for (const job of jobs) {
      const result = results.get(job.id);
      if (!result) {
        throw new OrchestratorError(`Job "${job.id}" produced no result`);
      }
      ordered.push(result);
    }

    return Object.freeze({
      runId: run.runId,
      status: aggregateStatus(ordered),
      event: run.event,
      jobs: Object.freeze(ordered),
      byId: results,
      startedAt,
      finishedAt: new Date().toISOString(),
    });
  }
}
