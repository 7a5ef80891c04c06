import { minimatch } from "minimatch";
import { loadPipeline } from "../config/pipeline-loader.js";
import { describeCondition } from "../core/conditions.js";
import { toErrorInfo } from "../core/errors.js";
import { expandPipeline } from "../core/matrix.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { ErrorInfo, JobSpec } from "../types/job.js";

export type PlannedJob = {
  id: string;
  template: string;
  matrix: Readonly<Record<string, string>>;
  runsOn: string | readonly string[] | null;
  env: Readonly<Record<string, string>>;
  resources: string[];
  steps: { name: string; condition: string }[];
};

export type PlanResult = { ok: true; pipeline: string; jobs: PlannedJob[] } | { ok: false; error: ErrorInfo };

/** Keep jobs whose template name matches `pattern` (minimatch); all when omitted. */
export function selectJobs(jobs: readonly JobSpec[], pattern?: string): JobSpec[] {
  if (!pattern) return [...jobs];
  return jobs.filter((job) => minimatch(job.template, pattern, { nocase: true }));
}

export function describeJob(job: JobSpec): PlannedJob {
  return {
    id: job.id,
    template: job.template,
    matrix: job.matrix,
    runsOn: job.runsOn,
    env: job.env,
    resources: job.resources.map((r) => `${r.kind}:${r.name}`),
    steps: job.steps.map((s) => ({ name: s.name, condition: describeCondition(s.if) })),
  };
}

/**
 * Expand a pipeline without running it.
 */
export function plan(opts: { pipelinePath: string; jobGlob?: string; registry?: SchemaRegistry }): PlanResult {
  try {
    const pipeline = loadPipeline(opts.pipelinePath, opts.registry);
    const jobs = selectJobs(expandPipeline(pipeline), opts.jobGlob);
    return { ok: true, pipeline: pipeline.name, jobs: jobs.map(describeJob) };
  } catch (e: unknown) {
    return { ok: false, error: toErrorInfo(e, "INTERNAL_ERROR") };
  }
}

/** Human rendering of a plan, one block per job. */
export function formatPlan(pipeline: string, jobs: readonly PlannedJob[]): string {
  const lines = [`${pipeline}: ${jobs.length} job(s)`];
  for (const job of jobs) {
    const runsOn = job.runsOn === null ? "" : ` on ${typeof job.runsOn === "string" ? job.runsOn : job.runsOn.join(",")}`;
    lines.push(`- ${job.id}${runsOn}`);
    for (const resource of job.resources) lines.push(`    resource ${resource}`);
    job.steps.forEach((step, i) => lines.push(`    ${i + 1}. ${step.name} [${step.condition}]`));
  }
  return lines.join("\n");
}
