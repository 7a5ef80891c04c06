import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { type ExecutionContext, applyExports, createExecutionContext, expressionScope } from "./context.js";
import { OrchestratorError, errorMessage, toErrorInfo } from "./errors.js";
import { type ExecutorDeps, executeSteps } from "./executor.js";
import { renderString } from "./expression.js";
import { type ProviderRegistry, ResourceScope, renderResourceSpec } from "./provisioner.js";
import { slugify } from "./run-id.js";
import type { RunStore } from "./run-store.js";
import { type JobEvent, nextPhase } from "./state-machine.js";
import { seedWorkspace } from "./workspace.js";
import type { ArtifactCollector } from "../artifact-writer/writer.js";
import { diag } from "../report/reporter.js";
import type { Redactor } from "../security/secrets.js";
import type {
  CollectedArtifact,
  ErrorInfo,
  JobPhase,
  JobResult,
  JobSpec,
  JobStatus,
  ResourceReport,
  StepResult,
  TeardownReport,
} from "../types/job.js";
import type { ArtifactDeclaration, TriggerEvent } from "../types/pipeline.js";

export type OrchestratorDeps = {
  runId: string;
  event: TriggerEvent;
  /** Source tree every job's workspace is copied from. */
  workdir: string;
  /** Paths under `workdir` left out of the copies, such as the runs and tools directories. */
  workspaceExclude?: readonly string[];
  /** `<runs_dir>/<runId>` */
  runDir: string;
  providers: ProviderRegistry;
  executor: ExecutorDeps;
  collector: ArtifactCollector;
  redactor: Redactor;
  resourceTimeoutMs: number;
  /** Job id → directory name; falls back to a slug of the id. */
  slugs?: ReadonlyMap<string, string>;
  store?: RunStore;
};

/** Anything that can take one job to its terminal result. */
export interface JobRunner {
  runJob(job: JobSpec, signal: AbortSignal): Promise<JobResult>;
}

/**
 * Drives one JobSpec through pending → provisioning → running → collecting →
 * done (or through cancelling). Job-local failures end up in the JobResult;
 * only an unexpected crash escapes, as OrchestratorError, after teardown.
 */
export class JobOrchestrator implements JobRunner {
  constructor(private readonly deps: OrchestratorDeps) {}

  async runJob(job: JobSpec, signal: AbortSignal): Promise<JobResult> {
    const { deps } = this;
    const reporter = deps.executor.reporter;
    const started = Date.now();
    const slug = deps.slugs?.get(job.id) ?? slugify(job.id);
    const jobDir = path.join(deps.runDir, "jobs", slug);
    const workspace = path.join(jobDir, "work");

    const tracker = new PhaseTracker((from, to, event, status) => {
      deps.store?.jobPhase(job.id, to, status);
      reporter.emit(diag("info", "JOB_PHASE", `[${job.id}] ${from} → ${to}`, { details: { job: job.id, from, to, event } }));
    });

    const ctx = createExecutionContext({
      runId: deps.runId,
      job,
      jobSlug: slug,
      event: deps.event,
      signal,
      workdir: workspace,
      jobDir,
      logsDir: path.join(jobDir, "logs"),
      redactor: deps.redactor,
    });
    const scope = new ResourceScope(deps.providers, deps.resourceTimeoutMs);
    const resources: ResourceReport[] = [];
    let steps: StepResult[] = [];
    let artifacts: CollectedArtifact[] = [];
    let teardown: TeardownReport[] = [];
    let status: JobStatus = "cancelled";
    let provisionError: ErrorInfo | undefined;
    let crash: { error: unknown } | null = null;

    try {
      if (signal.aborted) {
        // Never started: nothing was provisioned or changed, so there is
        // nothing for `always` steps to clean up.
        tracker.move("cancel");
      } else {
        tracker.move("start");
        await mkdir(jobDir, { recursive: true });
        await seedWorkspace(deps.workdir, workspace, [deps.runDir, ...(deps.workspaceExclude ?? [])]);
        provisionError = await this.provision(ctx, scope, resources);
        tracker.move(signal.aborted ? "cancel" : "provisioned");

        // Steps run in the cancelling phase too, so cleanup steps execute.
        steps = (await executeSteps(ctx, deps.executor)).steps;
        if (tracker.phase === "running") tracker.move(signal.aborted ? "cancel" : "steps_finished");
      }
      if (tracker.phase === "cancelling") tracker.move("collect");

      status = ctx.failed ? "failed" : tracker.cancelled ? "cancelled" : "passed";
      artifacts = await this.collect(ctx, status);
    } catch (e: unknown) {
      crash = { error: e };
    } finally {
      teardown = await scope.releaseAll();
      for (const report of teardown) {
        if (report.ok || !report.error) continue;
        ctx.warnings.push(report.error);
        reporter.emit(diag("warn", report.error.code, `[${job.id}] ${report.error.message}`, { details: { job: job.id, resource: report.id } }));
      }
      try {
        await rm(workspace, { recursive: true, force: true });
      } catch (e: unknown) {
        ctx.warnings.push({ code: "WORKSPACE_CLEANUP_FAILED", message: errorMessage(e) });
        reporter.emit(diag("warn", "WORKSPACE_CLEANUP_FAILED", `[${job.id}] ${errorMessage(e)}`, { details: { job: job.id } }));
      }
    }

    if (crash) {
      const cause = crash.error;
      try {
        deps.store?.jobPhase(job.id, tracker.phase, "failed");
      } catch (e: unknown) {
        reporter.emit(diag("warn", "STATE_WRITE_FAILED", `[${job.id}] ${errorMessage(e)}`, { details: { job: job.id } }));
      }
      throw cause instanceof OrchestratorError
        ? cause
        : new OrchestratorError(`Job "${job.id}" crashed in phase ${tracker.phase}: ${errorMessage(cause)}`, { cause });
    }

    tracker.move("collected", status);

    const error = status === "failed" ? (provisionError ?? firstStepError(job, steps)) : undefined;
    const finished = Date.now();
    const result: JobResult = {
      jobId: job.id,
      template: job.template,
      matrix: job.matrix,
      runsOn: job.runsOn,
      status,
      steps: Object.freeze(steps),
      resources: Object.freeze(resources),
      artifacts: Object.freeze(artifacts),
      teardown: Object.freeze(teardown),
      warnings: Object.freeze([...ctx.warnings]),
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(finished).toISOString(),
      durationMs: finished - started,
      ...(error ? { error } : {}),
    };
    reporter.emit(
      diag(status === "passed" ? "info" : "warn", "JOB_DONE", `[${job.id}] ${status} (${finished - started}ms)`, {
        details: { job: job.id, status },
      }),
    );
    return Object.freeze(result);
  }

  /**
   * Acquire the job's resources in order. The first failure sets the
   * failure flag (unless the job is being cancelled) and stops acquisition.
   */
  private async provision(ctx: ExecutionContext, scope: ResourceScope, reports: ResourceReport[]): Promise<ErrorInfo | undefined> {
    const reporter = this.deps.executor.reporter;
    for (const declared of ctx.job.resources) {
      if (ctx.signal.aborted) return undefined;
      const scopeVars = expressionScope(ctx);
      const spec = renderResourceSpec(declared, (v) => renderString(v, scopeVars));
      try {
        const resource = await scope.acquire(spec, {
          runId: ctx.runId,
          jobSlug: ctx.jobSlug,
          workdir: ctx.workdir,
          jobDir: ctx.jobDir,
          env: ctx.env,
          signal: ctx.signal,
        });
        const exported = applyExports(ctx, resource.exports);
        reports.push({ id: resource.id, kind: resource.kind, name: resource.name, status: "acquired" });
        reporter.emit(
          diag("info", "RESOURCE_ACQUIRED", `[${ctx.job.id}] ${resource.kind} ${resource.name}`, {
            details: { job: ctx.job.id, resource: resource.id, exported },
          }),
        );
      } catch (e: unknown) {
        const info = toErrorInfo(e, "PROVISION_FAILED");
        reports.push({ id: `${spec.kind}:${spec.name}`, kind: spec.kind, name: spec.name, status: "failed", error: info });
        if (ctx.signal.aborted) return undefined;
        ctx.failed = true;
        reporter.emit(diag("error", info.code, `[${ctx.job.id}] ${info.message}`, { details: { job: ctx.job.id, resource: spec.name } }));
        return info;
      }
    }
    return undefined;
  }

  private async collect(ctx: ExecutionContext, status: JobStatus): Promise<CollectedArtifact[]> {
    const scopeVars = expressionScope(ctx);
    const declarations: ArtifactDeclaration[] = ctx.job.steps.flatMap((step) =>
      step.artifacts.map((a) => ({ name: renderString(a.name, scopeVars), path: renderString(a.path, scopeVars) })),
    );
    const outcome = await this.deps.collector.collect({
      jobId: ctx.job.id,
      jobSlug: ctx.jobSlug,
      status,
      workdir: ctx.workdir,
      declarations,
      logsDir: ctx.logsDir,
    });
    for (const warning of outcome.warnings) {
      ctx.warnings.push(warning);
      this.deps.executor.reporter.emit(diag("warn", warning.code, `[${ctx.job.id}] ${warning.message}`, { details: { job: ctx.job.id } }));
    }
    return outcome.artifacts;
  }
}

/** Current phase of one job; every change goes through the transition table. */
class PhaseTracker {
  phase: JobPhase = "pending";
  /** Set once the job has passed through `cancelling`. */
  cancelled = false;

  constructor(private readonly onChange: (from: JobPhase, to: JobPhase, event: JobEvent, status?: JobStatus) => void) {}

  move(event: JobEvent, status?: JobStatus): void {
    const from = this.phase;
    this.phase = nextPhase(from, event);
    if (event === "cancel") this.cancelled = true;
    this.onChange(from, this.phase, event, status);
  }
}

function firstStepError(job: JobSpec, steps: readonly StepResult[]): ErrorInfo | undefined {
  const failed = steps.find(
    (s) =>
      !s.cleanup &&
      (s.status === "failed" || s.status === "timed_out") &&
      s.error?.code !== "CANCELLED" &&
      job.steps[s.index]?.continue_on_error !== true,
  );
  return failed?.error;
}
