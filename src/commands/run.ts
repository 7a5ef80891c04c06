import path from "node:path";
import { selectJobs } from "./plan.js";
import { type ExitCode, EXIT, exitCodeForError, exitCodeForStatus } from "./exit-codes.js";
import { ArtifactCollector } from "../artifact-writer/writer.js";
import { loadConfig } from "../config/loader.js";
import { loadPipeline } from "../config/pipeline-loader.js";
import { PipelineConfigError, errorMessage, toErrorInfo } from "../core/errors.js";
import { expandPipeline } from "../core/matrix.js";
import { JobOrchestrator } from "../core/orchestrator.js";
import type { ProviderRegistry } from "../core/provisioner.js";
import { makeRunId, uniqueSlugs } from "../core/run-id.js";
import { RunStore } from "../core/run-store.js";
import { JobScheduler } from "../core/scheduler.js";
import { GitOperations, type GitReader, detectTrigger } from "../git/operations.js";
import { type Reporter, diag } from "../report/reporter.js";
import { KindClusterProvider } from "../resources/kind-cluster.js";
import { ToolProvider } from "../resources/tool.js";
import { type CommandRunner, ExecFileCommandRunner } from "../runner/command-runner.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import { EnvSecretStore, Redactor, type SecretStore } from "../security/secrets.js";
import type { PipectlConfig } from "../types/config.js";
import type { ErrorInfo, JobSpec, PipelineResult, PipelineStatus } from "../types/job.js";
import type { TriggerEvent, TriggerKind } from "../types/pipeline.js";

export type RunOptions = {
  pipelinePath: string;
  event: TriggerKind;
  ref?: string;
  repository?: string;
  sha?: string;
  configDir?: string;
  envName?: string;
  workdir?: string;
  runsDir?: string;
  maxParallel?: number;
  failFast?: boolean;
  /** minimatch pattern over job template names. */
  jobGlob?: string;
  reporter: Reporter;
  /** Shared with the reporter so its output is masked too. */
  redactor?: Redactor;
  signal?: AbortSignal;
  runId?: string;
  /** Injection points for tests. */
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  providers?: ProviderRegistry;
  secrets?: SecretStore;
  git?: GitReader;
  registry?: SchemaRegistry;
};

export type RunResult =
  | { ok: true; runId: string; status: PipelineStatus; exitCode: ExitCode; statePath: string; resultPath: string; result: PipelineResult }
  | { ok: false; runId?: string; statePath?: string; exitCode: ExitCode; error: ErrorInfo };

/**
 * Load, expand and execute a pipeline; persist state.json and result.json
 * under `<runs_dir>/<runId>/`.
 */
export async function run(opts: RunOptions): Promise<RunResult> {
  const workdir = path.resolve(opts.workdir ?? process.cwd());
  const registry = opts.registry ?? createRegistry();

  let config: PipectlConfig;
  let pipelineName: string;
  let jobs: JobSpec[];
  try {
    config = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env, registry });
    const pipeline = loadPipeline(path.resolve(workdir, opts.pipelinePath), registry);
    pipelineName = pipeline.name;
    jobs = selectJobs(expandPipeline(pipeline), opts.jobGlob);
    if (jobs.length === 0) {
      throw new PipelineConfigError(`No job matches "${opts.jobGlob ?? "*"}"`);
    }
  } catch (e: unknown) {
    return { ok: false, exitCode: exitCodeForError(e), error: toErrorInfo(e, "INTERNAL_ERROR") };
  }

  const event = await resolveTrigger(opts, workdir);
  const runId = opts.runId ?? makeRunId();
  const runsDir = path.resolve(workdir, opts.runsDir ?? config.runs_dir);
  const slugs = uniqueSlugs(jobs.map((j) => j.id));
  const store = new RunStore(runsDir, {
    runId,
    pipeline: pipelineName,
    event,
    jobs: jobs.map((j) => ({ id: j.id, slug: slugs.get(j.id) ?? j.id })),
  });

  const toolsDir = path.resolve(workdir, config.tools_dir);
  const runner = opts.runner ?? new ExecFileCommandRunner();
  const providers: ProviderRegistry = opts.providers ?? {
    tool: new ToolProvider({ toolsDir, runner }),
    cluster: new KindClusterProvider({
      runner,
      kindBin: config.cluster.kind_bin,
      kubectlBin: config.cluster.kubectl_bin,
      readyTimeoutS: config.cluster.ready_timeout_s,
    }),
  };

  const orchestrator = new JobOrchestrator({
    runId,
    event,
    workdir,
    workspaceExclude: [runsDir, toolsDir],
    runDir: store.dir,
    providers,
    executor: {
      runner,
      secrets: opts.secrets ?? new EnvSecretStore(opts.env ?? process.env),
      reporter: opts.reporter,
      shell: config.shell,
      defaultStepTimeoutS: config.default_step_timeout_s,
    },
    collector: new ArtifactCollector(runsDir, runId, registry),
    redactor: opts.redactor ?? new Redactor(),
    resourceTimeoutMs: config.resource_timeout_s * 1000,
    slugs,
    store,
  });
  const scheduler = new JobScheduler(orchestrator, {
    failFast: opts.failFast ?? config.fail_fast,
    maxParallel: opts.maxParallel ?? config.max_parallel,
  });

  opts.reporter.emit(
    diag("info", "RUN_START", `run ${runId}: ${pipelineName}, ${jobs.length} job(s), ${event.kind} ${event.ref}`.trimEnd(), {
      details: { runId, pipeline: pipelineName, jobs: jobs.map((j) => j.id), event },
    }),
  );

  let result: PipelineResult;
  try {
    result = await scheduler.run(jobs, { runId, event, signal: opts.signal });
  } catch (e: unknown) {
    store.finish("error");
    const error = toErrorInfo(e, "INTERNAL_ERROR");
    opts.reporter.emit(diag("error", error.code, error.message, { details: { runId } }));
    return { ok: false, runId, statePath: store.statePath, exitCode: EXIT.INTERNAL_ERROR, error };
  }

  const resultPath = store.writeResult(result);
  store.finish(result.status);
  opts.reporter.emit(
    diag(result.status === "passed" ? "info" : "error", "RUN_DONE", `run ${runId}: ${result.status}`, {
      details: { runId, status: result.status, jobs: result.jobs.map((j) => ({ id: j.jobId, status: j.status })) },
    }),
  );

  return {
    ok: true,
    runId,
    status: result.status,
    exitCode: exitCodeForStatus(result.status),
    statePath: store.statePath,
    resultPath,
    result,
  };
}

/** Explicit trigger values, completed from git where possible. */
async function resolveTrigger(opts: RunOptions, workdir: string): Promise<TriggerEvent> {
  const overrides = { kind: opts.event, ref: opts.ref, repository: opts.repository, sha: opts.sha };
  try {
    return await detectTrigger(overrides, opts.git ?? new GitOperations(workdir));
  } catch (e: unknown) {
    opts.reporter.emit(diag("warn", "GIT_METADATA_UNAVAILABLE", `Cannot read git metadata: ${errorMessage(e)}`));
    return {
      kind: opts.event,
      ref: opts.ref ?? "",
      repository: opts.repository ?? "",
      ...(opts.sha ? { sha: opts.sha } : {}),
    };
  }
}

/** Human summary: one line per job, then the failing steps of failed jobs. */
export function formatRunSummary(result: PipelineResult): string {
  const lines: string[] = [];
  for (const job of result.jobs) {
    lines.push(`${job.status.padEnd(9)} ${String(job.durationMs).padStart(7)}ms  ${job.jobId}`);
    if (job.error) lines.push(`          ${job.error.code}: ${job.error.message}`);
  }
  lines.push(`pipeline ${result.status} (run ${result.runId})`);
  return lines.join("\n");
}
