import fs from "node:fs";
import path from "node:path";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import type { JobPhase, JobStatus, PipelineResult } from "../types/job.js";
import type { TriggerEvent } from "../types/pipeline.js";

export const RUN_STATE_VERSION = "1.0.0";

export type RunStatus = "running" | JobStatus | "error";

export type JobRecord = {
  slug: string;
  phase: JobPhase;
  status?: JobStatus;
  updated_at: string;
};

/** Persistent run state stored in <runs_dir>/<runId>/state.json */
export type RunState = {
  schema_version: string;
  run_id: string;
  pipeline: string;
  event: TriggerEvent;
  status: RunStatus;
  created_at: string;
  updated_at: string;
  jobs: Record<string, JobRecord>;
};

function nowIso(): string {
  return new Date().toISOString();
}

export function runDir(runsDir: string, runId: string): string {
  return path.join(runsDir, runId);
}

export function statePathForRun(runsDir: string, runId: string): string {
  return path.join(runsDir, runId, "state.json");
}

/**
 * Owner of one run's state.json. Jobs update only their own record; the file
 * is rewritten as a whole after every change.
 */
export class RunStore {
  readonly dir: string;
  readonly statePath: string;
  private readonly state: RunState;

  constructor(runsDir: string, init: { runId: string; pipeline: string; event: TriggerEvent; jobs: readonly { id: string; slug: string }[] }) {
    this.dir = runDir(runsDir, init.runId);
    this.statePath = path.join(this.dir, "state.json");
    const now = nowIso();
    const jobs: Record<string, JobRecord> = {};
    for (const job of init.jobs) {
      jobs[job.id] = { slug: job.slug, phase: "pending", updated_at: now };
    }
    this.state = {
      schema_version: RUN_STATE_VERSION,
      run_id: init.runId,
      pipeline: init.pipeline,
      event: init.event,
      status: "running",
      created_at: now,
      updated_at: now,
      jobs,
    };
    this.save();
  }

  get snapshot(): Readonly<RunState> {
    return this.state;
  }

  jobPhase(jobId: string, phase: JobPhase, status?: JobStatus): void {
    const record = this.state.jobs[jobId];
    if (!record) {
      throw new Error(`Unknown job in run ${this.state.run_id}: ${jobId}`);
    }
    const now = nowIso();
    this.state.jobs[jobId] = { ...record, phase, ...(status ? { status } : {}), updated_at: now };
    this.state.updated_at = now;
    this.save();
  }

  finish(status: RunStatus): void {
    this.state.status = status;
    this.state.updated_at = nowIso();
    this.save();
  }

  /** Write result.json next to state.json. */
  writeResult(result: PipelineResult): string {
    const resultPath = path.join(this.dir, "result.json");
    const body = {
      run_id: result.runId,
      status: result.status,
      event: result.event,
      started_at: result.startedAt,
      finished_at: result.finishedAt,
      jobs: result.jobs,
    };
    fs.writeFileSync(resultPath, JSON.stringify(body, null, 2) + "\n", "utf8");
    return resultPath;
  }

  private save(): void {
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(this.statePath, JSON.stringify(this.state, null, 2) + "\n", "utf8");
  }
}

export type LoadedRun = { ok: true; state: RunState } | { ok: false; error: string };

export function loadRunState(runsDir: string, runId: string, registry: SchemaRegistry = createRegistry()): LoadedRun {
  const statePath = statePathForRun(runsDir, runId);
  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${runId}` };
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(statePath, "utf8"));
  } catch (e: unknown) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
  const isRunState = registry.guard<RunState>("run-state");
  if (!isRunState(data)) {
    return { ok: false, error: `Corrupted state for ${runId}: ${registry.lastErrors("run-state")}` };
  }
  return { ok: true, state: data };
}

export type RunSummary = { id: string; status: string; updated_at: string };

/** Every run under `runsDir`, most recently updated first. */
export function listRuns(runsDir: string, registry: SchemaRegistry = createRegistry()): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunSummary[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    if (!fs.existsSync(statePathForRun(runsDir, entry.name))) continue;

    const loaded = loadRunState(runsDir, entry.name, registry);
    results.push(
      loaded.ok
        ? { id: entry.name, status: loaded.state.status, updated_at: loaded.state.updated_at }
        : { id: entry.name, status: "corrupted", updated_at: "" },
    );
  }
  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
