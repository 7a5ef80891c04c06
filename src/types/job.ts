import type { ResourceSpec, StepDefinition, TriggerEvent } from "./pipeline.js";

/** One concrete matrix combination of a job template. Immutable once expanded. */
export type JobSpec = Readonly<{
  id: string;
  template: string;
  /** Axis values in declared axis order. */
  matrix: Readonly<Record<string, string>>;
  env: Readonly<Record<string, string>>;
  runsOn: string | readonly string[] | null;
  shell?: string;
  steps: readonly StepDefinition[];
  resources: readonly ResourceSpec[];
}>;

export type JobPhase = "pending" | "provisioning" | "running" | "collecting" | "cancelling" | "done";

export type JobStatus = "passed" | "failed" | "cancelled";

export type StepStatus = "passed" | "failed" | "timed_out" | "skipped";

export type SkipReason = "condition" | "prior_failure" | "cancelled";

export type ErrorInfo = { code: string; message: string };

export type StepResult = {
  index: number;
  name: string;
  condition: string;
  status: StepStatus;
  /** Ran under an `always` condition; its outcome never decides the job status. */
  cleanup: boolean;
  exitCode: number | null;
  durationMs: number;
  skipReason?: SkipReason;
  error?: ErrorInfo;
  logPath?: string;
  exported: string[];
};

export type ResourceReport = {
  id: string;
  kind: string;
  name: string;
  status: "acquired" | "failed";
  error?: ErrorInfo;
};

export type TeardownReport = {
  id: string;
  kind: string;
  name: string;
  ok: boolean;
  error?: ErrorInfo;
};

export type CollectedFile = {
  path: string;
  sha256: string;
  bytes: number;
};

export type CollectedArtifact = {
  name: string;
  source: string;
  location: string;
  files: CollectedFile[];
};

export type JobWarning = {
  code: string;
  message: string;
};

/** Terminal record of one job. */
export type JobResult = Readonly<{
  jobId: string;
  template: string;
  matrix: Readonly<Record<string, string>>;
  runsOn: string | readonly string[] | null;
  status: JobStatus;
  steps: readonly StepResult[];
  resources: readonly ResourceReport[];
  artifacts: readonly CollectedArtifact[];
  teardown: readonly TeardownReport[];
  warnings: readonly JobWarning[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: ErrorInfo;
}>;

export type PipelineStatus = JobStatus;

export type PipelineResult = Readonly<{
  runId: string;
  status: PipelineStatus;
  event: TriggerEvent;
  /** Expansion order. */
  jobs: readonly JobResult[];
  byId: ReadonlyMap<string, JobResult>;
  startedAt: string;
  finishedAt: string;
}>;
