import fs from "node:fs";
import YAML from "yaml";
import { PipelineConfigError } from "../core/errors.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import type {
  EnvValue,
  JobTemplate,
  MatrixDefinition,
  PipelineDefinition,
  ResourceSpec,
  RunCondition,
  StepDefinition,
} from "../types/pipeline.js";

type Scalar = string | number | boolean;
type ScalarMap = Record<string, Scalar>;

/** Shape accepted by pipeline.schema.json, before normalization. */
export type RawCondition = "always" | "on_success" | "on_failure" | { event: "push" | "pull_request" } | { matrix: ScalarMap };

export type RawStep = {
  name?: string;
  run: string;
  if?: RawCondition;
  env?: Record<string, Scalar | { secret: string }>;
  artifacts?: { name: string; path: string }[];
  timeout_s?: number;
  continue_on_error?: boolean;
  shell?: string;
};

export type RawJob = {
  name: string;
  runs_on?: string | string[];
  shell?: string;
  matrix?: {
    axes: Record<string, Scalar[]>;
    overrides?: { match: ScalarMap; env?: ScalarMap }[];
    exclude?: ScalarMap[];
  };
  env?: ScalarMap;
  resources?: ResourceSpec[];
  steps: RawStep[];
};

export type RawPipeline = {
  name: string;
  env?: ScalarMap;
  jobs: RawJob[];
};

const STEP_NAME_MAX = 40;

function strings(map: ScalarMap | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    out[key] = String(value);
  }
  return out;
}

export function normalizeCondition(raw: RawCondition | undefined): RunCondition {
  if (raw === undefined) return { kind: "on_success" };
  if (typeof raw === "string") return { kind: raw };
  if ("event" in raw) return { kind: "on_event", event: raw.event };
  return { kind: "on_matrix", values: strings(raw.matrix) };
}

/** Unnamed steps take the first line of their command. */
export function defaultStepName(run: string): string {
  const first = run.trim().split("\n")[0]?.trim() ?? "";
  if (first.length === 0) return "step";
  return first.length > STEP_NAME_MAX ? `${first.slice(0, STEP_NAME_MAX - 3)}...` : first;
}

function normalizeStep(raw: RawStep): StepDefinition {
  const env: Record<string, EnvValue> = {};
  for (const [key, value] of Object.entries(raw.env ?? {})) {
    env[key] = typeof value === "object" ? { secret: value.secret } : String(value);
  }
  return {
    name: raw.name ?? defaultStepName(raw.run),
    run: raw.run,
    if: normalizeCondition(raw.if),
    env,
    artifacts: (raw.artifacts ?? []).map((a) => ({ name: a.name, path: a.path })),
    timeout_s: raw.timeout_s,
    continue_on_error: raw.continue_on_error ?? false,
    ...(raw.shell !== undefined ? { shell: raw.shell } : {}),
  };
}

function normalizeMatrix(raw: NonNullable<RawJob["matrix"]>): MatrixDefinition {
  const axes: Record<string, string[]> = {};
  for (const [axis, values] of Object.entries(raw.axes)) {
    axes[axis] = values.map(String);
  }
  return {
    axes,
    overrides: raw.overrides?.map((o) => ({ match: strings(o.match), env: strings(o.env) })),
    exclude: raw.exclude?.map(strings),
  };
}

function normalizeJob(raw: RawJob): JobTemplate {
  return {
    name: raw.name,
    runs_on: raw.runs_on,
    ...(raw.shell !== undefined ? { shell: raw.shell } : {}),
    matrix: raw.matrix ? normalizeMatrix(raw.matrix) : undefined,
    env: strings(raw.env),
    resources: raw.resources ?? [],
    steps: raw.steps.map(normalizeStep),
  };
}

/** Validate a parsed document and turn it into a PipelineDefinition. */
export function parsePipeline(data: unknown, registry: SchemaRegistry = createRegistry()): PipelineDefinition {
  const isRaw = registry.guard<RawPipeline>("pipeline");
  if (!isRaw(data)) {
    throw new PipelineConfigError(`Invalid pipeline: ${registry.lastErrors("pipeline")}`);
  }

  const seen = new Set<string>();
  for (const job of data.jobs) {
    if (seen.has(job.name)) {
      throw new PipelineConfigError(`Duplicate job name: ${job.name}`);
    }
    seen.add(job.name);
  }

  return { name: data.name, env: strings(data.env), jobs: data.jobs.map(normalizeJob) };
}

export function loadPipeline(filePath: string, registry?: SchemaRegistry): PipelineDefinition {
  if (!fs.existsSync(filePath)) {
    throw new PipelineConfigError(`Pipeline file not found: ${filePath}`);
  }
  let data: unknown;
  try {
    data = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    throw new PipelineConfigError(`Cannot parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  return parsePipeline(data, registry);
}
