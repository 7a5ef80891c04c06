import { InvalidAxisError, PipelineConfigError } from "./errors.js";
import { renderRecord, renderString } from "./expression.js";
import type { AxisSet, JobTemplate, MatrixOverride, PipelineDefinition } from "../types/pipeline.js";
import type { JobSpec } from "../types/job.js";

export type MatrixCombination = {
  /** Axis values in declared axis order. */
  values: Record<string, string>;
  env: Record<string, string>;
};

export type ExpandOptions = {
  overrides?: readonly MatrixOverride[];
  exclude?: readonly Record<string, string>[];
  /** Defaults the override env is merged over. */
  env?: Readonly<Record<string, string>>;
};

/**
 * Cartesian product of the axis values.
 *
 * The first declared axis varies slowest and values keep their declared
 * order, so the output is the lexicographic order over axis-value indices.
 * Every override whose `match` is a subset of a combination is merged over
 * the defaults, in declaration order.
 */
export function expandMatrix(axes: AxisSet, opts: ExpandOptions = {}): MatrixCombination[] {
  const names = Object.keys(axes);
  if (names.length === 0) {
    throw new InvalidAxisError("Matrix declares no axes");
  }

  for (const name of names) {
    const values = axes[name];
    if (!Array.isArray(values) || values.length === 0) {
      throw new InvalidAxisError(`Axis "${name}" has no values`);
    }
    const seen = new Set<string>();
    for (const value of values) {
      if (seen.has(value)) {
        throw new InvalidAxisError(`Axis "${name}" lists "${value}" more than once`);
      }
      seen.add(value);
    }
  }

  const overrides = opts.overrides ?? [];
  const exclude = opts.exclude ?? [];
  overrides.forEach((o, i) => checkSelector(axes, o.match, `override #${i + 1}`));
  exclude.forEach((e, i) => checkSelector(axes, e, `exclude #${i + 1}`));

  let combos: Record<string, string>[] = [{}];
  for (const name of names) {
    const next: Record<string, string>[] = [];
    for (const combo of combos) {
      for (const value of axes[name]) {
        next.push({ ...combo, [name]: value });
      }
    }
    combos = next;
  }

  const kept = combos.filter((values) => !exclude.some((sel) => matches(values, sel)));
  if (kept.length === 0) {
    throw new InvalidAxisError("Matrix excludes every combination");
  }

  return kept.map((values) => {
    let env: Record<string, string> = { ...(opts.env ?? {}) };
    for (const override of overrides) {
      if (matches(values, override.match)) {
        env = { ...env, ...(override.env ?? {}) };
      }
    }
    return { values, env };
  });
}

/** True when every key of `selector` has the same value in `values`. */
export function matches(values: Readonly<Record<string, string>>, selector: Readonly<Record<string, string>>): boolean {
  return Object.entries(selector).every(([axis, value]) => values[axis] === value);
}

function checkSelector(axes: AxisSet, selector: Record<string, string>, label: string): void {
  const entries = Object.entries(selector);
  if (entries.length === 0) {
    throw new InvalidAxisError(`${label} matches no axis`);
  }
  for (const [axis, value] of entries) {
    const values = axes[axis];
    if (!Object.prototype.hasOwnProperty.call(axes, axis) || !Array.isArray(values)) {
      throw new InvalidAxisError(`${label} references undefined axis "${axis}"`);
    }
    if (!values.includes(value)) {
      throw new InvalidAxisError(`${label} references undefined value "${value}" of axis "${axis}"`);
    }
  }
}

/** Job identity: template name plus the ordered axis values. */
export function jobId(template: string, values: Readonly<Record<string, string>>): string {
  const parts = Object.values(values);
  return parts.length === 0 ? template : `${template} (${parts.join(", ")})`;
}

/** Expand one job template into its frozen JobSpecs. */
export function expandJob(template: JobTemplate, pipelineEnv: Readonly<Record<string, string>> = {}): JobSpec[] {
  const defaults = { ...pipelineEnv, ...template.env };
  const combos: MatrixCombination[] = template.matrix
    ? expandMatrix(template.matrix.axes, {
        overrides: template.matrix.overrides,
        exclude: template.matrix.exclude,
        env: defaults,
      })
    : [{ values: {}, env: defaults }];

  return combos.map((combo) => {
    const scope = { matrix: combo.values, env: combo.env };
    const runsOn =
      template.runs_on === undefined
        ? null
        : typeof template.runs_on === "string"
          ? renderString(template.runs_on, scope)
          : Object.freeze(template.runs_on.map((label) => renderString(label, scope)));

    const spec: JobSpec = {
      id: jobId(template.name, combo.values),
      template: template.name,
      matrix: Object.freeze({ ...combo.values }),
      env: Object.freeze(renderRecord(combo.env, scope)),
      runsOn,
      ...(template.shell !== undefined ? { shell: renderString(template.shell, scope) } : {}),
      steps: Object.freeze(template.steps.map((s) => Object.freeze({ ...s }))),
      resources: Object.freeze(template.resources.map((r) => Object.freeze({ ...r }))),
    };
    return Object.freeze(spec);
  });
}

/** Expand every template; template order, then combination order. */
export function expandPipeline(pipeline: PipelineDefinition): JobSpec[] {
  const jobs = pipeline.jobs.flatMap((t) => expandJob(t, pipeline.env));
  const seen = new Set<string>();
  for (const job of jobs) {
    if (seen.has(job.id)) {
      throw new PipelineConfigError(`Duplicate job id: ${job.id}`);
    }
    seen.add(job.id);
  }
  return jobs;
}
