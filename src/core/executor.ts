import fs from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { type ExecutionContext, applyExports, expressionScope } from "./context.js";
import { describeCondition, evaluateCondition, isCleanup } from "./conditions.js";
import { StepFailure, StepTimeoutError, TeardownError, toErrorInfo } from "./errors.js";
import { renderString } from "./expression.js";
import { slugify } from "./run-id.js";
import { type CommandOutcome, type CommandRunner, shellArgv } from "../runner/command-runner.js";
import { type Reporter, diag } from "../report/reporter.js";
import { type SecretStore, resolveEnv } from "../security/secrets.js";
import type { StepResult } from "../types/job.js";
import type { StepDefinition } from "../types/pipeline.js";

/** Name of the variable that points a step at its env-export file. */
export const ENV_FILE_VAR = "PIPECTL_ENV";

export type ExecutorDeps = {
  runner: CommandRunner;
  secrets: SecretStore;
  reporter: Reporter;
  /** Used when neither the step nor its job names a shell. */
  shell: string;
  defaultStepTimeoutS: number;
};

export type StepsOutcome = {
  steps: StepResult[];
  /** AND over executed non-cleanup steps and the failure flag on entry. */
  passed: boolean;
};

const ENV_KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse `KEY=VALUE` lines written by a step. Blank lines and `#` comments are
 * ignored, later assignments win.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (!ENV_KEY_RE.test(key)) continue;
    out[key] = line.slice(eq + 1);
  }
  return out;
}

/**
 * Run the job's steps strictly in declaration order.
 *
 * Each step's condition is evaluated against the context as left by the
 * previous step. A failing ordinary step sets `ctx.failed`; a failing cleanup
 * step only adds a warning.
 */
export async function executeSteps(ctx: ExecutionContext, deps: ExecutorDeps): Promise<StepsOutcome> {
  await mkdir(ctx.logsDir, { recursive: true });
  await mkdir(ctx.jobDir, { recursive: true });

  const steps: StepResult[] = [];
  let passed = !ctx.failed;

  for (const [index, step] of ctx.job.steps.entries()) {
    const condition = describeCondition(step.if);
    const cleanup = isCleanup(step.if);
    const verdict = evaluateCondition(step.if, {
      failed: ctx.failed,
      cancelled: ctx.signal.aborted,
      event: ctx.event,
      matrix: ctx.job.matrix,
    });

    if (!verdict.run) {
      steps.push({
        index,
        name: step.name,
        condition,
        status: "skipped",
        cleanup,
        exitCode: null,
        durationMs: 0,
        skipReason: verdict.reason,
        exported: [],
      });
      deps.reporter.emit(
        diag("info", "STEP_SKIPPED", `[${ctx.job.id}] skip ${step.name} (${verdict.reason})`, {
          details: { job: ctx.job.id, step: step.name, reason: verdict.reason },
        }),
      );
      continue;
    }

    const result = await runStep(ctx, deps, step, index, cleanup, condition);
    steps.push(result);

    if (result.status === "passed" || result.error?.code === "CANCELLED") continue;

    if (cleanup) {
      const err = new TeardownError(`Cleanup step "${step.name}"`, result.error?.message ?? "failed");
      ctx.warnings.push({ code: err.code, message: err.message });
      deps.reporter.emit(diag("warn", err.code, `[${ctx.job.id}] ${err.message}`, { details: { job: ctx.job.id, step: step.name } }));
      continue;
    }

    if (step.continue_on_error) {
      ctx.warnings.push({ code: "STEP_FAILED_IGNORED", message: result.error?.message ?? `Step "${step.name}" failed` });
      deps.reporter.emit(
        diag("warn", "STEP_FAILED_IGNORED", `[${ctx.job.id}] ${step.name} failed, continuing`, { details: { job: ctx.job.id, step: step.name } }),
      );
      continue;
    }

    ctx.failed = true;
    passed = false;
    deps.reporter.emit(
      diag("error", result.error?.code ?? "STEP_FAILED", `[${ctx.job.id}] ${result.error?.message ?? step.name}`, {
        details: { job: ctx.job.id, step: step.name, exitCode: result.exitCode },
      }),
    );
  }

  return { steps, passed };
}

async function runStep(
  ctx: ExecutionContext,
  deps: ExecutorDeps,
  step: StepDefinition,
  index: number,
  cleanup: boolean,
  condition: string,
): Promise<StepResult> {
  const scope = expressionScope(ctx);
  const command = renderString(step.run, scope);
  const resolved = resolveEnv(step.env, deps.secrets, ctx.redactor, (v) => renderString(v, scope));
  for (const name of resolved.missing) {
    ctx.warnings.push({ code: "SECRET_MISSING", message: `Secret "${name}" is not set` });
    deps.reporter.emit(diag("warn", "SECRET_MISSING", `[${ctx.job.id}] secret ${name} is not set`, { details: { job: ctx.job.id, step: step.name } }));
  }

  const envFile = path.join(ctx.jobDir, `env-${index}`);
  await writeFile(envFile, "", "utf8");

  const timeoutS = step.timeout_s ?? deps.defaultStepTimeoutS;
  const timeoutMs = timeoutS > 0 ? timeoutS * 1000 : undefined;

  deps.reporter.emit(
    diag("info", "STEP_START", `[${ctx.job.id}] ${step.name}`, { details: { job: ctx.job.id, step: step.name, index } }),
  );

  const shell = step.shell ?? ctx.job.shell ?? deps.shell;
  const outcome = await deps.runner.run(shellArgv(shell, command), {
    cwd: ctx.workdir,
    env: { ...ctx.env, ...resolved.env, [ENV_FILE_VAR]: envFile },
    timeoutMs,
    // Cleanup must still run after cancellation, bounded only by its timeout.
    signal: cleanup ? undefined : ctx.signal,
  });

  // Exports are honoured whatever the exit status.
  const exported = fs.existsSync(envFile) ? applyExports(ctx, parseEnvFile(await readFile(envFile, "utf8"))) : [];

  const logPath = path.join(ctx.logsDir, `${String(index + 1).padStart(2, "0")}-${slugify(step.name)}.log`);
  await writeFile(logPath, ctx.redactor.redact(formatLog(command, outcome)), "utf8");

  const base = { index, name: step.name, condition, cleanup, exitCode: outcome.exitCode, durationMs: outcome.durationMs, logPath, exported };

  if (outcome.exitCode === 0 && !outcome.timedOut && !outcome.aborted) {
    return { ...base, status: "passed" };
  }
  if (outcome.aborted) {
    return { ...base, status: "failed", error: { code: "CANCELLED", message: `Step "${step.name}" was cancelled` } };
  }
  if (outcome.timedOut) {
    return { ...base, status: "timed_out", error: toErrorInfo(new StepTimeoutError(`Step "${step.name}"`, timeoutMs ?? 0)) };
  }
  return { ...base, status: "failed", error: toErrorInfo(new StepFailure(step.name, outcome.exitCode)) };
}

function formatLog(command: string, outcome: CommandOutcome): string {
  return [
    `$ ${command}`,
    "--- stdout ---",
    outcome.stdout.trimEnd(),
    "--- stderr ---",
    outcome.stderr.trimEnd(),
    `--- exit: ${outcome.exitCode ?? "none"} (${outcome.durationMs}ms) ---`,
    "",
  ].join("\n");
}
