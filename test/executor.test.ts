import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { createExecutionContext, type ExecutionContext } from "../src/core/context.js";
import { ENV_FILE_VAR, type ExecutorDeps, executeSteps, parseEnvFile } from "../src/core/executor.js";
import { MemoryReporter } from "../src/report/reporter.js";
import { Redactor } from "../src/security/secrets.js";
import type { JobSpec } from "../src/types/job.js";
import type { TriggerKind } from "../src/types/pipeline.js";
import { ALWAYS, FakeRunner, MapSecretStore, makeJob, sleep, step, tmpDir } from "./fakes.js";

function setup(job: JobSpec, opts: { event?: TriggerKind; signal?: AbortSignal; secrets?: Record<string, string>; defaultStepTimeoutS?: number } = {}) {
  const root = tmpDir();
  const ctx: ExecutionContext = createExecutionContext({
    runId: "run-1",
    job,
    jobSlug: "job",
    event: { kind: opts.event ?? "push", ref: "refs/heads/main", repository: "acme/widgets" },
    signal: opts.signal ?? new AbortController().signal,
    workdir: root,
    jobDir: path.join(root, "job"),
    logsDir: path.join(root, "job", "logs"),
    redactor: new Redactor(),
  });
  const runner = new FakeRunner();
  const reporter = new MemoryReporter();
  const deps: ExecutorDeps = {
    runner,
    secrets: new MapSecretStore(opts.secrets ?? {}),
    reporter,
    shell: "bash",
    defaultStepTimeoutS: opts.defaultStepTimeoutS ?? 60,
  };
  return { ctx, deps, runner, reporter };
}

describe("executeSteps", () => {
  it("skips ordinary steps after a failure but still runs cleanup", async () => {
    const { ctx, deps, runner } = setup(
      makeJob({
        steps: [step("A", "echo hello"), step("B", "fail 2"), step("C", "echo never"), step("D", "echo cleanup", { if: ALWAYS })],
      }),
    );

    const out = await executeSteps(ctx, deps);

    expect(out.passed).toBe(false);
    expect(ctx.failed).toBe(true);
    expect(out.steps.map((s) => s.status)).toEqual(["passed", "failed", "skipped", "passed"]);
    expect(out.steps[1].exitCode).toBe(2);
    expect(out.steps[1].error).toEqual({ code: "STEP_FAILED", message: 'Step "B" exited with code 2' });
    expect(out.steps[2].skipReason).toBe("prior_failure");
    expect(out.steps[3].cleanup).toBe(true);
    expect(runner.scripts()).toEqual(["echo hello", "fail 2", "echo cleanup"]);
  });

  it("runs commands through the configured shell in the workdir", async () => {
    const { ctx, deps, runner } = setup(makeJob({ steps: [step("A", "echo hi")] }));
    await executeSteps(ctx, deps);
    expect(runner.calls[0].argv).toEqual(["bash", "--noprofile", "--norc", "-eo", "pipefail", "-c", "echo hi"]);
    expect(runner.calls[0].opts.cwd).toBe(ctx.workdir);
    expect(runner.calls[0].opts.timeoutMs).toBe(60000);
  });

  it("prefers the step's shell, then the job's, over the configured one", async () => {
    const { ctx, deps, runner } = setup(
      makeJob({ shell: "sh", steps: [step("A", "echo job"), step("B", "echo step", { shell: "pwsh" })] }),
    );

    await executeSteps(ctx, deps);

    expect(runner.calls.map((c) => c.argv)).toEqual([
      ["sh", "-e", "-c", "echo job"],
      ["pwsh", "-NoProfile", "-NonInteractive", "-Command", "echo step"],
    ]);
  });

  it("writes one log per executed step", async () => {
    const { ctx, deps } = setup(makeJob({ steps: [step("Say Hello", "echo hello")] }));
    const out = await executeSteps(ctx, deps);
    const logPath = path.join(ctx.logsDir, "01-say-hello.log");
    expect(out.steps[0].logPath).toBe(logPath);
    expect(fs.readFileSync(logPath, "utf8")).toBe(
      ["$ echo hello", "--- stdout ---", "hello", "--- stderr ---", "", "--- exit: 0 (5ms) ---", ""].join("\n"),
    );
  });

  it("gates steps on the trigger kind", async () => {
    const job = makeJob({
      steps: [
        step("e2e push", "echo push", { if: { kind: "on_event", event: "push" } }),
        step("e2e pr", "echo pr", { if: { kind: "on_event", event: "pull_request" } }),
      ],
    });

    const onPush = setup(job, { event: "push" });
    const pushOut = await executeSteps(onPush.ctx, onPush.deps);
    expect(onPush.runner.scripts()).toEqual(["echo push"]);
    expect(pushOut.steps[1]).toMatchObject({ status: "skipped", skipReason: "condition", exitCode: null, durationMs: 0 });
    expect(pushOut.passed).toBe(true);

    const onPr = setup(job, { event: "pull_request" });
    await executeSteps(onPr.ctx, onPr.deps);
    expect(onPr.runner.scripts()).toEqual(["echo pr"]);
  });

  it("makes exported variables visible to later steps", async () => {
    const { ctx, deps, runner } = setup(
      makeJob({ steps: [step("version", "export VERSION=1.2.3"), step("use", "echo ${{ env.VERSION }}")] }),
    );

    const out = await executeSteps(ctx, deps);

    expect(out.steps[0].exported).toEqual(["VERSION"]);
    expect(ctx.env.VERSION).toBe("1.2.3");
    expect(runner.scripts()).toEqual(["export VERSION=1.2.3", "echo 1.2.3"]);
    expect(runner.calls[1].opts.env.VERSION).toBe("1.2.3");
    expect(runner.calls[1].opts.env[ENV_FILE_VAR]).toBe(path.join(ctx.jobDir, "env-1"));
  });

  it("keeps going after a step marked continue_on_error", async () => {
    const { ctx, deps, runner } = setup(
      makeJob({ steps: [step("lint", "fail", { continue_on_error: true }), step("test", "echo ok")] }),
    );

    const out = await executeSteps(ctx, deps);

    expect(out.passed).toBe(true);
    expect(ctx.failed).toBe(false);
    expect(out.steps.map((s) => s.status)).toEqual(["failed", "passed"]);
    expect(ctx.warnings).toEqual([{ code: "STEP_FAILED_IGNORED", message: 'Step "lint" exited with code 1' }]);
    expect(runner.scripts()).toEqual(["fail", "echo ok"]);
  });

  it("reports a failed cleanup step as a warning only", async () => {
    const { ctx, deps, reporter } = setup(makeJob({ steps: [step("build", "echo ok"), step("teardown", "fail", { if: ALWAYS })] }));

    const out = await executeSteps(ctx, deps);

    expect(out.passed).toBe(true);
    expect(ctx.failed).toBe(false);
    expect(ctx.warnings).toEqual([
      { code: "TEARDOWN_FAILED", message: 'Cleanup step "teardown": Step "teardown" exited with code 1' },
    ]);
    expect(reporter.codes()).toContain("TEARDOWN_FAILED");
  });

  it("injects secrets and masks them in logs", async () => {
    const { ctx, deps, runner } = setup(
      makeJob({ steps: [step("deploy", "echo test-secret", { env: { TOKEN: { secret: "DEPLOY_TOKEN" } } })] }),
      { secrets: { DEPLOY_TOKEN: "test-secret" } },
    );

    const out = await executeSteps(ctx, deps);

    expect(runner.calls[0].opts.env.TOKEN).toBe("test-secret");
    const log = fs.readFileSync(out.steps[0].logPath ?? "", "utf8");
    expect(log.split("\n").slice(0, 3)).toEqual(["$ echo ***", "--- stdout ---", "***"]);
  });

  it("warns about a missing secret and runs the step with an empty value", async () => {
    const { ctx, deps, runner, reporter } = setup(
      makeJob({ steps: [step("deploy", "echo x", { env: { TOKEN: { secret: "DEPLOY_TOKEN" } } })] }),
    );

    const out = await executeSteps(ctx, deps);

    expect(out.steps[0].status).toBe("passed");
    expect(runner.calls[0].opts.env.TOKEN).toBe("");
    expect(ctx.warnings).toEqual([{ code: "SECRET_MISSING", message: 'Secret "DEPLOY_TOKEN" is not set' }]);
    expect(reporter.codes()).toContain("SECRET_MISSING");
  });

  it("fails a step that exceeds its timeout", async () => {
    const { ctx, deps, runner } = setup(makeJob({ steps: [step("slow", "timeout", { timeout_s: 2 })] }));

    const out = await executeSteps(ctx, deps);

    expect(runner.calls[0].opts.timeoutMs).toBe(2000);
    expect(out.steps[0].status).toBe("timed_out");
    expect(out.steps[0].error).toEqual({ code: "STEP_TIMEOUT", message: 'Step "slow" timed out after 2000ms' });
    expect(ctx.failed).toBe(true);
  });

  it("runs without a timeout when the default is zero", async () => {
    const { ctx, deps, runner } = setup(makeJob({ steps: [step("A", "echo")] }), { defaultStepTimeoutS: 0 });
    await executeSteps(ctx, deps);
    expect(runner.calls[0].opts.timeoutMs).toBeUndefined();
  });

  it("skips ordinary steps once cancelled but still runs cleanup without the signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));
    const { ctx, deps, runner } = setup(makeJob({ steps: [step("build", "echo build"), step("cleanup", "echo bye", { if: ALWAYS })] }), {
      signal: controller.signal,
    });

    const out = await executeSteps(ctx, deps);

    expect(out.steps[0]).toMatchObject({ status: "skipped", skipReason: "cancelled" });
    expect(out.steps[1].status).toBe("passed");
    expect(runner.scripts()).toEqual(["echo bye"]);
    expect(runner.calls[0].opts.signal).toBeUndefined();
  });

  it("marks a step interrupted by cancellation without failing the job", async () => {
    const controller = new AbortController();
    const { ctx, deps } = setup(
      makeJob({ steps: [step("wait", "sleep 5000"), step("next", "echo next"), step("cleanup", "echo bye", { if: ALWAYS })] }),
      { signal: controller.signal },
    );

    const running = executeSteps(ctx, deps);
    await sleep(20);
    controller.abort(new Error("cancelled"));
    const out = await running;

    expect(out.steps[0].error).toEqual({ code: "CANCELLED", message: 'Step "wait" was cancelled' });
    expect(out.steps[1]).toMatchObject({ status: "skipped", skipReason: "cancelled" });
    expect(out.steps[2].status).toBe("passed");
    expect(ctx.failed).toBe(false);
  });
});

describe("parseEnvFile", () => {
  it("reads KEY=VALUE lines, later ones winning", () => {
    expect(parseEnvFile("A=1\n# comment\n\nC=a=b\r\nA=2\n")).toEqual({ A: "2", C: "a=b" });
  });

  it("ignores lines without a valid key", () => {
    expect(parseEnvFile("=x\nnoequals\n1BAD=y\nGOOD_1=\n")).toEqual({ GOOD_1: "" });
  });
});
