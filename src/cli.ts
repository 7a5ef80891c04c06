#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from "commander";
import { listArtifacts } from "./commands/artifacts.js";
import { EXIT } from "./commands/exit-codes.js";
import { formatPlan, plan } from "./commands/plan.js";
import { formatRunSummary, run } from "./commands/run.js";
import { formatRunState, listRunStatuses, status } from "./commands/status.js";
import { validatePipeline } from "./commands/validate.js";
import { loadConfig } from "./config/loader.js";
import { type OutputFormat, createReporter, diag } from "./report/reporter.js";
import { Redactor } from "./security/secrets.js";
import { TRIGGER_KINDS, type TriggerKind } from "./types/pipeline.js";

const FORMATS: readonly OutputFormat[] = ["human", "jsonl"];

function parseFormat(value: string): OutputFormat {
  const found = FORMATS.find((f) => f === value);
  if (!found) throw new InvalidArgumentError(`Expected one of: ${FORMATS.join(", ")}`);
  return found;
}

function parseEvent(value: string): TriggerKind {
  const found = TRIGGER_KINDS.find((k) => k === value);
  if (!found) throw new InvalidArgumentError(`Expected one of: ${TRIGGER_KINDS.join(", ")}`);
  return found;
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError("Expected a non-negative integer");
  return Number(value);
}

function formatOption(): Option {
  return new Option("--format <format>", "Output format: human|jsonl").argParser(parseFormat).default("human");
}

/** Runs directory: explicit flag, else the configured one. */
function runsDirFor(opts: { runsDir?: string; config?: string; env?: string }): string {
  return opts.runsDir ?? loadConfig({ configDir: opts.config, envName: opts.env }).runs_dir;
}

function fail(format: OutputFormat, code: string, message: string, exitCode: number): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify(diag("error", code, message)) + "\n");
  } else {
    console.error(message);
  }
  process.exitCode = exitCode;
}

const program = new Command();

program
  .name("pipectl")
  .description("Run matrix CI pipelines with resource provisioning and guaranteed cleanup")
  .version("0.1.0");

program
  .command("run")
  .description("Expand and run a pipeline")
  .argument("<pipeline>", "Pipeline YAML file")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config environment layer (config/<name>.yaml)")
  .addOption(new Option("--event <kind>", "Trigger event: push|pull_request").argParser(parseEvent).default("push"))
  .option("--ref <ref>", "Git ref of the trigger (default: current branch)")
  .option("--repository <name>", "Repository (default: from the origin remote)")
  .option("--sha <sha>", "Commit SHA (default: HEAD)")
  .option("--workdir <path>", "Working directory for steps and artifacts")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--max-parallel <n>", "Maximum concurrent jobs, 0 for unbounded", parseCount)
  .option("--fail-fast", "Cancel remaining jobs after the first failure")
  .option("--job <glob>", "Only run job templates matching this glob")
  .addOption(formatOption())
  .action(
    async (
      pipeline: string,
      opts: {
        config?: string;
        env?: string;
        event: TriggerKind;
        ref?: string;
        repository?: string;
        sha?: string;
        workdir?: string;
        runsDir?: string;
        maxParallel?: number;
        failFast?: boolean;
        job?: string;
        format: OutputFormat;
      },
    ) => {
      const redactor = new Redactor();
      const reporter = createReporter({ format: opts.format, mask: (t) => redactor.redact(t) });
      const controller = new AbortController();
      const stop = (signal: NodeJS.Signals) => {
        reporter.emit(diag("warn", "CANCEL_REQUESTED", `${signal} received, cancelling running jobs`));
        controller.abort(new Error(`${signal} received`));
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);

      try {
        const res = await run({
          pipelinePath: pipeline,
          event: opts.event,
          ref: opts.ref,
          repository: opts.repository,
          sha: opts.sha,
          configDir: opts.config,
          envName: opts.env,
          workdir: opts.workdir,
          runsDir: opts.runsDir,
          maxParallel: opts.maxParallel,
          failFast: opts.failFast,
          jobGlob: opts.job,
          reporter,
          redactor,
          signal: controller.signal,
        });

        if (!res.ok) {
          fail(opts.format, res.error.code, res.error.message, res.exitCode);
          return;
        }
        if (opts.format === "human") {
          console.log(formatRunSummary(res.result));
        }
        process.exitCode = res.exitCode;
      } finally {
        process.removeListener("SIGINT", stop);
        process.removeListener("SIGTERM", stop);
      }
    },
  );

program
  .command("plan")
  .description("Print the jobs a pipeline expands to, without running them")
  .argument("<pipeline>", "Pipeline YAML file")
  .option("--job <glob>", "Only show job templates matching this glob")
  .addOption(formatOption())
  .action((pipeline: string, opts: { job?: string; format: OutputFormat }) => {
    const res = plan({ pipelinePath: pipeline, jobGlob: opts.job });
    if (!res.ok) {
      fail(opts.format, res.error.code, res.error.message, EXIT.INVALID_CONFIG);
      return;
    }
    if (opts.format === "jsonl") {
      for (const job of res.jobs) process.stdout.write(JSON.stringify(job) + "\n");
    } else {
      console.log(formatPlan(res.pipeline, res.jobs));
    }
  });

program
  .command("validate")
  .description("Validate config and a pipeline file")
  .argument("<pipeline>", "Pipeline YAML file")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .option("--env <name>", "Config environment layer")
  .addOption(formatOption())
  .action((pipeline: string, opts: { config?: string; env?: string; format: OutputFormat }) => {
    const reporter = createReporter({ format: opts.format });
    const res = validatePipeline({ pipelinePath: pipeline, configDir: opts.config, envName: opts.env });
    if (!res.ok) {
      for (const err of res.errors) reporter.emit(err);
      process.exitCode = EXIT.INVALID_CONFIG;
      return;
    }
    for (const d of res.diagnostics) reporter.emit(d);
  });

program
  .command("status")
  .description("Show a run's state, or list runs")
  .argument("[runId]", "Run ID (omit to list all)")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .addOption(formatOption())
  .action((runId: string | undefined, opts: { runsDir?: string; config?: string; format: OutputFormat }) => {
    const runsDir = runsDirFor(opts);
    if (runId) {
      const res = status({ runsDir, runId });
      if (!res.ok) {
        fail(opts.format, "RUN_NOT_FOUND", res.error, EXIT.PIPELINE_FAILED);
        return;
      }
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.state) + "\n");
      } else {
        console.log(formatRunState(res.state));
      }
      return;
    }

    const list = listRunStatuses({ runsDir });
    if (opts.format === "jsonl") {
      for (const item of list) process.stdout.write(JSON.stringify(item) + "\n");
    } else if (list.length === 0) {
      console.log("No runs found.");
    } else {
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.updated_at}`);
    }
  });

program
  .command("artifacts")
  .description("List collected artifacts of a run")
  .argument("<runId>", "Run ID")
  .option("--runs-dir <path>", "Runs directory (default: runs_dir from config)")
  .option("--config <path>", "Config directory (default: bundled config/)")
  .addOption(formatOption())
  .action((runId: string, opts: { runsDir?: string; config?: string; format: OutputFormat }) => {
    const res = listArtifacts({ runsDir: runsDirFor(opts), runId });
    if (!res.ok) {
      fail(opts.format, "RUN_NOT_FOUND", res.error, EXIT.PIPELINE_FAILED);
      return;
    }
    const reporter = createReporter({ format: opts.format });
    for (const skipped of res.skipped) reporter.emit(diag("warn", "MANIFEST_INVALID", skipped));
    if (opts.format === "jsonl") {
      for (const f of res.files) process.stdout.write(JSON.stringify(f) + "\n");
    } else {
      for (const f of res.files) console.log(`${f.path}  ${f.bytes} bytes  ${f.sha256.slice(0, 12)}`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ level: "error", code: "INTERNAL_ERROR", message }) + "\n");
  process.exitCode = EXIT.INTERNAL_ERROR;
});
