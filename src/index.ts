export { expandMatrix, expandJob, expandPipeline, jobId, matches } from "./core/matrix.js";
export type { MatrixCombination, ExpandOptions } from "./core/matrix.js";
export { evaluateCondition, describeCondition, isCleanup } from "./core/conditions.js";
export { renderString, renderRecord } from "./core/expression.js";
export type { ExpressionScope } from "./core/expression.js";
export { executeSteps, parseEnvFile, ENV_FILE_VAR } from "./core/executor.js";
export type { ExecutorDeps, StepsOutcome } from "./core/executor.js";
export { ResourceScope, renderResourceSpec } from "./core/provisioner.js";
export type { ProvisionedResource, ProvisionContext, ResourceProvider, ProviderRegistry } from "./core/provisioner.js";
export { nextPhase, isTerminal } from "./core/state-machine.js";
export type { JobEvent } from "./core/state-machine.js";
export { JobOrchestrator } from "./core/orchestrator.js";
export type { JobRunner, OrchestratorDeps } from "./core/orchestrator.js";
export { JobScheduler, aggregateStatus } from "./core/scheduler.js";
export type { SchedulerOptions } from "./core/scheduler.js";
export { RunStore, loadRunState, listRuns } from "./core/run-store.js";
export type { RunState } from "./core/run-store.js";
export * from "./core/errors.js";
export { ArtifactCollector, STEP_LOGS_ARTIFACT } from "./artifact-writer/writer.js";
export { ToolProvider } from "./resources/tool.js";
export { KindClusterProvider } from "./resources/kind-cluster.js";
export { ExecFileCommandRunner, shellArgv } from "./runner/command-runner.js";
export type { CommandRunner, CommandOutcome, RunOptions as CommandRunOptions } from "./runner/command-runner.js";
export { EnvSecretStore, Redactor, REDACTED } from "./security/secrets.js";
export type { SecretStore } from "./security/secrets.js";
export { createReporter, MemoryReporter } from "./report/reporter.js";
export type { Diagnostic, Reporter, OutputFormat } from "./report/reporter.js";
export { loadConfig } from "./config/loader.js";
export { loadPipeline, parsePipeline } from "./config/pipeline-loader.js";
export { run } from "./commands/run.js";
export type { RunOptions, RunResult } from "./commands/run.js";
export { EXIT } from "./commands/exit-codes.js";
export type * from "./types/pipeline.js";
export type * from "./types/job.js";
export type { PipectlConfig } from "./types/config.js";
