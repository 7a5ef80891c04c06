import type { ErrorInfo } from "../types/job.js";

/**
 * Base class for every error the orchestrator raises on purpose.
 * `code` is stable and shows up in diagnostics and result files.
 */
export class PipectlError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed matrix configuration; fatal before any job starts. */
export class InvalidAxisError extends PipectlError {
  constructor(message: string) {
    super("INVALID_AXIS", message);
  }
}

/** Orchestrator configuration that fails to load or validate. */
export class ConfigError extends PipectlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/** Pipeline file that does not match the schema or is otherwise unusable. */
export class PipelineConfigError extends PipectlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

/**
 * External resource acquisition failed. Fails the owning job only.
 * A wait that ran out of time keeps the STEP_TIMEOUT code.
 */
export class ProvisionError extends PipectlError {
  readonly resource: string;
  readonly timedOut: boolean;

  constructor(resource: string, message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(options?.timedOut ? "STEP_TIMEOUT" : "PROVISION_FAILED", message, { cause: options?.cause });
    this.resource = resource;
    this.timedOut = options?.timedOut === true;
  }
}

/** A step command exited non-zero. */
export class StepFailure extends PipectlError {
  readonly exitCode: number | null;

  constructor(step: string, exitCode: number | null) {
    super("STEP_FAILED", `Step "${step}" exited with ${exitCode === null ? "no exit code" : `code ${exitCode}`}`);
    this.exitCode = exitCode;
  }
}

/** A step or a resource wait exceeded its bound. Counts as a step failure. */
export class StepTimeoutError extends PipectlError {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super("STEP_TIMEOUT", `${what} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Cleanup (an `always` step or a resource release) failed. Reported, never masks the job status. */
export class TeardownError extends PipectlError {
  constructor(what: string, message: string, options?: { cause?: unknown }) {
    super("TEARDOWN_FAILED", `${what}: ${message}`, options);
  }
}

/** Orchestrator bug or crash. Aborts the whole run. */
export class OrchestratorError extends PipectlError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, options);
  }
}

/** True when `e`, or any error in its cause chain, is a timeout. */
export function causedByTimeout(e: unknown): boolean {
  let cur: unknown = e;
  while (cur instanceof Error) {
    if (cur instanceof StepTimeoutError) return true;
    if (cur instanceof ProvisionError && cur.timedOut) return true;
    cur = cur.cause;
  }
  return false;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Flatten any thrown value into the `{ code, message }` pair stored in results. */
export function toErrorInfo(e: unknown, fallbackCode = "ERROR"): ErrorInfo {
  if (e instanceof PipectlError) return { code: e.code, message: e.message };
  return { code: fallbackCode, message: errorMessage(e) };
}
