import { ConfigError, InvalidAxisError, PipelineConfigError } from "../core/errors.js";
import type { PipelineStatus } from "../types/job.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PIPELINE_FAILED: 1,
  PIPELINE_CANCELLED: 2,
  INVALID_CONFIG: 3,
  INTERNAL_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeForStatus(status: PipelineStatus): ExitCode {
  switch (status) {
    case "passed":
      return EXIT.SUCCESS;
    case "failed":
      return EXIT.PIPELINE_FAILED;
    case "cancelled":
      return EXIT.PIPELINE_CANCELLED;
  }
}

/** Errors raised before any job starts are configuration problems; anything else is ours. */
export function exitCodeForError(e: unknown): ExitCode {
  if (e instanceof ConfigError || e instanceof PipelineConfigError || e instanceof InvalidAxisError) {
    return EXIT.INVALID_CONFIG;
  }
  return EXIT.INTERNAL_ERROR;
}
