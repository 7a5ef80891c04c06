import type { SchemaRegistry } from "../schema/registry.js";
import type { CollectedArtifact, JobStatus } from "../types/job.js";
import { type JobManifest, MANIFEST_VERSION } from "../types/manifest.js";

export type ManifestBuildInput = {
  runId: string;
  jobId: string;
  jobStatus: JobStatus;
  artifacts: readonly CollectedArtifact[];
  now?: Date;
};

export function buildManifest(input: ManifestBuildInput): JobManifest {
  return {
    schema_version: MANIFEST_VERSION,
    run_id: input.runId,
    job_id: input.jobId,
    job_status: input.jobStatus,
    created_at: (input.now ?? new Date()).toISOString(),
    artifacts: [...input.artifacts],
  };
}

/** Schema errors of a manifest, or null when it is valid. */
export function manifestErrors(manifest: JobManifest, registry: SchemaRegistry): string | null {
  const result = registry.validate("manifest", manifest);
  return result.valid ? null : result.errors;
}
