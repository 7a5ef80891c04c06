import type { CollectedArtifact, JobStatus } from "./job.js";

export const MANIFEST_VERSION = "1.0.0";

/** Per-job artifact manifest, written as artifacts/<job>/manifest.json. */
export type JobManifest = {
  schema_version: typeof MANIFEST_VERSION;
  run_id: string;
  job_id: string;
  job_status: JobStatus;
  created_at: string;
  artifacts: CollectedArtifact[];
};
