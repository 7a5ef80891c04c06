import fs from "node:fs";
import { cp, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { digestTree } from "./checksum.js";
import { buildManifest, manifestErrors } from "./manifest-builder.js";
import { errorMessage } from "../core/errors.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import { resolveInside, sanitizePathComponent } from "../security/secrets.js";
import type { CollectedArtifact, JobStatus, JobWarning } from "../types/job.js";
import type { ArtifactDeclaration } from "../types/pipeline.js";

/** Label under which captured step output is always collected. */
export const STEP_LOGS_ARTIFACT = "step-logs";

export type CollectInput = {
  jobId: string;
  jobSlug: string;
  status: JobStatus;
  /** Declared paths are resolved against this directory. */
  workdir: string;
  declarations: readonly ArtifactDeclaration[];
  logsDir: string;
};

export type CollectOutcome = {
  artifacts: CollectedArtifact[];
  warnings: JobWarning[];
  manifestPath: string;
};

/**
 * Copies a job's declared outputs into `<runs_dir>/<run>/artifacts/<job>/<name>/`
 * and writes a manifest with a SHA-256 for every file. Missing or unsafe
 * paths become warnings; collection never changes the job status.
 */
export class ArtifactCollector {
  private readonly root: string;
  private readonly registry: SchemaRegistry;

  constructor(
    runsDir: string,
    private readonly runId: string,
    registry?: SchemaRegistry,
  ) {
    this.root = path.join(runsDir, runId, "artifacts");
    this.registry = registry ?? createRegistry();
  }

  /** Destination directory of one job's artifacts. */
  jobDir(jobSlug: string): string {
    return path.join(this.root, jobSlug);
  }

  async collect(input: CollectInput): Promise<CollectOutcome> {
    const dest = this.jobDir(input.jobSlug);
    await mkdir(dest, { recursive: true });

    const artifacts: CollectedArtifact[] = [];
    const warnings: JobWarning[] = [];
    const seen = new Set<string>([STEP_LOGS_ARTIFACT]);

    for (const decl of input.declarations) {
      if (seen.has(decl.name)) {
        warnings.push({ code: "ARTIFACT_INVALID", message: `Artifact "${decl.name}" is declared more than once; keeping the first` });
        continue;
      }
      seen.add(decl.name);

      let name: string;
      let source: string;
      try {
        name = sanitizePathComponent(decl.name);
        source = resolveInside(path.resolve(input.workdir), decl.path);
      } catch (e: unknown) {
        warnings.push({ code: "ARTIFACT_INVALID", message: `Artifact "${decl.name}": ${errorMessage(e)}` });
        continue;
      }

      if (!fs.existsSync(source)) {
        warnings.push({ code: "ARTIFACT_MISSING", message: `Artifact "${decl.name}": ${decl.path} does not exist` });
        continue;
      }

      try {
        artifacts.push(await this.copy(name, decl.path, source, dest));
      } catch (e: unknown) {
        warnings.push({ code: "ARTIFACT_FAILED", message: `Artifact "${decl.name}": ${errorMessage(e)}` });
      }
    }

    if (fs.existsSync(input.logsDir)) {
      try {
        artifacts.push(await this.copy(STEP_LOGS_ARTIFACT, input.logsDir, input.logsDir, dest));
      } catch (e: unknown) {
        warnings.push({ code: "ARTIFACT_FAILED", message: `Step logs: ${errorMessage(e)}` });
      }
    }

    const manifest = buildManifest({ runId: this.runId, jobId: input.jobId, jobStatus: input.status, artifacts });
    const invalid = manifestErrors(manifest, this.registry);
    if (invalid) {
      warnings.push({ code: "MANIFEST_INVALID", message: invalid });
    }
    const manifestPath = path.join(dest, "manifest.json");
    await writeFile(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf8");

    return { artifacts, warnings, manifestPath };
  }

  private async copy(name: string, declared: string, source: string, dest: string): Promise<CollectedArtifact> {
    const location = path.join(dest, name);
    await mkdir(location, { recursive: true });
    if (fs.statSync(source).isDirectory()) {
      await cp(source, location, { recursive: true });
    } else {
      await cp(source, path.join(location, path.basename(source)));
    }
    return { name, source: declared, location, files: digestTree(location) };
  }
}
