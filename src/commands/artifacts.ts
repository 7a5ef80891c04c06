import fs from "node:fs";
import path from "node:path";
import { runDir } from "../core/run-store.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import type { JobManifest } from "../types/manifest.js";

export type ArtifactFile = {
  job: string;
  artifact: string;
  /** Relative to the run's artifacts directory. */
  path: string;
  sha256: string;
  bytes: number;
};

export type ArtifactsResult = { ok: true; files: ArtifactFile[]; skipped: string[] } | { ok: false; error: string };

/**
 * List collected artifact files of a run, from each job's manifest.json.
 * Manifests that fail validation are reported in `skipped`.
 */
export function listArtifacts(opts: { runsDir: string; runId: string; registry?: SchemaRegistry }): ArtifactsResult {
  const root = path.join(runDir(opts.runsDir, opts.runId), "artifacts");
  if (!fs.existsSync(root)) {
    return { ok: false, error: `No artifacts found for: ${opts.runId}` };
  }

  const registry = opts.registry ?? createRegistry();
  const isManifest = registry.guard<JobManifest>("manifest");
  const files: ArtifactFile[] = [];
  const skipped: string[] = [];

  for (const entry of fs.readdirSync(root, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name))) {
    if (!entry.isDirectory()) continue;
    const manifestPath = path.join(root, entry.name, "manifest.json");
    if (!fs.existsSync(manifestPath)) continue;

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    } catch (e: unknown) {
      skipped.push(`${entry.name}: ${e instanceof Error ? e.message : String(e)}`);
      continue;
    }
    if (!isManifest(data)) {
      skipped.push(`${entry.name}: ${registry.lastErrors("manifest")}`);
      continue;
    }

    for (const artifact of data.artifacts) {
      for (const file of artifact.files) {
        files.push({
          job: data.job_id,
          artifact: artifact.name,
          path: [entry.name, artifact.name, file.path].join("/"),
          sha256: file.sha256,
          bytes: file.bytes,
        });
      }
    }
  }

  return { ok: true, files, skipped };
}
