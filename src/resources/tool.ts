import fs from "node:fs";
import { chmod, copyFile, mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { CommandRunner } from "../runner/command-runner.js";
import type { ProvisionContext, ProvisionedResource, ResourceProvider } from "../core/provisioner.js";
import { sanitizePathComponent } from "../security/secrets.js";
import type { ToolResourceSpec } from "../types/pipeline.js";

/** Fetch `url` into the file `dest`. */
export type Downloader = (url: string, dest: string, signal: AbortSignal) => Promise<void>;

export const fetchDownloader: Downloader = async (url, dest, signal) => {
  const res = await fetch(url, { signal, redirect: "follow" });
  if (!res.ok) {
    throw new Error(`GET ${url} returned ${res.status} ${res.statusText}`);
  }
  await writeFile(dest, Buffer.from(await res.arrayBuffer()));
};

export type ArchiveKind = "tar.gz" | "zip" | "raw";

export function archiveKind(fileName: string): ArchiveKind {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) return "tar.gz";
  if (lower.endsWith(".zip")) return "zip";
  return "raw";
}

/**
 * Installs a tool binary from a release URL for the lifetime of one job.
 * The binary ends up as `<tools_dir>/<run>/<job>/<name>/<name>` and its
 * directory is prepended to PATH for later steps.
 */
export class ToolProvider implements ResourceProvider<ToolResourceSpec> {
  readonly kind = "tool";
  private readonly download: Downloader;

  constructor(
    private readonly opts: {
      toolsDir: string;
      runner: CommandRunner;
      download?: Downloader;
    },
  ) {
    this.download = opts.download ?? fetchDownloader;
  }

  async acquire(spec: ToolResourceSpec, ctx: ProvisionContext): Promise<ProvisionedResource> {
    const name = sanitizePathComponent(spec.name);
    const dir = path.join(this.opts.toolsDir, ctx.runId, ctx.jobSlug, name);
    await rm(dir, { recursive: true, force: true });
    await mkdir(dir, { recursive: true });

    const target = path.join(dir, name);
    try {
      const fileName = path.posix.basename(new URL(spec.url).pathname) || name;
      const downloaded = path.join(dir, `.download-${fileName}`);
      await this.download(spec.url, downloaded, ctx.signal);

      const kind = archiveKind(fileName);
      if (kind === "raw") {
        await rename(downloaded, target);
      } else {
        const argv =
          kind === "tar.gz"
            ? ["tar", "-xzf", downloaded, "-C", dir]
            : ["unzip", "-o", "-q", downloaded, "-d", dir];
        const out = await this.opts.runner.run(argv, { cwd: dir, env: ctx.env, signal: ctx.signal });
        if (out.exitCode !== 0) {
          throw new Error(`Extracting ${fileName} failed: ${out.stderr.trim() || `exit ${out.exitCode}`}`);
        }
        await rm(downloaded, { force: true });

        const inner = path.join(dir, spec.path_in_archive ?? name);
        if (!fs.existsSync(inner)) {
          throw new Error(`"${spec.path_in_archive ?? name}" not found in ${fileName}`);
        }
        if (inner !== target) {
          await copyFile(inner, target);
        }
      }
      await chmod(target, 0o755);
    } catch (e: unknown) {
      // Nothing was acquired, so release() will never see this directory.
      await rm(dir, { recursive: true, force: true });
      throw e;
    }

    const basePath = ctx.env.PATH ?? process.env.PATH ?? "";
    return {
      id: `tool:${name}`,
      kind: "tool",
      name,
      exports: { PATH: basePath.length > 0 ? `${dir}${path.delimiter}${basePath}` : dir },
      details: { dir, path: target, url: spec.url },
    };
  }

  async release(resource: ProvisionedResource): Promise<void> {
    const dir = resource.details.dir;
    if (dir) await rm(dir, { recursive: true, force: true });
  }
}
