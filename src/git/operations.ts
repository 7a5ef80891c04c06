import { simpleGit, type SimpleGit } from "simple-git";
import type { TriggerEvent, TriggerKind } from "../types/pipeline.js";

/** The repository facts a run's trigger event defaults to. */
export interface GitReader {
  isRepo(): Promise<boolean>;
  getCurrentSha(): Promise<string>;
  getCurrentBranch(): Promise<string>;
  getRemoteUrl(remote?: string): Promise<string | null>;
}

/**
 * Git operations wrapper over simple-git.
 */
export class GitOperations implements GitReader {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  isRepo(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** HEAD SHA. */
  async getCurrentSha(): Promise<string> {
    return (await this.git.revparse(["HEAD"])).trim();
  }

  /** Current branch name, or "HEAD" when detached. */
  async getCurrentBranch(): Promise<string> {
    return (await this.git.revparse(["--abbrev-ref", "HEAD"])).trim();
  }

  async getRemoteUrl(remote = "origin"): Promise<string | null> {
    const remotes = await this.git.getRemotes(true);
    const found = remotes.find((r) => r.name === remote);
    return found?.refs.fetch || null;
  }
}

/**
 * "owner/name" from a remote URL:
 * git@github.com:owner/name.git, https://host/owner/name(.git), ssh://git@host/owner/name
 */
export function repositoryFromRemote(url: string): string | null {
  const trimmed = url.trim().replace(/\.git$/, "").replace(/\/+$/, "");
  const m = /[:/]([^/:]+\/[^/:]+)$/.exec(trimmed);
  return m ? m[1] : null;
}

export type TriggerOverrides = {
  kind: TriggerKind;
  ref?: string;
  repository?: string;
  sha?: string;
};

/**
 * Build the trigger event: explicit values win, the rest comes from the
 * working tree's repository. Outside a repository the defaults are empty.
 */
export async function detectTrigger(overrides: TriggerOverrides, git: GitReader): Promise<TriggerEvent> {
  const inRepo = await git.isRepo();

  const ref = overrides.ref ?? (inRepo ? `refs/heads/${await git.getCurrentBranch()}` : "");
  const sha = overrides.sha ?? (inRepo ? await git.getCurrentSha() : undefined);
  let repository = overrides.repository;
  if (repository === undefined && inRepo) {
    const url = await git.getRemoteUrl();
    repository = url ? (repositoryFromRemote(url) ?? url) : undefined;
  }

  return {
    kind: overrides.kind,
    ref,
    repository: repository ?? "",
    ...(sha ? { sha } : {}),
  };
}
