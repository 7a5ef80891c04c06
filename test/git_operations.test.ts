import { describe, expect, it, vi } from "vitest";
import { type GitReader, detectTrigger, repositoryFromRemote } from "../src/git/operations.js";

function gitReader(opts: { inRepo?: boolean; remote?: string | null } = {}): GitReader {
  return {
    isRepo: vi.fn(async () => opts.inRepo ?? true),
    getCurrentSha: vi.fn(async () => "abc1234def"),
    getCurrentBranch: vi.fn(async () => "main"),
    getRemoteUrl: vi.fn(async () => (opts.remote === undefined ? "git@github.com:acme/widgets.git" : opts.remote)),
  };
}

describe("repositoryFromRemote", () => {
  it("extracts owner/name from common remote forms", () => {
    expect(repositoryFromRemote("git@github.com:acme/widgets.git")).toBe("acme/widgets");
    expect(repositoryFromRemote("https://github.com/acme/widgets")).toBe("acme/widgets");
    expect(repositoryFromRemote("https://github.com/acme/widgets/")).toBe("acme/widgets");
    expect(repositoryFromRemote("ssh://git@git.example.invalid:2222/acme/widgets.git")).toBe("acme/widgets");
  });

  it("returns null when there is no owner/name", () => {
    expect(repositoryFromRemote("widgets")).toBeNull();
  });
});

describe("detectTrigger", () => {
  it("fills ref, sha and repository from the repository", async () => {
    await expect(detectTrigger({ kind: "push" }, gitReader())).resolves.toEqual({
      kind: "push",
      ref: "refs/heads/main",
      repository: "acme/widgets",
      sha: "abc1234def",
    });
  });

  it("prefers explicit values", async () => {
    const git = gitReader();
    const event = await detectTrigger({ kind: "pull_request", ref: "refs/pull/7/merge", repository: "fork/widgets", sha: "feed" }, git);

    expect(event).toEqual({ kind: "pull_request", ref: "refs/pull/7/merge", repository: "fork/widgets", sha: "feed" });
    expect(git.getCurrentBranch).not.toHaveBeenCalled();
    expect(git.getRemoteUrl).not.toHaveBeenCalled();
  });

  it("keeps an unrecognized remote URL as is", async () => {
    const event = await detectTrigger({ kind: "push" }, gitReader({ remote: "widgets" }));
    expect(event.repository).toBe("widgets");
  });

  it("leaves repository empty without an origin remote", async () => {
    const event = await detectTrigger({ kind: "push" }, gitReader({ remote: null }));
    expect(event.repository).toBe("");
  });

  it("defaults to empty values outside a repository", async () => {
    await expect(detectTrigger({ kind: "push" }, gitReader({ inRepo: false }))).resolves.toEqual({ kind: "push", ref: "", repository: "" });
  });
});
