import fs from "node:fs";
import type { NetworkInterfaceInfo } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { StepTimeoutError } from "../src/core/errors.js";
import type { ProvisionContext } from "../src/core/provisioner.js";
import { KindClusterProvider, findInterfaceAddress, readServer } from "../src/resources/kind-cluster.js";
import { ToolProvider, archiveKind } from "../src/resources/tool.js";
import type { CommandOutcome } from "../src/runner/command-runner.js";
import { FakeRunner, sleep, tmpDir } from "./fakes.js";

function pctx(root: string): ProvisionContext {
  const jobDir = path.join(root, "job");
  fs.mkdirSync(jobDir, { recursive: true });
  return { runId: "run-1", jobSlug: "job", workdir: root, jobDir, env: { PATH: "/usr/bin" }, signal: new AbortController().signal };
}

describe("archiveKind", () => {
  it("detects archives by extension", () => {
    expect(archiveKind("tool.tar.gz")).toBe("tar.gz");
    expect(archiveKind("tool.TGZ")).toBe("tar.gz");
    expect(archiveKind("tool.zip")).toBe("zip");
    expect(archiveKind("tool-linux-amd64")).toBe("raw");
  });
});

describe("ToolProvider", () => {
  it("installs a raw binary and prepends its directory to PATH", async () => {
    const root = tmpDir();
    const toolsDir = path.join(root, "tools");
    const provider = new ToolProvider({
      toolsDir,
      runner: new FakeRunner(),
      download: async (_url, dest) => fs.writeFileSync(dest, "#!/bin/sh\necho configurator\n"),
    });

    const res = await provider.acquire({ kind: "tool", name: "configurator", url: "https://example.invalid/dl/configurator-linux-amd64" }, pctx(root));

    const dir = path.join(toolsDir, "run-1", "job", "configurator");
    const bin = path.join(dir, "configurator");
    expect(res.id).toBe("tool:configurator");
    expect(res.exports).toEqual({ PATH: `${dir}${path.delimiter}/usr/bin` });
    expect(res.details.path).toBe(bin);
    expect(fs.readFileSync(bin, "utf8")).toBe("#!/bin/sh\necho configurator\n");
    expect(fs.statSync(bin).mode & 0o111).not.toBe(0);

    await provider.release(res);
    expect(fs.existsSync(dir)).toBe(false);
  });

  it("extracts the named file from an archive", async () => {
    const root = tmpDir();
    const runner = new FakeRunner((argv) => {
      const dest = argv[4] ?? "";
      fs.mkdirSync(path.join(dest, "bin"), { recursive: true });
      fs.writeFileSync(path.join(dest, "bin", "kubectl"), "binary");
      return { exitCode: 0 };
    });
    const provider = new ToolProvider({ toolsDir: path.join(root, "tools"), runner, download: async (_url, dest) => fs.writeFileSync(dest, "archive") });

    const res = await provider.acquire(
      { kind: "tool", name: "kubectl", url: "https://example.invalid/kubectl.tar.gz", path_in_archive: "bin/kubectl" },
      pctx(root),
    );

    const dir = path.join(root, "tools", "run-1", "job", "kubectl");
    expect(runner.calls[0].argv).toEqual(["tar", "-xzf", path.join(dir, ".download-kubectl.tar.gz"), "-C", dir]);
    expect(fs.readFileSync(path.join(dir, "kubectl"), "utf8")).toBe("binary");
    expect(fs.existsSync(path.join(dir, ".download-kubectl.tar.gz"))).toBe(false);
    expect(res.details.path).toBe(path.join(dir, "kubectl"));
  });

  it("fails when extraction fails", async () => {
    const root = tmpDir();
    const provider = new ToolProvider({
      toolsDir: path.join(root, "tools"),
      runner: new FakeRunner(() => ({ exitCode: 2, stderr: "bad archive\n" })),
      download: async (_url, dest) => fs.writeFileSync(dest, "x"),
    });
    await expect(provider.acquire({ kind: "tool", name: "t", url: "https://example.invalid/t.zip" }, pctx(root))).rejects.toThrow(
      "Extracting t.zip failed: bad archive",
    );
    expect(fs.existsSync(path.join(root, "tools", "run-1", "job", "t"))).toBe(false);
  });

  it("removes a partial download", async () => {
    const root = tmpDir();
    const provider = new ToolProvider({
      toolsDir: path.join(root, "tools"),
      runner: new FakeRunner(),
      download: async (_url, dest) => {
        fs.writeFileSync(dest, "partial");
        throw new Error("GET https://example.invalid/t returned 502 Bad Gateway");
      },
    });

    await expect(provider.acquire({ kind: "tool", name: "t", url: "https://example.invalid/t" }, pctx(root))).rejects.toThrow(
      "GET https://example.invalid/t returned 502 Bad Gateway",
    );
    expect(fs.existsSync(path.join(root, "tools", "run-1", "job", "t"))).toBe(false);
  });

  it("fails when the archive lacks the binary", async () => {
    const root = tmpDir();
    const provider = new ToolProvider({
      toolsDir: path.join(root, "tools"),
      runner: new FakeRunner(() => ({ exitCode: 0 })),
      download: async (_url, dest) => fs.writeFileSync(dest, "x"),
    });
    await expect(provider.acquire({ kind: "tool", name: "t", url: "https://example.invalid/t.tgz" }, pctx(root))).rejects.toThrow(
      '"t" not found in t.tgz',
    );
  });

  it("rejects a name that escapes the tools directory", async () => {
    const root = tmpDir();
    const provider = new ToolProvider({ toolsDir: path.join(root, "tools"), runner: new FakeRunner(), download: async () => undefined });
    await expect(provider.acquire({ kind: "tool", name: "../x", url: "https://example.invalid/x" }, pctx(root))).rejects.toThrow(
      "Invalid path component: ../x",
    );
  });
});

const KUBECONFIG = `apiVersion: v1
clusters:
- cluster:
    server: https://127.0.0.1:6443
  name: kind-e2e
contexts: []
`;

const eth0: NetworkInterfaceInfo = {
  address: "10.0.0.5",
  netmask: "255.255.255.0",
  family: "IPv4",
  mac: "00:00:00:00:00:00",
  internal: false,
  cidr: "10.0.0.5/24",
};

type Script = { create?: Partial<CommandOutcome>; wait?: Partial<CommandOutcome>; delete?: Partial<CommandOutcome> };

function kindRunner(script: Script = {}): FakeRunner {
  return new FakeRunner((argv) => {
    const verb = argv[1] === "--kubeconfig" ? argv[3] : argv[1];
    if (verb === "create") {
      const kc = argv[argv.indexOf("--kubeconfig") + 1] ?? "";
      fs.writeFileSync(kc, KUBECONFIG);
      return script.create ?? {};
    }
    if (verb === "wait") return script.wait ?? {};
    if (verb === "delete") return script.delete ?? {};
    return { exitCode: 127, stderr: `unexpected ${argv.join(" ")}` };
  });
}

describe("KindClusterProvider", () => {
  it("creates a cluster and exports its connection details", async () => {
    const root = tmpDir();
    const ctx = pctx(root);
    const runner = kindRunner();
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 300, interfaces: () => ({ eth0: [eth0] }) });

    const res = await provider.acquire({ kind: "cluster", name: "e2e", localhost: true, node_ip: { interface: "eth0", env: "NODE_IP" } }, ctx);

    const kc = path.join(ctx.jobDir, "kubeconfig-e2e");
    expect(res.id).toBe("cluster:e2e");
    expect(res.exports).toEqual({ KUBECONFIG: kc, CLUSTER_NAME: "e2e", CLUSTER_SERVER: "https://localhost:6443", NODE_IP: "10.0.0.5" });
    expect(res.details).toEqual({ kubeconfig: kc, server: "https://localhost:6443", workdir: root, nodeIp: "10.0.0.5" });
    expect(fs.readFileSync(kc, "utf8")).toContain("server: https://localhost:6443");
    expect(runner.calls.map((c) => c.argv)).toEqual([
      ["kind", "create", "cluster", "--name", "e2e", "--kubeconfig", kc],
      ["kubectl", "--kubeconfig", kc, "wait", "--for=condition=Ready", "nodes", "--all", "--timeout=300s"],
    ]);
    expect(runner.calls[1].opts.timeoutMs).toBe(330000);

    await provider.release(res);
    expect(runner.calls[2].argv).toEqual(["kind", "delete", "cluster", "--name", "e2e", "--kubeconfig", kc]);
    expect(runner.calls[2].opts.signal).toBeUndefined();
    expect(runner.calls[2].opts.env).toEqual({});
  });

  it("passes a cluster config resolved against the workdir", async () => {
    const root = tmpDir();
    const runner = kindRunner();
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });

    const res = await provider.acquire({ kind: "cluster", name: "e2e", config: "hack/kind.yaml" }, pctx(root));

    expect(runner.calls[0].argv.slice(-2)).toEqual(["--config", path.join(root, "hack", "kind.yaml")]);
    expect(res.exports.CLUSTER_SERVER).toBe("https://127.0.0.1:6443");
  });

  it("deletes whatever a failed create left behind", async () => {
    const root = tmpDir();
    const runner = kindRunner({ create: { exitCode: 1, stderr: "docker not running\nERROR: failed to create cluster\n" } });
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });

    await expect(provider.acquire({ kind: "cluster", name: "e2e" }, pctx(root))).rejects.toThrow(
      "kind create cluster failed: ERROR: failed to create cluster",
    );
    expect(runner.calls.map((c) => c.argv[1])).toEqual(["create", "delete"]);
  });

  it("deletes the cluster when create is interrupted by cancellation", async () => {
    const root = tmpDir();
    const controller = new AbortController();
    const runner = new FakeRunner(async (argv, opts) => {
      if (argv[1] === "create" && (await sleep(5000, opts.signal))) return { exitCode: null, aborted: true };
      return { exitCode: 0 };
    });
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });

    const attempt = provider.acquire({ kind: "cluster", name: "e2e" }, { ...pctx(root), signal: controller.signal });
    await sleep(30);
    controller.abort(new Error("cancelled"));

    await expect(attempt).rejects.toThrow("kind create cluster failed: interrupted");
    expect(runner.calls.map((c) => c.argv.slice(0, 5))).toEqual([
      ["kind", "create", "cluster", "--name", "e2e"],
      ["kind", "delete", "cluster", "--name", "e2e"],
    ]);
    expect(runner.calls[1].opts.signal).toBeUndefined();
  });

  it("reports nodes that never become ready as a timeout and deletes the cluster", async () => {
    const root = tmpDir();
    const runner = kindRunner({ wait: { exitCode: 1, stderr: "error: timed out waiting for the condition" } });
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });

    const attempt = provider.acquire({ kind: "cluster", name: "e2e" }, pctx(root));

    await expect(attempt).rejects.toBeInstanceOf(StepTimeoutError);
    await expect(attempt).rejects.toThrow('Waiting for nodes of cluster "e2e" timed out after 60000ms');
    expect(runner.calls.map((c) => c.argv[1])).toEqual(["create", "--kubeconfig", "delete"]);
  });

  it("mentions a failed cleanup after a failed setup", async () => {
    const root = tmpDir();
    const runner = kindRunner({ wait: { exitCode: 1, stderr: "no nodes found" }, delete: { exitCode: 1, stderr: "boom" } });
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });

    await expect(provider.acquire({ kind: "cluster", name: "e2e" }, pctx(root))).rejects.toThrow(
      "Cluster nodes not ready: no nodes found (cleanup also failed: boom)",
    );
  });

  it("fails and cleans up when the interface has no IPv4 address", async () => {
    const root = tmpDir();
    const runner = kindRunner();
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60, interfaces: () => ({}) });

    await expect(
      provider.acquire({ kind: "cluster", name: "e2e", node_ip: { interface: "eth0", env: "NODE_IP" } }, pctx(root)),
    ).rejects.toThrow('No IPv4 address on interface "eth0"');
    expect(runner.calls[runner.calls.length - 1].argv[1]).toBe("delete");
  });

  it("throws when delete fails on release", async () => {
    const root = tmpDir();
    const runner = kindRunner({ delete: { exitCode: 1, stdout: "still running" } });
    const provider = new KindClusterProvider({ runner, kindBin: "kind", kubectlBin: "kubectl", readyTimeoutS: 60 });
    const res = await provider.acquire({ kind: "cluster", name: "e2e" }, pctx(root));
    await expect(provider.release(res)).rejects.toThrow("kind delete cluster failed: still running");
  });
});

describe("readServer / findInterfaceAddress", () => {
  it("rejects a kubeconfig without the cluster", async () => {
    const file = path.join(tmpDir(), "kc");
    fs.writeFileSync(file, KUBECONFIG);
    await expect(readServer(file, "kind-other", false)).rejects.toThrow(`Cluster "kind-other" not found in ${file}`);
  });

  it("prefers a non-internal IPv4 address", () => {
    const loopback: NetworkInterfaceInfo = { ...eth0, address: "127.0.0.1", internal: true, cidr: "127.0.0.1/8" };
    expect(findInterfaceAddress({ eth0: [loopback, eth0] }, "eth0")).toBe("10.0.0.5");
    expect(findInterfaceAddress({ lo: [loopback] }, "lo")).toBe("127.0.0.1");
    expect(findInterfaceAddress({}, "eth0")).toBeNull();
  });
});
