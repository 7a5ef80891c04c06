import { readFile, writeFile } from "node:fs/promises";
import os, { type NetworkInterfaceInfo } from "node:os";
import path from "node:path";
import YAML from "yaml";
import type { CommandOutcome, CommandRunner } from "../runner/command-runner.js";
import { StepTimeoutError, errorMessage } from "../core/errors.js";
import type { ProvisionContext, ProvisionedResource, ResourceProvider } from "../core/provisioner.js";
import { slugify } from "../core/run-id.js";
import type { ClusterResourceSpec } from "../types/pipeline.js";

export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export type KindClusterOptions = {
  runner: CommandRunner;
  kindBin: string;
  kubectlBin: string;
  readyTimeoutS: number;
  /** Source of host network interfaces; defaults to os.networkInterfaces. */
  interfaces?: () => InterfaceTable;
};

const DELETE_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Ephemeral Kubernetes-in-Docker cluster.
 *
 * create(name, config) → connection descriptor: the kubeconfig path, the API
 * server address read back from it and, when asked, the host address of a
 * network interface so the cluster can reach back to the host.
 */
export class KindClusterProvider implements ResourceProvider<ClusterResourceSpec> {
  readonly kind = "cluster";

  constructor(private readonly opts: KindClusterOptions) {}

  async acquire(spec: ClusterResourceSpec, ctx: ProvisionContext): Promise<ProvisionedResource> {
    const kubeconfig = path.join(ctx.jobDir, `kubeconfig-${slugify(spec.name)}`);
    const argv = [this.opts.kindBin, "create", "cluster", "--name", spec.name, "--kubeconfig", kubeconfig];
    if (spec.config) argv.push("--config", path.resolve(ctx.workdir, spec.config));

    // Delete on any failure, a create that failed or was cut short included:
    // kind may already have started node containers.
    try {
      const created = await this.opts.runner.run(argv, { cwd: ctx.workdir, env: ctx.env, signal: ctx.signal });
      if (created.exitCode !== 0) {
        throw new Error(`kind create cluster failed: ${created.aborted ? "interrupted" : lastLine(created)}`);
      }

      const server = await readServer(kubeconfig, `kind-${spec.name}`, spec.localhost === true);

      const readyS = this.opts.readyTimeoutS;
      const ready = await this.opts.runner.run(
        [this.opts.kubectlBin, "--kubeconfig", kubeconfig, "wait", "--for=condition=Ready", "nodes", "--all", `--timeout=${readyS}s`],
        { cwd: ctx.workdir, env: ctx.env, signal: ctx.signal, timeoutMs: (readyS + 30) * 1000 },
      );
      if (ready.exitCode !== 0) {
        if (ready.timedOut || /timed out/i.test(lastLine(ready))) {
          throw new StepTimeoutError(`Waiting for nodes of cluster "${spec.name}"`, readyS * 1000);
        }
        throw new Error(`Cluster nodes not ready: ${ready.aborted ? "interrupted" : lastLine(ready)}`);
      }

      const exports: Record<string, string> = {
        KUBECONFIG: kubeconfig,
        CLUSTER_NAME: spec.name,
        CLUSTER_SERVER: server,
      };
      const details: Record<string, string> = { kubeconfig, server, workdir: ctx.workdir };

      if (spec.node_ip) {
        const table = (this.opts.interfaces ?? os.networkInterfaces)();
        const address = findInterfaceAddress(table, spec.node_ip.interface);
        if (!address) {
          throw new Error(`No IPv4 address on interface "${spec.node_ip.interface}"`);
        }
        exports[spec.node_ip.env] = address;
        details.nodeIp = address;
      }

      return { id: `cluster:${spec.name}`, kind: "cluster", name: spec.name, exports, details };
    } catch (e: unknown) {
      const deleted = await this.deleteCluster(spec.name, kubeconfig, ctx.workdir);
      if (deleted.exitCode !== 0) {
        throw new Error(`${errorMessage(e)} (cleanup also failed: ${lastLine(deleted)})`, { cause: e });
      }
      throw e;
    }
  }

  async release(resource: ProvisionedResource): Promise<void> {
    const out = await this.deleteCluster(resource.name, resource.details.kubeconfig, resource.details.workdir ?? process.cwd());
    if (out.exitCode !== 0) {
      throw new Error(`kind delete cluster failed: ${lastLine(out)}`);
    }
  }

  private deleteCluster(name: string, kubeconfig: string | undefined, cwd: string): Promise<CommandOutcome> {
    const argv = [this.opts.kindBin, "delete", "cluster", "--name", name];
    if (kubeconfig) argv.push("--kubeconfig", kubeconfig);
    // No abort signal: teardown must finish even when the run was cancelled.
    return this.opts.runner.run(argv, { cwd, env: {}, timeoutMs: DELETE_TIMEOUT_MS });
  }
}

/**
 * Read the API server of `clusterName` from a kubeconfig. With `localhost`,
 * 127.0.0.1 is rewritten to localhost in the file as well.
 */
export async function readServer(kubeconfigPath: string, clusterName: string, localhost: boolean): Promise<string> {
  const raw = await readFile(kubeconfigPath, "utf8");
  const doc = YAML.parseDocument(raw);
  const clusters = doc.get("clusters");
  if (!YAML.isSeq(clusters)) {
    throw new Error(`No clusters in ${kubeconfigPath}`);
  }

  for (const item of clusters.items) {
    if (!YAML.isMap(item) || item.get("name") !== clusterName) continue;
    const server = item.getIn(["cluster", "server"]);
    if (typeof server !== "string" || server.length === 0) {
      throw new Error(`Cluster "${clusterName}" has no server in ${kubeconfigPath}`);
    }
    if (!localhost || !server.includes("127.0.0.1")) return server;

    const rewritten = server.replace("127.0.0.1", "localhost");
    item.setIn(["cluster", "server"], rewritten);
    await writeFile(kubeconfigPath, doc.toString(), "utf8");
    return rewritten;
  }

  throw new Error(`Cluster "${clusterName}" not found in ${kubeconfigPath}`);
}

/** First non-internal IPv4 address of the named interface. */
export function findInterfaceAddress(table: InterfaceTable, name: string): string | null {
  const entries = table[name] ?? [];
  const v4 = entries.find((e) => e.family === "IPv4" && !e.internal) ?? entries.find((e) => e.family === "IPv4");
  return v4?.address ?? null;
}

function lastLine(out: CommandOutcome): string {
  const text = (out.stderr.trim() || out.stdout.trim()).split("\n").pop();
  return text && text.length > 0 ? text : `exit ${out.exitCode ?? "null"}`;
}
