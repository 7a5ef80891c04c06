import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { defaultStepName, loadPipeline, normalizeCondition, parsePipeline } from "../src/config/pipeline-loader.js";
import { PipelineConfigError } from "../src/core/errors.js";
import { createRegistry } from "../src/schema/registry.js";
import { tmpDir } from "./fakes.js";

const registry = createRegistry();

const PIPELINE = `name: operator
env:
  GO_VERSION: 1.22
jobs:
  - name: build
    runs_on: ubuntu-22.04
    matrix:
      axes:
        os: [linux, darwin]
        arch: [amd64, arm64]
      exclude:
        - { os: darwin, arch: amd64 }
      overrides:
        - match: { os: linux }
          env: { CGO_ENABLED: 0 }
    steps:
      - run: make build
        artifacts:
          - { name: binaries, path: bin }
  - name: e2e
    resources:
      - kind: tool
        name: configurator
        url: https://example.invalid/configurator
      - kind: cluster
        name: e2e
        localhost: true
        node_ip: { interface: eth0, env: NODE_IP }
    steps:
      - name: push tests
        run: make e2e
        if: { event: push }
        env:
          TOKEN: { secret: E2E_TOKEN }
          RETRIES: 3
      - name: linux only
        run: make extra
        if: { matrix: { os: linux } }
      - name: teardown
        run: make clean
        if: always
        timeout_s: 120
        continue_on_error: true
`;

function writePipeline(content: string): string {
  const file = path.join(tmpDir(), "pipeline.yaml");
  fs.writeFileSync(file, content);
  return file;
}

describe("loadPipeline", () => {
  it("normalizes a pipeline file", () => {
    const pipeline = loadPipeline(writePipeline(PIPELINE), registry);

    expect(pipeline.name).toBe("operator");
    expect(pipeline.env).toEqual({ GO_VERSION: "1.22" });

    const [build, e2e] = pipeline.jobs;
    expect(build.runs_on).toBe("ubuntu-22.04");
    expect(build.matrix).toEqual({
      axes: { os: ["linux", "darwin"], arch: ["amd64", "arm64"] },
      overrides: [{ match: { os: "linux" }, env: { CGO_ENABLED: "0" } }],
      exclude: [{ os: "darwin", arch: "amd64" }],
    });
    expect(build.steps[0]).toEqual({
      name: "make build",
      run: "make build",
      if: { kind: "on_success" },
      env: {},
      artifacts: [{ name: "binaries", path: "bin" }],
      timeout_s: undefined,
      continue_on_error: false,
    });

    expect(e2e.resources).toEqual([
      { kind: "tool", name: "configurator", url: "https://example.invalid/configurator" },
      { kind: "cluster", name: "e2e", localhost: true, node_ip: { interface: "eth0", env: "NODE_IP" } },
    ]);
    expect(e2e.steps.map((s) => s.if)).toEqual([
      { kind: "on_event", event: "push" },
      { kind: "on_matrix", values: { os: "linux" } },
      { kind: "always" },
    ]);
    expect(e2e.steps[0].env).toEqual({ TOKEN: { secret: "E2E_TOKEN" }, RETRIES: "3" });
    expect(e2e.steps[2]).toMatchObject({ timeout_s: 120, continue_on_error: true });
  });

  it("reports a missing file", () => {
    expect(() => loadPipeline("/nonexistent/pipeline.yaml", registry)).toThrow("Pipeline file not found: /nonexistent/pipeline.yaml");
  });

  it("reports YAML syntax errors", () => {
    const file = writePipeline("name: [broken\n");
    expect(() => loadPipeline(file, registry)).toThrow(`Cannot parse ${file}`);
  });
});

describe("parsePipeline", () => {
  it("rejects a document without jobs", () => {
    expect(() => parsePipeline({ name: "p" }, registry)).toThrow(PipelineConfigError);
    expect(() => parsePipeline({ name: "p" }, registry)).toThrow("must have required property 'jobs'");
  });

  it("rejects an unknown condition", () => {
    expect(() => parsePipeline({ name: "p", jobs: [{ name: "a", steps: [{ run: "x", if: "sometimes" }] }] }, registry)).toThrow(
      /^Invalid pipeline: /,
    );
  });

  it("rejects an unknown resource kind", () => {
    expect(() => parsePipeline({ name: "p", jobs: [{ name: "a", resources: [{ kind: "vm", name: "x" }], steps: [{ run: "x" }] }] }, registry)).toThrow(
      PipelineConfigError,
    );
  });

  it("reads a shell on the job and on a step", () => {
    const pipeline = parsePipeline(
      { name: "p", jobs: [{ name: "windows-build", shell: "bash", steps: [{ run: "make" }, { run: "dir", shell: "cmd" }] }] },
      registry,
    );
    const [job] = pipeline.jobs;
    expect(job.shell).toBe("bash");
    expect(job.steps.map((s) => s.shell)).toEqual([undefined, "cmd"]);
  });

  it("rejects an empty shell", () => {
    expect(() => parsePipeline({ name: "p", jobs: [{ name: "a", shell: "", steps: [{ run: "x" }] }] }, registry)).toThrow(
      "must NOT have fewer than 1 characters",
    );
  });

  it("rejects duplicate job names", () => {
    const step = { run: "x" };
    expect(() => parsePipeline({ name: "p", jobs: [{ name: "a", steps: [step] }, { name: "a", steps: [step] }] }, registry)).toThrow(
      "Duplicate job name: a",
    );
  });
});

describe("normalizeCondition / defaultStepName", () => {
  it("defaults to on_success", () => {
    expect(normalizeCondition(undefined)).toEqual({ kind: "on_success" });
    expect(normalizeCondition("on_failure")).toEqual({ kind: "on_failure" });
    expect(normalizeCondition({ matrix: { shard: 1 } })).toEqual({ kind: "on_matrix", values: { shard: "1" } });
  });

  it("names a step after the first line of its command", () => {
    expect(defaultStepName("make test\nmake lint")).toBe("make test");
    expect(defaultStepName("x".repeat(50))).toBe(`${"x".repeat(37)}...`);
    expect(defaultStepName("   ")).toBe("step");
  });
});
