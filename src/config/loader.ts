import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../core/errors.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";
import type { PipectlConfig } from "../types/config.js";

export const CONFIG_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export const ENV_PREFIX = "PIPECTL_";

/** Built-in values underneath base.yaml. */
export const DEFAULTS: PipectlConfig = {
  schema_version: "1.0.0",
  runs_dir: ".pipectl/runs",
  tools_dir: ".pipectl/tools",
  shell: "bash",
  max_parallel: 0,
  fail_fast: false,
  default_step_timeout_s: 3600,
  resource_timeout_s: 900,
  cluster: {
    kind_bin: "kind",
    kubectl_bin: "kubectl",
    ready_timeout_s: 300,
  },
};

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Tree, override: Tree): Tree {
  const result: Tree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val)) {
      result[key] = deepMerge(isTree(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file, or an empty object if it does not exist. */
function loadYaml(filePath: string): Tree {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e: unknown) {
    throw new ConfigError(`Cannot parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) {
    throw new ConfigError(`${filePath} must contain a mapping`);
  }
  return parsed;
}

function coerce(value: string): string | number | boolean {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * PIPECTL_RUNS_DIR → runs_dir, PIPECTL_CLUSTER__KIND_BIN → cluster.kind_bin.
 * Variables whose first segment is not a configuration key are ignored.
 * Values that look like integers or booleans are coerced.
 */
export function envOverrides(env: NodeJS.ProcessEnv): Tree {
  const out: Tree = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter(Boolean);
    // Only configuration keys; PIPECTL_ENV and friends belong to steps.
    if (!Object.prototype.hasOwnProperty.call(DEFAULTS, segments[0] ?? "")) continue;
    const leaf = segments.pop();
    if (!leaf) continue;

    let node = out;
    for (const segment of segments) {
      const next = node[segment];
      if (isTree(next)) {
        node = next;
      } else {
        const created: Tree = {};
        node[segment] = created;
        node = created;
      }
    }
    node[leaf] = coerce(value);
  }
  return out;
}

export type LoadConfigOptions = {
  /** Loads `<dir>/<envName>.yaml` over base.yaml. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  registry?: SchemaRegistry;
};

/**
 * Load layered config: defaults ← base.yaml ← {env}.yaml ← PIPECTL_* variables,
 * then validate against the config schema.
 */
export function loadConfig(opts: LoadConfigOptions = {}): PipectlConfig {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = deepMerge({ ...DEFAULTS }, loadYaml(path.join(dir, "base.yaml")));
  if (opts.envName) {
    const envFile = path.join(dir, `${opts.envName}.yaml`);
    if (!fs.existsSync(envFile)) {
      throw new ConfigError(`Unknown config environment "${opts.envName}" (${envFile} not found)`);
    }
    merged = deepMerge(merged, loadYaml(envFile));
  }
  merged = deepMerge(merged, envOverrides(opts.env ?? process.env));

  const registry = opts.registry ?? createRegistry();
  const isConfig = registry.guard<PipectlConfig>("config");
  if (!isConfig(merged)) {
    throw new ConfigError(`Invalid configuration: ${registry.lastErrors("config")}`);
  }
  return merged;
}
