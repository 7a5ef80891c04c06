import { loadConfig } from "../config/loader.js";
import { loadPipeline } from "../config/pipeline-loader.js";
import { PipectlError, errorMessage } from "../core/errors.js";
import { expandPipeline } from "../core/matrix.js";
import { type Diagnostic, diag } from "../report/reporter.js";
import { type SchemaRegistry, createRegistry } from "../schema/registry.js";

export type ValidateResult =
  | { ok: true; pipeline: string; jobs: number; diagnostics: Diagnostic[] }
  | { ok: false; errors: Diagnostic[] };

/**
 * Check configuration and a pipeline file without running anything:
 * config schema, pipeline schema, matrix expansion and job id uniqueness.
 */
export function validatePipeline(opts: {
  pipelinePath: string;
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  registry?: SchemaRegistry;
}): ValidateResult {
  const registry = opts.registry ?? createRegistry();
  const errors: Diagnostic[] = [];

  try {
    loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env, registry });
  } catch (e: unknown) {
    errors.push(toDiagnostic(e, opts.configDir));
  }

  let pipeline: string | null = null;
  let jobs = 0;
  try {
    const def = loadPipeline(opts.pipelinePath, registry);
    pipeline = def.name;
    jobs = expandPipeline(def).length;
  } catch (e: unknown) {
    errors.push(toDiagnostic(e, opts.pipelinePath));
  }

  if (errors.length > 0 || pipeline === null) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    pipeline,
    jobs,
    diagnostics: [diag("info", "OK", `${pipeline}: ${jobs} job(s)`, { path: opts.pipelinePath, details: { jobs } })],
  };
}

function toDiagnostic(e: unknown, filePath: string | undefined): Diagnostic {
  const code = e instanceof PipectlError ? e.code : "INTERNAL_ERROR";
  return diag("error", code, errorMessage(e), filePath ? { path: filePath } : undefined);
}
