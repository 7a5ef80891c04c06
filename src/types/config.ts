/** Configuration types: layered config (base.yaml ← {env}.yaml ← PIPECTL_*). */
export type ClusterToolConfig = {
  kind_bin: string;
  kubectl_bin: string;
  ready_timeout_s: number;
};

export type PipectlConfig = {
  schema_version: string;
  runs_dir: string;
  tools_dir: string;
  shell: string;
  /** 0 means every job starts at once. */
  max_parallel: number;
  fail_fast: boolean;
  default_step_timeout_s: number;
  resource_timeout_s: number;
  cluster: ClusterToolConfig;
};
