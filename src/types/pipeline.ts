/** Declarative pipeline definition, as loaded from a pipeline YAML file. */
export type TriggerKind = "push" | "pull_request";

export const TRIGGER_KINDS: readonly TriggerKind[] = ["push", "pull_request"];

/** Axis name → ordered permitted values. Key order is the expansion order. */
export type AxisSet = Record<string, string[]>;

export type MatrixOverride = {
  match: Record<string, string>;
  env?: Record<string, string>;
};

export type MatrixDefinition = {
  axes: AxisSet;
  overrides?: MatrixOverride[];
  exclude?: Record<string, string>[];
};

export type RunCondition =
  | { kind: "always" }
  | { kind: "on_success" }
  | { kind: "on_failure" }
  | { kind: "on_event"; event: TriggerKind }
  | { kind: "on_matrix"; values: Record<string, string> };

/** Env value that is either literal or a reference resolved by the secret store. */
export type EnvValue = string | { secret: string };

export type ArtifactDeclaration = {
  name: string;
  path: string;
};

export type StepDefinition = {
  name: string;
  run: string;
  if: RunCondition;
  env: Record<string, EnvValue>;
  artifacts: ArtifactDeclaration[];
  timeout_s?: number;
  continue_on_error: boolean;
  /** Overrides the job's shell for this step. */
  shell?: string;
};

export type ToolResourceSpec = {
  kind: "tool";
  name: string;
  url: string;
  path_in_archive?: string;
};

export type ClusterResourceSpec = {
  kind: "cluster";
  name: string;
  config?: string;
  /** Rewrite 127.0.0.1 to localhost in the generated kubeconfig. */
  localhost?: boolean;
  node_ip?: { interface: string; env: string };
};

export type ResourceSpec = ToolResourceSpec | ClusterResourceSpec;

export type JobTemplate = {
  name: string;
  /** Opaque placement hint (e.g. a hosted image or a self-hosted label set). */
  runs_on?: string | string[];
  matrix?: MatrixDefinition;
  /** Shell for every step of the job; defaults to the configured one. */
  shell?: string;
  env: Record<string, string>;
  resources: ResourceSpec[];
  steps: StepDefinition[];
};

export type PipelineDefinition = {
  name: string;
  env: Record<string, string>;
  jobs: JobTemplate[];
};

/** External occurrence that started the run. */
export type TriggerEvent = {
  kind: TriggerKind;
  ref: string;
  repository: string;
  sha?: string;
};
