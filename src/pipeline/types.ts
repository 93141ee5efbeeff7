// ---------------------------------------------------------------------------
// Pipeline System – Core Types
// ---------------------------------------------------------------------------
// Const arrays are the single source of truth. Types are derived from them
// so runtime validation and compile-time types stay in sync automatically.
// ---------------------------------------------------------------------------

// ===========================================================================
// MATRIX
// ===========================================================================

export type MatrixValue = string | number | boolean;

/** One concrete axis → value assignment. */
export type MatrixValues = Record<string, MatrixValue>;

export type MatrixConfig = {
  /** Axis name → ordered list of values. */
  axes: Record<string, MatrixValue[]>;
  /** Partial assignments to remove from the product. */
  exclude?: MatrixValues[];
  /** Extra keys merged into matching combinations, or standalone combinations. */
  include?: MatrixValues[];
};

export type MatrixInstance = {
  /** Position in expansion order. */
  index: number;
  values: MatrixValues;
};

// ===========================================================================
// STEPS
// ===========================================================================

export const STEP_SHELLS = ["sh", "bash"] as const;

export type StepShell = (typeof STEP_SHELLS)[number];

type BaseStep = {
  name: string;
  /** Identifier used by later steps as `steps.<id>`. */
  id?: string;
  /** Guard expression; absent means the step runs. */
  if?: string;
  env?: Record<string, string>;
  continueOnError?: boolean;
  timeoutSeconds?: number;
};

export type RunStep = BaseStep & {
  kind: "run";
  /** Command template. */
  run: string;
  shell?: StepShell;
  workingDirectory?: string;
};

export type ActionStep = BaseStep & {
  kind: "action";
  /** Built-in action name (`cache`, `benchmark`). */
  uses: string;
  /** Templated inputs. */
  with: Record<string, string>;
};

export type StepDefinition = RunStep | ActionStep;

// ===========================================================================
// JOBS & PIPELINE
// ===========================================================================

export type JobStrategy = {
  matrix?: MatrixConfig;
  /** Cancel not-yet-started instances after the first failure. Default true. */
  failFast: boolean;
  /** Per-job concurrency cap; undefined means unbounded. */
  maxParallel?: number;
};

export type JobDefinition = {
  id: string;
  /** Display name template; may reference `matrix`. */
  name?: string;
  needs: string[];
  env: Record<string, string>;
  strategy: JobStrategy;
  timeoutSeconds?: number;
  steps: StepDefinition[];
};

export type PipelineDefinition = {
  name: string;
  env: Record<string, string>;
  jobs: JobDefinition[];
};

export type JobInstance = {
  jobId: string;
  /** Stable identifier: `build` or `build (py38, api)`. */
  instanceId: string;
  displayName: string;
  matrix: MatrixInstance;
};

// ===========================================================================
// STEP / INSTANCE STATE
// ===========================================================================

export const STEP_STATUSES = ["pending", "running", "succeeded", "failed", "skipped"] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

export type StepOutcome = Extract<StepStatus, "succeeded" | "failed" | "skipped">;

export type StepResult = {
  name: string;
  id?: string;
  /** Result before continueOnError is applied. */
  outcome: StepOutcome;
  /** Result after continueOnError is applied. */
  conclusion: StepOutcome;
  outputs: Record<string, string>;
  startedAtMs?: number;
  completedAtMs?: number;
  exitCode?: number;
  /** Error class name (CommandFailure, TimeoutError, …). */
  errorKind?: string;
  error?: string;
  reason?: string;
  /** Captured stdout/stderr tail with secrets masked. */
  log?: string;
};

export const INSTANCE_STATUSES = ["pending", "running", "succeeded", "failed", "skipped"] as const;

export type InstanceStatus = (typeof INSTANCE_STATUSES)[number];

export type InstanceResult = {
  jobId: string;
  instanceId: string;
  displayName: string;
  matrix: MatrixValues;
  status: Extract<InstanceStatus, "succeeded" | "failed" | "skipped">;
  steps: StepResult[];
  startedAtMs?: number;
  completedAtMs?: number;
  error?: string;
  reason?: string;
};

// ===========================================================================
// BENCHMARKS
// ===========================================================================

export type BenchmarkPayload = Record<string, unknown>;

export type BenchmarkRecord = {
  jobId: string;
  instanceId: string;
  instanceIndex: number;
  group: string;
  payload: BenchmarkPayload;
};

// ===========================================================================
// PIPELINE RUN
// ===========================================================================

export const PIPELINE_RUN_STATUSES = ["running", "success", "failed"] as const;

export type PipelineRunStatus = (typeof PIPELINE_RUN_STATUSES)[number];

export type PipelineRun = {
  id: string;
  pipeline: string;
  status: PipelineRunStatus;
  vars: Record<string, string>;
  instances: InstanceResult[];
  /** Merged benchmark documents by group; null means no data. */
  reports: Record<string, BenchmarkPayload | null>;
  startedAtMs: number;
  completedAtMs?: number;
  error?: string;
};

// ===========================================================================
// EVENTS
// ===========================================================================

export type RunEventType =
  | "run_started"
  | "instance_started"
  | "instance_completed"
  | "instance_skipped"
  | "step_started"
  | "step_completed"
  | "step_failed"
  | "step_skipped"
  | "cache_hit"
  | "cache_miss"
  | "cache_saved"
  | "report_published"
  | "run_completed";

export interface RunEvent {
  type: RunEventType;
  runId: string;
  pipeline: string;
  timestamp: number;
  jobId?: string;
  instanceId?: string;
  step?: string;
  status?: string;
  error?: string;
  reason?: string;
  key?: string;
  group?: string;
  durationMs?: number;
}

export type RunEventCallback = (event: RunEvent) => void;
