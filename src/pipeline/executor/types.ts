// ---------------------------------------------------------------------------
// Pipeline Executor – Shared Types
// ---------------------------------------------------------------------------
// These types define the contract between the job runner and its
// collaborators: the command runner that executes `run` steps, the built-in
// actions behind `uses` steps, and the dependency bag each job instance gets.
// ---------------------------------------------------------------------------

import type { ChildLogger } from "../../logging.js";
import type { BenchmarkAggregator } from "../aggregator.js";
import type { CacheResolver } from "../cache/resolver.js";
import type { EvaluationScope } from "../expression/index.js";
import type { ActionStep, JobInstance, RunEvent, StepShell } from "../types.js";
import type { StepActionRegistry } from "./actions.js";

// ---------------------------------------------------------------------------
// CommandRunner — executes one rendered `run` step
// ---------------------------------------------------------------------------

export type CommandRequest = {
  command: string;
  env: Record<string, string>;
  cwd: string;
  shell: StepShell;
  /** Undefined means no timeout. */
  timeoutMs?: number;
  /** File the command appends `name=value` outputs to (exported as GRIDRUN_OUTPUT). */
  outputFile: string;
  /** Values replaced with `***` in captured output. */
  secrets?: string[];
};

export type CommandResult = {
  exitCode: number;
  timedOut: boolean;
  /** Combined stdout/stderr tail, secrets masked. */
  output: string;
  outputs: Record<string, string>;
};

export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Events emitted by a job instance
// ---------------------------------------------------------------------------

/** A RunEvent before the orchestrator stamps run id, pipeline and time. */
export type InstanceEvent = Omit<RunEvent, "runId" | "pipeline" | "timestamp">;

export type InstanceEventCallback = (event: InstanceEvent) => void;

// ---------------------------------------------------------------------------
// Built-in actions (`uses:` steps)
// ---------------------------------------------------------------------------

/** Runs after all steps; `succeeded` is the instance's final status. */
export type PostJobHook = {
  name: string;
  run: (succeeded: boolean) => Promise<void>;
};

export type StepActionContext = {
  step: ActionStep;
  /** `with` inputs, rendered. */
  inputs: Record<string, string>;
  /** Scope the inputs were rendered against. */
  scope: EvaluationScope;
  instance: JobInstance;
  workdir: string;
  cache?: CacheResolver;
  aggregator?: BenchmarkAggregator;
  registerPostJob: (hook: PostJobHook) => void;
  emit: InstanceEventCallback;
  log: ChildLogger;
};

/** Returns the step's outputs. Throwing fails the step. */
export type StepActionFn = (context: StepActionContext) => Promise<Record<string, string>>;

export type StepActionInput = {
  key: string;
  required?: boolean;
  description?: string;
};

export type StepActionDefinition = {
  name: string;
  description: string;
  inputs: StepActionInput[];
  execute: StepActionFn;
};

// ---------------------------------------------------------------------------
// JobDeps — dependency bag passed to every job instance
// ---------------------------------------------------------------------------

export type JobDeps = {
  runner: CommandRunner;
  actions: StepActionRegistry;
  /** Workspace root; step working directories resolve against it. */
  workdir: string;
  pipelineEnv?: Record<string, string>;
  secrets?: Record<string, string>;
  vars?: Record<string, string>;
  cache?: CacheResolver;
  aggregator?: BenchmarkAggregator;
  /** Applied when neither step nor job sets a timeout. */
  defaultTimeoutSeconds?: number;
  onEvent?: InstanceEventCallback;
  log?: ChildLogger;
};
