// ---------------------------------------------------------------------------
// Execution Context – per-instance variable namespaces
// ---------------------------------------------------------------------------
// One context per job instance, never shared. After construction the only
// mutation is appending a finished step (ordered log) and flipping the job
// status seen by status functions.
//
// Namespaces: env, matrix, secrets, vars, job, steps.<id>.{outputs,outcome,conclusion}
// ---------------------------------------------------------------------------

import type { EvaluationScope, ExprValue, JobStatusForGuards } from "./expression/index.js";
import type { MatrixValues, StepResult } from "./types.js";
import { ForwardReferenceError } from "./errors.js";
import { renderRecord } from "./expression/index.js";

export type ExecutionContextInit = {
  /** Pipeline-level env (unrendered). */
  pipelineEnv?: Record<string, string>;
  /** Job-level env (unrendered). */
  jobEnv?: Record<string, string>;
  matrix?: MatrixValues;
  secrets?: Record<string, string>;
  vars?: Record<string, string>;
  job: { id: string; instanceId: string; name: string };
  /** Step ids declared by the job, in order. */
  stepIds?: string[];
  hashFiles?: (patterns: string[]) => string;
};

type StepEntry = {
  id?: string;
  outcome: StepResult["outcome"];
  conclusion: StepResult["conclusion"];
  outputs: Record<string, string>;
};

export class ExecutionContext {
  private readonly matrix: MatrixValues;
  private readonly secrets: Record<string, string>;
  private readonly vars: Record<string, string>;
  private readonly job: ExecutionContextInit["job"];
  private readonly declaredStepIds: Set<string>;
  private readonly hashFilesFn?: (patterns: string[]) => string;
  private readonly stepLog: StepEntry[] = [];
  private env: Record<string, string> = {};
  private status: JobStatusForGuards = "success";

  constructor(init: ExecutionContextInit) {
    this.matrix = { ...init.matrix };
    this.secrets = { ...init.secrets };
    this.vars = { ...init.vars };
    this.job = init.job;
    this.declaredStepIds = new Set(init.stepIds ?? []);
    this.hashFilesFn = init.hashFiles;

    // Pipeline env sees matrix/vars; job env additionally sees pipeline env.
    const pipelineEnv = renderRecord(init.pipelineEnv, this.scope());
    this.env = pipelineEnv;
    const jobEnv = renderRecord(init.jobEnv, this.scope());
    this.env = { ...pipelineEnv, ...jobEnv };
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  getEnv(): Record<string, string> {
    return { ...this.env };
  }

  getSecrets(): Record<string, string> {
    return { ...this.secrets };
  }

  getJobStatus(): JobStatusForGuards {
    return this.status;
  }

  markFailed(): void {
    this.status = "failure";
  }

  hasCompleted(stepId: string): boolean {
    return this.stepLog.some((entry) => entry.id === stepId);
  }

  // -------------------------------------------------------------------------
  // Mutation
  // -------------------------------------------------------------------------

  /** Record a finished step; its outputs become visible to later steps. */
  appendStep(result: StepResult): void {
    this.stepLog.push({
      id: result.id,
      outcome: result.outcome,
      conclusion: result.conclusion,
      outputs: { ...result.outputs },
    });
  }

  // -------------------------------------------------------------------------
  // Scope
  // -------------------------------------------------------------------------

  /**
   * Build an evaluation scope. `envOverlay` adds step-level env on top of the
   * job env for the duration of one step.
   */
  scope(envOverlay?: Record<string, string>): EvaluationScope {
    const env = envOverlay ? { ...this.env, ...envOverlay } : this.env;
    return {
      lookup: (namespace) => this.lookup(namespace, env),
      checkAccess: (namespace, key) => {
        if (namespace === "steps" && this.declaredStepIds.has(key) && !this.hasCompleted(key)) {
          throw new ForwardReferenceError(key);
        }
      },
      hashFiles: this.hashFilesFn,
      jobStatus: this.status,
    };
  }

  private lookup(namespace: string, env: Record<string, string>): ExprValue {
    switch (namespace) {
      case "env":
        return { ...env };
      case "matrix":
        return { ...this.matrix };
      case "secrets":
        return { ...this.secrets };
      case "vars":
        return { ...this.vars };
      case "job":
        return {
          id: this.job.id,
          instance: this.job.instanceId,
          name: this.job.name,
          status: this.status,
        };
      case "steps":
        return this.stepsNamespace();
      default:
        return null;
    }
  }

  private stepsNamespace(): ExprValue {
    const out: { [id: string]: ExprValue } = {};
    for (const entry of this.stepLog) {
      if (!entry.id) {
        continue;
      }
      out[entry.id] = {
        outputs: { ...entry.outputs },
        outcome: toGuardStatus(entry.outcome),
        conclusion: toGuardStatus(entry.conclusion),
      };
    }
    return out;
  }
}

function toGuardStatus(status: StepResult["outcome"]): string {
  switch (status) {
    case "succeeded":
      return "success";
    case "failed":
      return "failure";
    case "skipped":
      return "skipped";
  }
}
