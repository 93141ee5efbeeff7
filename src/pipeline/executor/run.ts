// ---------------------------------------------------------------------------
// Pipeline Executor – Full Run Orchestrator
// ---------------------------------------------------------------------------
// Expands every job's matrix up front (configuration errors abort before
// anything runs), then starts each job once all of its `needs` have
// finished. Instances share one global worker pool. Events stream through
// `onEvent`; benchmark groups are merged and published after the last job.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { ChildLogger } from "../../logging.js";
import type { CacheResolver } from "../cache/resolver.js";
import type { ReportSink } from "../report.js";
import type {
  InstanceResult,
  JobDefinition,
  JobInstance,
  PipelineDefinition,
  PipelineRun,
  RunEventCallback,
} from "../types.js";
import type { CommandRunner, InstanceEvent } from "./types.js";
import type { StepActionRegistry } from "./actions.js";
import { getChildLogger } from "../../logging.js";
import { BenchmarkAggregator } from "../aggregator.js";
import { PipelineEngine } from "../engine.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import { expandJob } from "../matrix.js";
import { templateIssues } from "../schema.js";
import { createDefaultActionRegistry } from "./actions.js";
import { runJobInstance } from "./job.js";
import { WorkerPool, runJobInstances, skippedInstance } from "./scheduler.js";
import { ShellCommandRunner } from "./shell.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export type ExecutePipelineOptions = {
  /** Workspace root every instance runs in. */
  workdir: string;
  runId?: string;
  runner?: CommandRunner;
  actions?: StepActionRegistry;
  cache?: CacheResolver;
  reportSink?: ReportSink;
  secrets?: Record<string, string>;
  /** Trigger variables, visible as `vars.*`. */
  vars?: Record<string, string>;
  /** Global instance concurrency; undefined means unbounded. */
  maxParallel?: number;
  defaultTimeoutSeconds?: number;
  /** Run only these jobs (plus everything they need). */
  jobs?: string[];
  log?: ChildLogger;
};

// ---------------------------------------------------------------------------
// Job selection
// ---------------------------------------------------------------------------

/** The selected jobs plus their transitive `needs`, in definition order. */
export function selectJobs(jobs: JobDefinition[], selected?: string[]): JobDefinition[] {
  if (!selected || selected.length === 0) {
    return jobs;
  }
  const byId = new Map(jobs.map((job) => [job.id, job]));
  const unknown = selected.filter((id) => !byId.has(id));
  if (unknown.length > 0) {
    throw new ConfigurationError(unknown.map((id) => `Unknown job "${id}"`));
  }
  const keep = new Set<string>();
  const queue = [...selected];
  for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
    if (keep.has(id)) {
      continue;
    }
    keep.add(id);
    queue.push(...(byId.get(id)?.needs ?? []));
  }
  return jobs.filter((job) => keep.has(job.id));
}

// ---------------------------------------------------------------------------
// executePipeline
// ---------------------------------------------------------------------------

/**
 * Execute a pipeline end to end and return the completed `PipelineRun`.
 *
 * Throws `ConfigurationError` (before any event is emitted) when the job
 * graph, a matrix or a template is invalid.
 */
export async function executePipeline(
  definition: PipelineDefinition,
  options: ExecutePipelineOptions,
  onEvent: RunEventCallback = () => {},
): Promise<PipelineRun> {
  const log = options.log ?? getChildLogger({ module: "run" });
  const jobs = selectJobs(definition.jobs, options.jobs);

  const { errors } = PipelineEngine.validate(jobs);
  const issues = [...errors, ...templateIssues(definition.env, jobs)];
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  const sorted = PipelineEngine.topologicalSort(jobs);

  const expanded = new Map<string, JobInstance[]>();
  const matrixErrors: string[] = [];
  for (const job of jobs) {
    try {
      expanded.set(job.id, expandJob(job));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      matrixErrors.push(...err.issues.map((issue) => `Job "${job.id}": ${issue}`));
    }
  }
  if (matrixErrors.length > 0) {
    throw new ConfigurationError(matrixErrors);
  }

  const run: PipelineRun = {
    id: options.runId ?? randomUUID(),
    pipeline: definition.name,
    status: "running",
    vars: { ...options.vars },
    instances: [],
    reports: {},
    startedAtMs: Date.now(),
  };

  const emit = (event: InstanceEvent) =>
    onEvent({ ...event, runId: run.id, pipeline: run.pipeline, timestamp: Date.now() });

  emit({ type: "run_started" });
  log.info(`run ${run.id} of "${run.pipeline}" started (${jobs.length} job(s))`);

  const runner = options.runner ?? new ShellCommandRunner();
  const actions = options.actions ?? createDefaultActionRegistry();
  const aggregator = new BenchmarkAggregator(definition.jobs.map((job) => job.id));
  const globalPool = new WorkerPool(options.maxParallel ?? Infinity);

  const emitSkipped = (result: InstanceResult) =>
    emit({
      type: "instance_skipped",
      jobId: result.jobId,
      instanceId: result.instanceId,
      reason: result.reason,
    });

  // Each job's promise resolves with its results once every need is done.
  const jobRuns = new Map<string, Promise<InstanceResult[]>>();
  for (const job of sorted) {
    const needs = job.needs.map((id) => jobRuns.get(id) ?? Promise.resolve<InstanceResult[]>([]));
    const instances = expanded.get(job.id) ?? [];

    jobRuns.set(
      job.id,
      Promise.all(needs).then((upstream) => {
        const blocked = upstream.some((results) =>
          results.some((result) => result.status !== "succeeded"),
        );
        if (blocked) {
          log.info(`job "${job.id}" skipped: a needed job did not succeed`);
          return instances.map((instance) => {
            const skipped = skippedInstance(instance, job, "needs-failed");
            emitSkipped(skipped);
            return skipped;
          });
        }
        return runJobInstances({
          job,
          instances,
          globalPool,
          onSkipped: emitSkipped,
          runInstance: (instance) =>
            runJobInstance(instance, job, {
              runner,
              actions,
              workdir: options.workdir,
              pipelineEnv: definition.env,
              secrets: options.secrets,
              vars: options.vars,
              cache: options.cache,
              aggregator,
              defaultTimeoutSeconds: options.defaultTimeoutSeconds,
              onEvent: emit,
              log: options.log,
            }),
        });
      }),
    );
  }

  const settled = await Promise.allSettled(
    jobs.map((job) => jobRuns.get(job.id) ?? Promise.resolve<InstanceResult[]>([])),
  );
  for (const outcome of settled) {
    if (outcome.status === "fulfilled") {
      run.instances.push(...outcome.value);
    } else {
      run.error ??= errorMessage(outcome.reason);
    }
  }
  if (run.error !== undefined) {
    log.error(`run ${run.id} aborted: ${run.error}`);
  }

  // -------------------------------------------------------------------------
  // Reports
  // -------------------------------------------------------------------------

  run.reports = aggregator.mergeAll();
  if (options.reportSink) {
    for (const [group, document] of Object.entries(run.reports)) {
      try {
        await options.reportSink.publish(group, document);
        emit({ type: "report_published", group, status: document === null ? "empty" : "published" });
      } catch (err) {
        log.error(`publishing report "${group}" failed: ${errorMessage(err)}`);
        run.error ??= `Report "${group}" could not be published: ${errorMessage(err)}`;
      }
    }
  }

  const failed = run.error !== undefined || run.instances.some((r) => r.status === "failed");
  const firstFailure = run.instances.find((r) => r.status === "failed");
  run.status = failed ? "failed" : "success";
  run.error ??= firstFailure ? `${firstFailure.instanceId}: ${firstFailure.error ?? "failed"}` : undefined;
  run.completedAtMs = Date.now();

  emit({
    type: "run_completed",
    status: run.status,
    error: run.error,
    durationMs: run.completedAtMs - run.startedAtMs,
  });
  log.info(`run ${run.id} finished: ${run.status}`);

  return run;
}
