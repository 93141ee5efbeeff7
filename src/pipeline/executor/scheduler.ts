// ---------------------------------------------------------------------------
// Pipeline Executor – Instance Scheduler
// ---------------------------------------------------------------------------
// Runs a job's instances on a shared global pool plus an optional per-job
// pool (strategy.maxParallel). With failFast, the first failed instance
// cancels every instance that has not started yet; running ones finish.
// Results come back in instance order regardless of completion order.
// ---------------------------------------------------------------------------

import type { InstanceResult, JobDefinition, JobInstance, StepResult } from "../types.js";

// ---------------------------------------------------------------------------
// WorkerPool
// ---------------------------------------------------------------------------

/** Counting semaphore. Waiters are served first-in, first-out. */
export class WorkerPool {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  /** `Infinity` (the default) means unbounded. */
  constructor(readonly limit: number = Infinity) {
    if (!(limit >= 1)) {
      throw new RangeError(`Worker pool limit must be at least 1, got ${limit}`);
    }
  }

  /** Resolves with a release function once a slot is free. */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.active++;
        let released = false;
        resolve(() => {
          if (released) {
            return;
          }
          released = true;
          this.active--;
          this.waiters.shift()?.();
        });
      };
      if (this.active < this.limit) {
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

// ---------------------------------------------------------------------------
// skippedInstance
// ---------------------------------------------------------------------------

/** Result for an instance that never started. */
export function skippedInstance(
  instance: JobInstance,
  job: JobDefinition,
  reason: string,
): InstanceResult {
  return {
    jobId: instance.jobId,
    instanceId: instance.instanceId,
    displayName: instance.displayName,
    matrix: { ...instance.matrix.values },
    status: "skipped",
    steps: job.steps.map((step): StepResult => ({
      name: step.name,
      id: step.id,
      outcome: "skipped",
      conclusion: "skipped",
      outputs: {},
      reason,
    })),
    reason,
  };
}

// ---------------------------------------------------------------------------
// runJobInstances
// ---------------------------------------------------------------------------

export type ScheduleOptions = {
  job: JobDefinition;
  instances: JobInstance[];
  /** Shared across every job of the run. */
  globalPool: WorkerPool;
  runInstance: (instance: JobInstance) => Promise<InstanceResult>;
  onSkipped?: (result: InstanceResult) => void;
};

export async function runJobInstances(opts: ScheduleOptions): Promise<InstanceResult[]> {
  const { job, instances, globalPool } = opts;
  const jobPool = new WorkerPool(job.strategy.maxParallel ?? Infinity);
  let cancelled = false;

  const runOne = async (instance: JobInstance): Promise<InstanceResult> => {
    const releaseJob = await jobPool.acquire();
    try {
      const releaseGlobal = await globalPool.acquire();
      try {
        if (cancelled) {
          const skipped = skippedInstance(instance, job, "fail-fast");
          opts.onSkipped?.(skipped);
          return skipped;
        }
        const result = await opts.runInstance(instance);
        if (result.status === "failed" && job.strategy.failFast) {
          cancelled = true;
        }
        return result;
      } finally {
        releaseGlobal();
      }
    } finally {
      releaseJob();
    }
  };

  return Promise.all(instances.map(runOne));
}
