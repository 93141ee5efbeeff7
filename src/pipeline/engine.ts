// ---------------------------------------------------------------------------
// Pipeline Engine – Job Graph
// ---------------------------------------------------------------------------
// Jobs form a DAG through `needs`. Provides topological sort (Kahn's
// algorithm), cycle detection, graph traversal helpers and structural
// validation.
// ---------------------------------------------------------------------------

import type { JobDefinition } from "./types.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class PipelineCycleError extends Error {
  constructor(message = "Pipeline jobs contain a dependency cycle") {
    super(message);
    this.name = "PipelineCycleError";
  }
}

// ---------------------------------------------------------------------------
// PipelineEngine
// ---------------------------------------------------------------------------

export class PipelineEngine {
  // -------------------------------------------------------------------------
  // topologicalSort – Kahn's algorithm
  // -------------------------------------------------------------------------
  /**
   * Return jobs in a valid execution order. Ties keep declaration order.
   * Throws `PipelineCycleError` if `needs` forms a cycle.
   */
  static topologicalSort(jobs: JobDefinition[]): JobDefinition[] {
    const jobMap = new Map<string, JobDefinition>();
    for (const job of jobs) {
      jobMap.set(job.id, job);
    }

    const inDegree = new Map<string, number>();
    const adjacency = new Map<string, string[]>();
    for (const job of jobs) {
      inDegree.set(job.id, 0);
      adjacency.set(job.id, []);
    }

    for (const job of jobs) {
      for (const need of job.needs) {
        // Unknown needs are reported by validate(); ignore them here.
        const dependents = adjacency.get(need);
        if (!dependents) {
          continue;
        }
        dependents.push(job.id);
        inDegree.set(job.id, (inDegree.get(job.id) ?? 0) + 1);
      }
    }

    const queue: string[] = [];
    for (const [id, deg] of inDegree) {
      if (deg === 0) {
        queue.push(id);
      }
    }

    const sorted: JobDefinition[] = [];
    for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
      const job = jobMap.get(id);
      if (job) {
        sorted.push(job);
      }
      for (const dependent of adjacency.get(id) ?? []) {
        const newDeg = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, newDeg);
        if (newDeg === 0) {
          queue.push(dependent);
        }
      }
    }

    if (sorted.length !== jobs.length) {
      throw new PipelineCycleError();
    }
    return sorted;
  }

  // -------------------------------------------------------------------------
  // validate
  // -------------------------------------------------------------------------
  /**
   * Structural checks on the job graph:
   *   1. Duplicate job ids
   *   2. `needs` referencing unknown jobs (or the job itself)
   *   3. Cycle detection
   */
  static validate(jobs: JobDefinition[]): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const seen = new Set<string>();
    let duplicates = false;

    for (const job of jobs) {
      if (seen.has(job.id)) {
        errors.push(`Duplicate job id "${job.id}"`);
        duplicates = true;
      }
      seen.add(job.id);
    }

    for (const job of jobs) {
      for (const need of job.needs) {
        if (need === job.id) {
          errors.push(`Job "${job.id}" cannot need itself`);
        } else if (!seen.has(need)) {
          errors.push(`Job "${job.id}" needs unknown job "${need}"`);
        }
      }
    }

    // The sort keys on ids, so it only means something once they are unique.
    if (!duplicates) {
      try {
        PipelineEngine.topologicalSort(jobs);
      } catch (err) {
        if (!(err instanceof PipelineCycleError)) {
          throw err;
        }
        errors.push(err.message);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
