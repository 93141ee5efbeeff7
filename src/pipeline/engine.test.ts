import { describe, it, expect } from "vitest";
import type { JobDefinition } from "./types.js";
import { PipelineEngine, PipelineCycleError } from "./engine.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeJob(id: string, needs: string[] = []): JobDefinition {
  return {
    id,
    needs,
    env: {},
    strategy: { failFast: true },
    steps: [{ kind: "run", name: "Run true", run: "true" }],
  };
}

function ids(jobs: JobDefinition[]): string[] {
  return jobs.map((job) => job.id);
}

// ---------------------------------------------------------------------------
// topologicalSort
// ---------------------------------------------------------------------------

describe("PipelineEngine.topologicalSort", () => {
  it("sorts a linear pipeline lint → test → report", () => {
    const jobs = [makeJob("report", ["test"]), makeJob("test", ["lint"]), makeJob("lint")];
    expect(ids(PipelineEngine.topologicalSort(jobs))).toEqual(["lint", "test", "report"]);
  });

  it("keeps declaration order for independent jobs", () => {
    const jobs = [makeJob("c"), makeJob("a"), makeJob("b")];
    expect(ids(PipelineEngine.topologicalSort(jobs))).toEqual(["c", "a", "b"]);
  });

  it("sorts a diamond so the join comes last", () => {
    const jobs = [
      makeJob("build"),
      makeJob("unit", ["build"]),
      makeJob("integration", ["build"]),
      makeJob("publish", ["unit", "integration"]),
    ];
    expect(ids(PipelineEngine.topologicalSort(jobs))).toEqual(["build", "unit", "integration", "publish"]);
  });

  it("ignores needs on unknown jobs", () => {
    expect(ids(PipelineEngine.topologicalSort([makeJob("a", ["ghost"])]))).toEqual(["a"]);
  });

  it("throws PipelineCycleError on a cycle", () => {
    const jobs = [makeJob("a", ["c"]), makeJob("b", ["a"]), makeJob("c", ["b"])];
    expect(() => PipelineEngine.topologicalSort(jobs)).toThrow(PipelineCycleError);
  });

  it("handles an empty pipeline", () => {
    expect(PipelineEngine.topologicalSort([])).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

describe("PipelineEngine.validate", () => {
  it("accepts a well-formed graph", () => {
    expect(PipelineEngine.validate([makeJob("a"), makeJob("b", ["a"])])).toEqual({ valid: true, errors: [] });
  });

  it("reports unknown needs", () => {
    expect(PipelineEngine.validate([makeJob("a", ["missing"])]).errors).toEqual([
      'Job "a" needs unknown job "missing"',
    ]);
  });

  it("reports self needs alongside the resulting cycle", () => {
    expect(PipelineEngine.validate([makeJob("a", ["a"])]).errors).toEqual([
      'Job "a" cannot need itself',
      "Pipeline jobs contain a dependency cycle",
    ]);
  });

  it("reports duplicate ids without a spurious cycle", () => {
    const result = PipelineEngine.validate([makeJob("a"), makeJob("a")]);
    expect(result).toEqual({ valid: false, errors: ['Duplicate job id "a"'] });
  });

  it("reports cycles", () => {
    const result = PipelineEngine.validate([makeJob("a", ["b"]), makeJob("b", ["a"])]);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["Pipeline jobs contain a dependency cycle"]);
  });
});
