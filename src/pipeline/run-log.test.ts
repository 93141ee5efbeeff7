// ---------------------------------------------------------------------------
// Pipeline Run Log – Tests
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { PipelineRun } from "./types.js";
import { appendPipelineRun, loadPipelineRun, loadPipelineRuns, pipelineDirName } from "./run-log.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let runLogDir: string;

beforeEach(async () => {
  runLogDir = await fs.mkdtemp(path.join(os.tmpdir(), "gridrun-run-log-"));
});

afterEach(async () => {
  await fs.rm(runLogDir, { recursive: true, force: true });
});

function makeRun(overrides: Partial<PipelineRun> = {}): PipelineRun {
  return {
    id: "run-1",
    pipeline: "Core Repo Tests",
    status: "success",
    vars: {},
    instances: [],
    reports: {},
    startedAtMs: 1000,
    completedAtMs: 2000,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("pipelineDirName", () => {
  it("slugs free-text pipeline names", () => {
    expect(pipelineDirName("Core Repo Tests")).toBe("core-repo-tests");
    expect(pipelineDirName("..hidden/../escape")).toBe("hidden-..-escape");
    expect(pipelineDirName("release_v1.2")).toBe("release_v1.2");
    expect(pipelineDirName("!!!")).toBe("pipeline");
  });
});

describe("appendPipelineRun + loadPipelineRuns", () => {
  it("writes the run under the pipeline's slug directory", async () => {
    const run = makeRun({ vars: { ref: "main" } });
    const filePath = await appendPipelineRun(runLogDir, run);

    expect(filePath).toBe(path.join(runLogDir, "core-repo-tests", "run-1.json"));
    expect(JSON.parse(await fs.readFile(filePath, "utf-8"))).toEqual(run);
    expect(await fs.readdir(path.dirname(filePath))).toEqual(["run-1.json"]);
  });

  it("loads runs newest-first", async () => {
    await appendPipelineRun(runLogDir, makeRun({ id: "run-1", startedAtMs: 1000 }));
    await appendPipelineRun(runLogDir, makeRun({ id: "run-2", startedAtMs: 3000 }));
    await appendPipelineRun(runLogDir, makeRun({ id: "run-3", startedAtMs: 2000 }));

    const runs = await loadPipelineRuns(runLogDir, "Core Repo Tests");
    expect(runs.map((r) => r.id)).toEqual(["run-2", "run-3", "run-1"]);
  });

  it("applies the limit", async () => {
    for (let i = 1; i <= 4; i++) {
      await appendPipelineRun(runLogDir, makeRun({ id: `run-${i}`, startedAtMs: i * 1000 }));
    }
    const runs = await loadPipelineRuns(runLogDir, "Core Repo Tests", 2);
    expect(runs.map((r) => r.id)).toEqual(["run-4", "run-3"]);
  });

  it("overwrites a run saved twice", async () => {
    await appendPipelineRun(runLogDir, makeRun({ status: "running", completedAtMs: undefined }));
    await appendPipelineRun(runLogDir, makeRun({ status: "failed", error: "tests (1): boom" }));

    const runs = await loadPipelineRuns(runLogDir, "Core Repo Tests");
    expect(runs).toHaveLength(1);
    expect(runs[0]).toMatchObject({ status: "failed", error: "tests (1): boom" });
  });

  it("keeps pipelines apart", async () => {
    await appendPipelineRun(runLogDir, makeRun({ id: "a", pipeline: "lint" }));
    await appendPipelineRun(runLogDir, makeRun({ id: "b", pipeline: "docs" }));
    expect((await loadPipelineRuns(runLogDir, "lint")).map((r) => r.id)).toEqual(["a"]);
  });

  it("keeps pipelines whose names share a directory apart", async () => {
    await appendPipelineRun(runLogDir, makeRun({ id: "a", pipeline: "Core Tests" }));
    await appendPipelineRun(runLogDir, makeRun({ id: "b", pipeline: "core-tests" }));

    expect(await fs.readdir(path.join(runLogDir, "core-tests"))).toHaveLength(2);
    expect((await loadPipelineRuns(runLogDir, "Core Tests")).map((r) => r.id)).toEqual(["a"]);
    expect((await loadPipelineRuns(runLogDir, "core-tests")).map((r) => r.id)).toEqual(["b"]);
  });

  it("returns nothing for a pipeline that never ran", async () => {
    expect(await loadPipelineRuns(runLogDir, "nope")).toEqual([]);
  });

  it("skips files that are not runs", async () => {
    await appendPipelineRun(runLogDir, makeRun());
    const dir = path.join(runLogDir, "core-repo-tests");
    await fs.writeFile(path.join(dir, "broken.json"), "{ not json");
    await fs.writeFile(path.join(dir, "other.json"), JSON.stringify({ id: "x", status: "weird" }));
    await fs.writeFile(path.join(dir, "notes.txt"), "ignored");

    expect((await loadPipelineRuns(runLogDir, "Core Repo Tests")).map((r) => r.id)).toEqual(["run-1"]);
  });
});

describe("loadPipelineRun", () => {
  it("loads a run by id", async () => {
    await appendPipelineRun(runLogDir, makeRun({ id: "run-7" }));
    expect((await loadPipelineRun(runLogDir, "Core Repo Tests", "run-7"))?.id).toBe("run-7");
  });

  it("returns null for an unknown id", async () => {
    expect(await loadPipelineRun(runLogDir, "Core Repo Tests", "missing")).toBeNull();
  });

  it("returns null for a run of another pipeline in the same directory", async () => {
    await appendPipelineRun(runLogDir, makeRun({ id: "run-7", pipeline: "core repo tests" }));
    expect(await loadPipelineRun(runLogDir, "Core Repo Tests", "run-7")).toBeNull();
  });
});
