import { mkdirSync, writeFileSync } from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ChildLogger } from "../../logging.js";
import type { ReportSink } from "../report.js";
import type { BenchmarkPayload, PipelineDefinition, RunEvent } from "../types.js";
import type { CommandRequest, CommandResult, CommandRunner } from "./types.js";
import { MemoryCacheBackend } from "../cache/backend.js";
import { CacheResolver } from "../cache/resolver.js";
import { ConfigurationError } from "../errors.js";
import { parsePipelineDefinition } from "../loader.js";
import { executePipeline, selectJobs } from "./run.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

class FakeRunner implements CommandRunner {
  readonly requests: CommandRequest[] = [];

  constructor(private readonly handler: (request: CommandRequest) => Partial<CommandResult> = () => ({})) {}

  async run(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    return { exitCode: 0, timedOut: false, output: "", outputs: {}, ...this.handler(request) };
  }
}

class MemoryReportSink implements ReportSink {
  readonly published: Array<[string, BenchmarkPayload | null]> = [];

  async publish(group: string, document: BenchmarkPayload | null): Promise<void> {
    this.published.push([group, document]);
  }
}

function fakeLog(): ChildLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function yaml(lines: string[]): PipelineDefinition {
  return parsePipelineDefinition(lines.join("\n"));
}

let workdir: string;
let events: RunEvent[];

async function execute(
  definition: PipelineDefinition,
  runner: CommandRunner,
  options: Partial<Parameters<typeof executePipeline>[1]> = {},
) {
  return executePipeline(
    definition,
    { workdir, runner, runId: "run-1", log: fakeLog(), ...options },
    (event) => events.push(event),
  );
}

beforeEach(async () => {
  workdir = await fs.mkdtemp(path.join(os.tmpdir(), "gridrun-run-"));
  events = [];
});

afterEach(async () => {
  await fs.rm(workdir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// selectJobs
// ---------------------------------------------------------------------------

describe("selectJobs", () => {
  const definition = yaml([
    "name: ci",
    "jobs:",
    "  lint:",
    "    steps: [{ run: ruff check }]",
    "  tests:",
    "    needs: lint",
    "    steps: [{ run: pytest }]",
    "  docs:",
    "    steps: [{ run: mkdocs build }]",
  ]);

  it("returns everything when nothing is selected", () => {
    expect(selectJobs(definition.jobs).map((j) => j.id)).toEqual(["lint", "tests", "docs"]);
  });

  it("adds the needs of selected jobs", () => {
    expect(selectJobs(definition.jobs, ["tests"]).map((j) => j.id)).toEqual(["lint", "tests"]);
  });

  it("rejects unknown job ids", () => {
    expect(() => selectJobs(definition.jobs, ["nope"])).toThrow('Unknown job "nope"');
  });
});

// ---------------------------------------------------------------------------
// executePipeline
// ---------------------------------------------------------------------------

describe("executePipeline", () => {
  it("runs every instance of a passing pipeline and stamps events", async () => {
    const runner = new FakeRunner();
    const run = await execute(
      yaml([
        "name: ci",
        "jobs:",
        "  tests:",
        "    strategy:",
        "      matrix:",
        "        version: [1, 2]",
        "        os: [x, y]",
        "      max-parallel: 2",
        "    steps:",
        "      - run: test --version ${{ matrix.version }} --os ${{ matrix.os }}",
      ]),
      runner,
    );

    expect(run.status).toBe("success");
    expect(run.error).toBeUndefined();
    expect(run.instances.map((i) => i.instanceId)).toEqual([
      "tests (1, x)",
      "tests (1, y)",
      "tests (2, x)",
      "tests (2, y)",
    ]);
    expect(runner.requests.map((r) => r.command).sort()).toEqual([
      "test --version 1 --os x",
      "test --version 1 --os y",
      "test --version 2 --os x",
      "test --version 2 --os y",
    ]);
    expect(events[0]).toMatchObject({ type: "run_started", runId: "run-1", pipeline: "ci" });
    expect(events[events.length - 1]).toMatchObject({ type: "run_completed", status: "success" });
    expect(events.every((e) => e.runId === "run-1" && e.pipeline === "ci")).toBe(true);
  });

  it("skips unstarted instances after a fail-fast failure", async () => {
    const runner = new FakeRunner((request) => (request.command === "pytest --shard 1" ? { exitCode: 1 } : {}));
    const run = await execute(
      yaml([
        "name: ci",
        "jobs:",
        "  tests:",
        "    strategy:",
        "      max-parallel: 1",
        "      matrix:",
        "        shard: [1, 2, 3]",
        "    steps:",
        "      - run: pytest --shard ${{ matrix.shard }}",
      ]),
      runner,
    );

    expect(run.status).toBe("failed");
    expect(run.error).toBe("tests (1): Command exited with code 1");
    expect(run.instances.map((i) => [i.status, i.reason])).toEqual([
      ["failed", undefined],
      ["skipped", "fail-fast"],
      ["skipped", "fail-fast"],
    ]);
    expect(events.filter((e) => e.type === "instance_skipped").map((e) => e.instanceId)).toEqual([
      "tests (2)",
      "tests (3)",
    ]);
  });

  it("skips jobs whose needs did not succeed and keeps running independent ones", async () => {
    const runner = new FakeRunner((request) => (request.command === "ruff check" ? { exitCode: 1 } : {}));
    const run = await execute(
      yaml([
        "name: ci",
        "jobs:",
        "  lint:",
        "    steps: [{ run: ruff check }]",
        "  tests:",
        "    needs: [lint]",
        "    strategy:",
        "      matrix:",
        "        python: [py38, py311]",
        "    steps: [{ run: pytest }]",
        "  docs:",
        "    steps: [{ run: mkdocs build }]",
      ]),
      runner,
    );

    expect(run.status).toBe("failed");
    expect(run.error).toBe("lint: Command exited with code 1");
    expect(run.instances.map((i) => [i.instanceId, i.status, i.reason])).toEqual([
      ["lint", "failed", undefined],
      ["tests (py38)", "skipped", "needs-failed"],
      ["tests (py311)", "skipped", "needs-failed"],
      ["docs", "succeeded", undefined],
    ]);
    expect(runner.requests.map((r) => r.command).sort()).toEqual(["mkdocs build", "ruff check"]);
  });

  it("runs a job after the jobs it needs", async () => {
    const order: string[] = [];
    const runner = new FakeRunner((request) => {
      order.push(request.command);
      return {};
    });
    await execute(
      yaml([
        "name: ci",
        "jobs:",
        "  publish:",
        "    needs: [build]",
        "    steps: [{ run: publish }]",
        "  build:",
        "    steps: [{ run: build }]",
      ]),
      runner,
    );
    expect(order).toEqual(["build", "publish"]);
  });

  it("passes pipeline env, secrets and vars to every instance", async () => {
    const runner = new FakeRunner();
    await execute(
      yaml([
        "name: ci",
        "env:",
        "  REF: ${{ vars.ref }}",
        "jobs:",
        "  deploy:",
        "    steps:",
        "      - run: deploy --token ${{ secrets.TOKEN }}",
      ]),
      runner,
      { secrets: { TOKEN: "test-secret" }, vars: { ref: "main" } },
    );

    expect(runner.requests[0].command).toBe("deploy --token test-secret");
    expect(runner.requests[0].env.REF).toBe("main");
    expect(runner.requests[0].secrets).toEqual(["test-secret"]);
  });

  // -------------------------------------------------------------------------
  // Configuration errors
  // -------------------------------------------------------------------------

  it("rejects an invalid job graph before emitting anything", async () => {
    const definition: PipelineDefinition = {
      name: "broken",
      env: {},
      jobs: [
        {
          id: "tests",
          needs: ["ghost"],
          env: {},
          strategy: { failFast: true },
          steps: [{ kind: "run", name: "Run true", run: "true" }],
        },
      ],
    };
    await expect(execute(definition, new FakeRunner())).rejects.toThrow('Job "tests" needs unknown job "ghost"');
    expect(events).toEqual([]);
  });

  it("rejects a matrix whose every combination is excluded", async () => {
    const definition: PipelineDefinition = {
      name: "broken",
      env: {},
      jobs: [
        {
          id: "tests",
          needs: [],
          env: {},
          strategy: { failFast: true, matrix: { axes: { os: ["x"] }, exclude: [{ os: "x" }] } },
          steps: [{ kind: "run", name: "Run true", run: "true" }],
        },
      ],
    };
    const error = await execute(definition, new FakeRunner()).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError ? error.issues : []).toEqual([
      'Job "tests": Every matrix combination is excluded',
    ]);
    expect(events).toEqual([]);
  });

  it("rejects a malformed job name template before running any job", async () => {
    const definition: PipelineDefinition = {
      name: "broken",
      env: {},
      jobs: [
        {
          id: "ok",
          needs: [],
          env: {},
          strategy: { failFast: true },
          steps: [{ kind: "run", name: "Run true", run: "true" }],
        },
        {
          id: "bad",
          name: "Bad ${{ matrix.v ",
          needs: [],
          env: {},
          strategy: { failFast: true, matrix: { axes: { v: [1] } } },
          steps: [{ kind: "run", name: "Run true", run: "true" }],
        },
      ],
    };
    const runner = new FakeRunner();
    const error = await execute(definition, runner).catch((err: unknown) => err);

    expect(error instanceof ConfigurationError ? error.issues : error).toEqual([
      'Job "bad" name: Unterminated expression in "Bad ${{ matrix.v "',
    ]);
    expect(runner.requests).toEqual([]);
    expect(events).toEqual([]);
  });

  // -------------------------------------------------------------------------
  // Benchmarks
  // -------------------------------------------------------------------------

  const benchmarkPipeline = [
    "name: bench",
    "jobs:",
    "  bench:",
    "    strategy:",
    "      fail-fast: false",
    "      matrix:",
    "        python: [py38, py311, py312]",
    "    steps:",
    "      - run: pytest --benchmark-json bench-${{ matrix.python }}.json",
    "      - uses: benchmark",
    "        with:",
    "          group: perf",
    "          file: bench-${{ matrix.python }}.json",
  ];

  it("merges benchmark documents in matrix order and publishes them", async () => {
    await fs.writeFile(
      path.join(workdir, "bench-py311.json"),
      JSON.stringify({ machine: "m2", benchmarks: [{ name: "b" }] }),
    );
    await fs.writeFile(
      path.join(workdir, "bench-py38.json"),
      JSON.stringify({ machine: "m1", benchmarks: [{ name: "a" }] }),
    );
    const sink = new MemoryReportSink();

    const run = await execute(yaml(benchmarkPipeline), new FakeRunner(), { reportSink: sink });

    const merged = { machine: "m1", benchmarks: [{ name: "a" }, { name: "b" }] };
    expect(run.status).toBe("success");
    expect(run.reports).toEqual({ perf: merged });
    expect(sink.published).toEqual([["perf", merged]]);
    expect(run.instances.map((i) => i.steps[1].outputs.found)).toEqual(["true", "true", "false"]);
    expect(events.find((e) => e.type === "report_published")).toMatchObject({ group: "perf", status: "published" });
  });

  it("merges documents from several jobs in definition order", async () => {
    await fs.writeFile(path.join(workdir, "late.json"), JSON.stringify({ benchmarks: ["late"] }));
    await fs.writeFile(path.join(workdir, "early.json"), JSON.stringify({ benchmarks: ["early"] }));
    const definition = yaml([
      "name: bench",
      "jobs:",
      "  late:",
      "    needs: early",
      "    steps:",
      "      - uses: benchmark",
      "        with: { group: perf, file: late.json }",
      "  early:",
      "    steps:",
      "      - uses: benchmark",
      "        with: { group: perf, file: early.json }",
    ]);

    const run = await execute(definition, new FakeRunner());

    expect(run.reports).toEqual({ perf: { benchmarks: ["late", "early"] } });
  });

  it("publishes null for a group that received no data", async () => {
    const sink = new MemoryReportSink();
    const run = await execute(yaml(benchmarkPipeline), new FakeRunner(), { reportSink: sink });

    expect(run.status).toBe("success");
    expect(run.reports).toEqual({ perf: null });
    expect(sink.published).toEqual([["perf", null]]);
    expect(events.find((e) => e.type === "report_published")).toMatchObject({ group: "perf", status: "empty" });
  });

  it("fails the run when a report cannot be published", async () => {
    const sink: ReportSink = {
      publish: async () => {
        throw new Error("sink offline");
      },
    };
    const run = await execute(yaml(benchmarkPipeline), new FakeRunner(), { reportSink: sink });
    expect(run.status).toBe("failed");
    expect(run.error).toBe('Report "perf" could not be published: sink offline');
  });

  // -------------------------------------------------------------------------
  // Cache
  // -------------------------------------------------------------------------

  it("saves a missed key once and restores it on the next run", async () => {
    await fs.writeFile(path.join(workdir, "lock.txt"), "pkg==1\n");
    const install = (request: CommandRequest): Partial<CommandResult> => {
      if (request.command === "install") {
        mkdirSync(path.join(workdir, ".deps"), { recursive: true });
        writeFileSync(path.join(workdir, ".deps", "pkg.txt"), "pkg-v1");
      }
      return {};
    };
    const definition = yaml([
      "name: cache",
      "jobs:",
      "  deps:",
      "    strategy:",
      "      matrix:",
      "        shard: [1, 2]",
      "    steps:",
      "      - uses: cache",
      "        id: deps-cache",
      "        with:",
      "          key: deps-${{ hashFiles('lock.txt') }}",
      "          path: .deps",
      "      - run: install",
      "        if: steps.deps-cache.outputs.cache-hit != 'true'",
    ]);
    const cache = new CacheResolver({ backend: new MemoryCacheBackend(), log: fakeLog() });

    const first = await execute(definition, new FakeRunner(install), { cache });
    expect(first.status).toBe("success");
    expect(events.filter((e) => e.type === "cache_miss")).toHaveLength(2);
    expect(events.filter((e) => e.type === "cache_saved")).toHaveLength(1);
    const key = first.instances[0].steps[0].outputs["cache-primary-key"];
    expect(key).toMatch(/^deps-[0-9a-f]{64}$/);
    expect(first.instances[1].steps[0].outputs["cache-primary-key"]).toBe(key);

    await fs.rm(path.join(workdir, ".deps"), { recursive: true });
    events = [];
    const runner = new FakeRunner(install);
    const second = await execute(definition, runner, { cache });

    expect(runner.requests).toEqual([]);
    expect(events.filter((e) => e.type === "cache_hit").map((e) => e.key)).toEqual([key, key]);
    expect(events.filter((e) => e.type === "cache_saved")).toHaveLength(0);
    expect(second.instances.map((i) => i.steps[0].outputs["cache-hit"])).toEqual(["true", "true"]);
    expect(await fs.readFile(path.join(workdir, ".deps", "pkg.txt"), "utf-8")).toBe("pkg-v1");
  });

  it("runs without a cache backend as a permanent miss", async () => {
    const runner = new FakeRunner();
    const run = await execute(
      yaml([
        "name: cache",
        "jobs:",
        "  deps:",
        "    steps:",
        "      - uses: cache",
        "        with: { key: k, path: .deps }",
        "      - run: install",
      ]),
      runner,
    );
    expect(run.status).toBe("success");
    expect(run.instances[0].steps[0].outputs["cache-hit"]).toBe("false");
    expect(runner.requests.map((r) => r.command)).toEqual(["install"]);
  });
});
