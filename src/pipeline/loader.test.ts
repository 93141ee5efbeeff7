import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.js";
import { StepActionRegistry } from "./executor/actions.js";
import { loadPipelineFile, parsePipelineDefinition } from "./loader.js";

function yaml(lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

function issuesOf(text: string): string[] {
  try {
    parsePipelineDefinition(text);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

// ---------------------------------------------------------------------------
// Normalisation
// ---------------------------------------------------------------------------

describe("parsePipelineDefinition", () => {
  it("normalises a workflow file", () => {
    const definition = parsePipelineDefinition(
      yaml([
        "name: ci",
        "on: push",
        "env:",
        "  CI: true",
        "jobs:",
        "  build:",
        "    runs-on: ubuntu-latest",
        "    timeout-minutes: 1.5",
        "    steps:",
        "      - run: |",
        "          make",
        "          make check",
        "        shell: sh",
        "        working-directory: src",
        "      - uses: cache",
        "        id: deps",
        "        continue-on-error: true",
        "        timeout-minutes: 2",
        "        with:",
        "          key: deps-1",
        "          path: .deps",
        "  tests:",
        "    name: Test ${{ matrix.python }}",
        "    needs: build",
        "    strategy:",
        "      fail-fast: false",
        "      max-parallel: 2",
        "      matrix:",
        "        python: [py38, py311]",
        "        exclude:",
        "          - python: py38",
        "        include:",
        "          - python: py312",
        "    env:",
        "      SHARDS: 4",
        "    steps:",
        "      - name: pytest",
        "        if: ${{ matrix.python != 'py312' }}",
        "        run: pytest",
      ]),
    );

    expect(definition).toEqual({
      name: "ci",
      env: { CI: "true" },
      jobs: [
        {
          id: "build",
          name: undefined,
          needs: [],
          env: {},
          strategy: { matrix: undefined, failFast: true, maxParallel: undefined },
          timeoutSeconds: 90,
          steps: [
            {
              kind: "run",
              name: "Run make",
              run: "make\nmake check\n",
              shell: "sh",
              workingDirectory: "src",
              id: undefined,
              if: undefined,
              env: undefined,
              continueOnError: undefined,
              timeoutSeconds: undefined,
            },
            {
              kind: "action",
              name: "cache",
              uses: "cache",
              with: { key: "deps-1", path: ".deps" },
              id: "deps",
              if: undefined,
              env: undefined,
              continueOnError: true,
              timeoutSeconds: 120,
            },
          ],
        },
        {
          id: "tests",
          name: "Test ${{ matrix.python }}",
          needs: ["build"],
          env: { SHARDS: "4" },
          strategy: {
            matrix: {
              axes: { python: ["py38", "py311"] },
              exclude: [{ python: "py38" }],
              include: [{ python: "py312" }],
            },
            failFast: false,
            maxParallel: 2,
          },
          timeoutSeconds: undefined,
          steps: [
            {
              kind: "run",
              name: "pytest",
              run: "pytest",
              shell: undefined,
              workingDirectory: undefined,
              id: undefined,
              if: "${{ matrix.python != 'py312' }}",
              env: undefined,
              continueOnError: undefined,
              timeoutSeconds: undefined,
            },
          ],
        },
      ],
    });
  });

  it("keeps a boolean guard as its string form", () => {
    const definition = parsePipelineDefinition(
      yaml(["name: ci", "jobs:", "  a:", "    steps:", "      - run: echo hi", "        if: false"]),
    );
    expect(definition.jobs[0].steps[0].if).toBe("false");
  });

  // -------------------------------------------------------------------------
  // Errors
  // -------------------------------------------------------------------------

  it("reports YAML syntax errors with the source", () => {
    expect(() => parsePipelineDefinition("name: [unclosed\n", { source: "ci.yml" })).toThrow(
      /^YAML syntax error in ci\.yml: /,
    );
  });

  it("reports shape problems with their document path", () => {
    const issues = issuesOf(
      yaml(["jobs:", "  a:", "    steps:", "      - run: echo", "        shell: zsh", "        retries: 2"]),
    );
    expect(issues).toContainEqual(expect.stringMatching(/^\/name: /));
    expect(issues).toContainEqual(expect.stringMatching(/^\/jobs\/a\/steps\/0\/shell: /));
    expect(issues).toContainEqual(expect.stringMatching(/^\/jobs\/a\/steps\/0\/retries: /));
  });

  it("reports step structure problems together", () => {
    expect(
      issuesOf(
        yaml([
          "name: ci",
          "jobs:",
          "  a:",
          "    steps:",
          "      - run: echo",
          "        uses: cache",
          "      - name: empty",
          "      - run: echo",
          "        with: { x: 1 }",
          "      - uses: benchmark",
          "        shell: bash",
          "        with: { group: g, file: f.json }",
        ]),
      ),
    ).toEqual([
      'Job "a" step 1: a step takes either "run" or "uses", not both',
      'Job "a" step 2: a step needs either "run" or "uses"',
      'Job "a" step 3: "with" only applies to "uses" steps',
      'Job "a" step 4: "shell" and "working-directory" only apply to "run" steps',
    ]);
  });

  it("rejects job ids that cannot be referenced", () => {
    expect(issuesOf(yaml(["name: ci", "jobs:", "  1build:", "    steps:", "      - run: make"]))).toEqual([
      'Job id "1build" must start with a letter or "_" and contain only letters, digits, "-" and "_"',
    ]);
  });

  it("reports malformed templates wherever a run would render them", () => {
    expect(
      issuesOf(
        yaml([
          "name: ci",
          "env:",
          "  TARGET: ${{ vars.target",
          "jobs:",
          "  a:",
          "    name: Test ${{ matrix.v",
          "    strategy:",
          "      matrix:",
          "        v: [1]",
          "    env:",
          "      MODE: \"${{ matrix.v == }}\"",
          "    steps:",
          "      - run: echo ok",
          "      - run: echo ${{ matrix.v",
          "      - if: success(1)",
          "        run: echo guarded",
          "      - uses: cache",
          "        with: { key: \"deps-${{ hashFiles('a' }}\", path: p }",
        ]),
      ),
    ).toEqual([
      'Pipeline env "TARGET": Unterminated expression in "${{ vars.target"',
      'Job "a" name: Unterminated expression in "Test ${{ matrix.v"',
      expect.stringMatching(/^Job "a" env "MODE": .+ in "\$\{\{ matrix\.v == \}\}"$/),
      'Job "a" step 2: Unterminated expression in "echo ${{ matrix.v"',
      expect.stringMatching(/^Job "a" step 3: .+ in "success\(1\)"$/),
      expect.stringMatching(/^Job "a" step 4: .+ in "deps-\$\{\{ hashFiles\('a' \}\}"$/),
    ]);
  });

  it("rejects a pipeline without jobs", () => {
    expect(() => parsePipelineDefinition(yaml(["name: ci", "jobs: {}"]))).toThrow("Pipeline defines no jobs");
  });

  it("reports reference problems across jobs", () => {
    expect(
      issuesOf(
        yaml([
          "name: ci",
          "jobs:",
          "  a:",
          "    needs: [ghost]",
          "    steps:",
          "      - run: one",
          "        id: x",
          "      - run: two",
          "        id: x",
          "  b:",
          "    strategy:",
          "      matrix:",
          "        os: [linux]",
          "        exclude:",
          "          - os: linux",
          "    steps:",
          "      - uses: cache",
          "        with: { key: k, paths: p }",
        ]),
      ),
    ).toEqual([
      'Job "a" needs unknown job "ghost"',
      'Job "a": duplicate step id "x"',
      'Job "b" step "cache": Action "cache" requires input "path"',
      'Job "b" step "cache": Action "cache" has no input "paths"',
      'Job "b": Every matrix combination is excluded',
    ]);
  });

  it("reports dependency cycles", () => {
    expect(
      issuesOf(
        yaml([
          "name: ci",
          "jobs:",
          "  a:",
          "    needs: b",
          "    steps: [{ run: a }]",
          "  b:",
          "    needs: a",
          "    steps: [{ run: b }]",
        ]),
      ),
    ).toEqual(["Pipeline jobs contain a dependency cycle"]);
  });

  it("checks uses against the given registry", () => {
    const text = yaml(["name: ci", "jobs:", "  a:", "    steps:", "      - uses: cache", "        with: { key: k, path: p }"]);
    expect(() => parsePipelineDefinition(text, { actions: new StepActionRegistry() })).toThrow(
      'Job "a" step "cache": Unknown action "cache"',
    );
  });
});

// ---------------------------------------------------------------------------
// loadPipelineFile
// ---------------------------------------------------------------------------

describe("loadPipelineFile", () => {
  it("reads and parses a file", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gridrun-loader-"));
    try {
      const file = path.join(dir, "ci.yml");
      await fs.writeFile(file, yaml(["name: ci", "jobs:", "  a:", "    steps: [{ run: make }]"]));
      const definition = await loadPipelineFile(file);
      expect(definition.jobs.map((job) => job.id)).toEqual(["a"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("names the source in syntax errors", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gridrun-loader-"));
    try {
      const file = path.join(dir, "ci.yml");
      await fs.writeFile(file, "name: [oops\n");
      await expect(loadPipelineFile(file)).rejects.toThrow(`YAML syntax error in ${file}: `);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("reports a missing file as a configuration error", async () => {
    const file = path.join(os.tmpdir(), "gridrun-missing", "ci.yml");
    await expect(loadPipelineFile(file)).rejects.toThrow(`Cannot read pipeline file ${file}: `);
    await expect(loadPipelineFile(file)).rejects.toBeInstanceOf(ConfigurationError);
  });
});
