// ---------------------------------------------------------------------------
// CLI Program – gridrun run | validate | matrix | history
// ---------------------------------------------------------------------------
// Exit codes: 0 success, 1 pipeline failure, 2 configuration or usage error.
// ---------------------------------------------------------------------------

import * as path from "node:path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { RuntimeEnv } from "../runtime.js";
import type { PipelineRun, RunEvent } from "../pipeline/types.js";
import type { CliDeps } from "./deps.js";
import { loadConfig } from "../config/config.js";
import { getChildLogger, isLogLevel, setLogLevel, type LogLevel } from "../logging.js";
import { CacheResolver } from "../pipeline/cache/resolver.js";
import { ConfigurationError, errorMessage } from "../pipeline/errors.js";
import { executePipeline } from "../pipeline/executor/run.js";
import { loadPipelineFile } from "../pipeline/loader.js";
import { expandJob } from "../pipeline/matrix.js";
import { appendPipelineRun, loadPipelineRuns } from "../pipeline/run-log.js";
import { defaultRuntime } from "../runtime.js";
import { createDefaultDeps } from "./deps.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const VERSION = "0.1.0";

export type CliParams = {
  deps?: CliDeps;
  runtime?: RuntimeEnv;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

type RunCommandOptions = {
  workdir?: string;
  job: string[];
  maxParallel?: number;
  cacheDir?: string;
  reportDir?: string;
  runLogDir?: string;
  secret: string[];
  secretEnv: string[];
  var: string[];
  logLevel?: LogLevel;
  config?: string;
};

type HistoryCommandOptions = {
  limit: number;
  runLogDir?: string;
  json?: boolean;
  config?: string;
};

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError("must be one of silent, debug, info, warn, error");
  }
  return level;
}

/** `NAME=value` pairs → record. The value may itself contain `=`. */
export function parseAssignments(pairs: string[], flag: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigurationError(`${flag} expects NAME=VALUE, got "${pair}"`);
    }
    out[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

const STATUS_MARK: Record<string, string> = {
  succeeded: "✓",
  failed: "✗",
  skipped: "-",
};

export function formatRunSummary(run: PipelineRun): string[] {
  const lines = run.instances.map((instance) => {
    const mark = STATUS_MARK[instance.status] ?? "?";
    const detail = instance.error ?? instance.reason;
    return `${mark} ${instance.displayName} ${instance.status}${detail ? ` (${detail})` : ""}`;
  });
  for (const [group, document] of Object.entries(run.reports)) {
    lines.push(`report ${group}: ${document === null ? "no data" : "published"}`);
  }
  lines.push(`${run.pipeline}: ${run.status} (run ${run.id})`);
  return lines;
}

function describeEvent(event: RunEvent): string | null {
  switch (event.type) {
    case "instance_started":
      return `▶ ${event.instanceId}`;
    case "step_failed":
      return `  ✗ ${event.instanceId} / ${event.step}: ${event.error ?? "failed"}`;
    case "cache_hit":
    case "cache_miss":
    case "cache_saved":
      return `  ${event.type.replace("_", " ")} ${event.key ?? ""}`;
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function buildProgram(params: CliParams, setExitCode: (code: number) => void): Command {
  const deps = params.deps ?? createDefaultDeps();
  const runtime = params.runtime ?? defaultRuntime;
  const env = params.env ?? process.env;
  const cwd = params.cwd ?? process.cwd();
  const log = getChildLogger({ module: "cli" });

  /** Map thrown errors onto exit codes; configuration problems are usage errors. */
  const guarded =
    <A extends unknown[]>(fn: (...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      try {
        setExitCode(await fn(...args));
      } catch (err) {
        if (err instanceof ConfigurationError) {
          runtime.error(err.message);
          setExitCode(EXIT_USAGE);
          return;
        }
        runtime.error(`error: ${errorMessage(err)}`);
        log.debug(err);
        setExitCode(EXIT_FAILURE);
      }
    };

  const program = new Command();
  program
    .name("gridrun")
    .description("Run matrix CI pipelines locally")
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.log(text.trimEnd()),
      writeErr: (text) => runtime.error(text.trimEnd()),
    });

  // -------------------------------------------------------------------------
  // run
  // -------------------------------------------------------------------------

  program
    .command("run")
    .description("Execute a pipeline definition")
    .argument("<file>", "pipeline YAML file")
    .option("--workdir <dir>", "workspace directory (default: current directory)")
    .option("--job <id>", "run only this job and the jobs it needs (repeatable)", collect, [])
    .option("--max-parallel <n>", "global cap on concurrent job instances", parsePositiveInt)
    .option("--cache-dir <dir>", "cache store directory")
    .option("--report-dir <dir>", "write merged benchmark reports here")
    .option("--run-log-dir <dir>", "run history directory")
    .option("--secret <NAME=VALUE>", "secret value (repeatable)", collect, [])
    .option("--secret-env <NAME>", "read a secret from the environment (repeatable)", collect, [])
    .option("--var <key=value>", "trigger variable, visible as vars.<key> (repeatable)", collect, [])
    .option("--log-level <level>", "silent | debug | info | warn | error", parseLogLevel)
    .option("--config <file>", "config file (default: ./gridrun.config.json)")
    .action(
      guarded(async (file: string, opts: RunCommandOptions) => {
        const config = loadConfig({
          cwd,
          env,
          configPath: opts.config,
          overrides: {
            logLevel: opts.logLevel,
            maxParallel: opts.maxParallel,
            cacheDir: opts.cacheDir,
            reportDir: opts.reportDir,
            runLogDir: opts.runLogDir,
          },
        });
        setLogLevel(config.logLevel);

        const secrets = parseAssignments(opts.secret, "--secret");
        for (const name of opts.secretEnv) {
          const value = env[name];
          if (value === undefined) {
            throw new ConfigurationError(`--secret-env ${name}: variable is not set`);
          }
          secrets[name] = value;
        }
        const vars = parseAssignments(opts.var, "--var");

        const definition = await loadPipelineFile(path.resolve(cwd, file));
        const run = await executePipeline(
          definition,
          {
            workdir: path.resolve(cwd, opts.workdir ?? "."),
            runner: deps.createCommandRunner(),
            cache: new CacheResolver({ backend: deps.createCacheBackend(config.cacheDir) }),
            reportSink: deps.createReportSink(config.reportDir),
            secrets,
            vars,
            maxParallel: config.maxParallel,
            defaultTimeoutSeconds: config.defaultTimeoutSeconds,
            jobs: opts.job,
          },
          (event) => {
            const line = describeEvent(event);
            if (line) {
              runtime.log(line);
            }
          },
        );

        try {
          const filePath = await appendPipelineRun(config.runLogDir, run);
          log.debug(`run recorded at ${filePath}`);
        } catch (err) {
          log.warn(`could not record run history: ${errorMessage(err)}`);
        }

        for (const line of formatRunSummary(run)) {
          runtime.log(line);
        }
        return run.status === "success" ? EXIT_SUCCESS : EXIT_FAILURE;
      }),
    );

  // -------------------------------------------------------------------------
  // validate
  // -------------------------------------------------------------------------

  program
    .command("validate")
    .description("Check a pipeline definition without running it")
    .argument("<file>", "pipeline YAML file")
    .action(
      guarded(async (file: string) => {
        const definition = await loadPipelineFile(path.resolve(cwd, file));
        const instances = definition.jobs.reduce((sum, job) => sum + expandJob(job).length, 0);
        runtime.log(
          `${definition.name}: valid (${definition.jobs.length} job(s), ${instances} instance(s))`,
        );
        return EXIT_SUCCESS;
      }),
    );

  // -------------------------------------------------------------------------
  // matrix
  // -------------------------------------------------------------------------

  program
    .command("matrix")
    .description("List the job instances a pipeline expands to")
    .argument("<file>", "pipeline YAML file")
    .argument("[job]", "only this job")
    .action(
      guarded(async (file: string, jobId: string | undefined) => {
        const definition = await loadPipelineFile(path.resolve(cwd, file));
        const jobs = jobId ? definition.jobs.filter((job) => job.id === jobId) : definition.jobs;
        if (jobs.length === 0) {
          throw new ConfigurationError(`Unknown job "${jobId ?? ""}"`);
        }
        for (const job of jobs) {
          for (const instance of expandJob(job)) {
            runtime.log(`${instance.instanceId}\t${JSON.stringify(instance.matrix.values)}`);
          }
        }
        return EXIT_SUCCESS;
      }),
    );

  // -------------------------------------------------------------------------
  // history
  // -------------------------------------------------------------------------

  program
    .command("history")
    .description("Show recorded runs of a pipeline, newest first")
    .argument("<pipeline>", "pipeline name")
    .option("--limit <n>", "number of runs to show", parsePositiveInt, 10)
    .option("--run-log-dir <dir>", "run history directory")
    .option("--json", "print the run records as JSON")
    .option("--config <file>", "config file (default: ./gridrun.config.json)")
    .action(
      guarded(async (pipeline: string, opts: HistoryCommandOptions) => {
        const config = loadConfig({
          cwd,
          env,
          configPath: opts.config,
          overrides: { runLogDir: opts.runLogDir },
        });
        const runs = await loadPipelineRuns(config.runLogDir, pipeline, opts.limit);
        if (opts.json) {
          runtime.log(JSON.stringify(runs, null, 2));
          return EXIT_SUCCESS;
        }
        if (runs.length === 0) {
          runtime.log(`no runs recorded for "${pipeline}"`);
          return EXIT_SUCCESS;
        }
        for (const run of runs) {
          const failed = run.instances.filter((instance) => instance.status === "failed").length;
          runtime.log(
            `${run.id}\t${run.status}\t${new Date(run.startedAtMs).toISOString()}\t` +
              `${run.instances.length} instance(s), ${failed} failed`,
          );
        }
        return EXIT_SUCCESS;
      }),
    );

  return program;
}

/** Parse `argv` (without node and script path) and run the command. Resolves with the exit code. */
export async function runCli(argv: string[], params: CliParams = {}): Promise<number> {
  let exitCode = EXIT_SUCCESS;
  const program = buildProgram(params, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE;
    }
    throw err;
  }
  return exitCode;
}
