// ---------------------------------------------------------------------------
// Pipeline Executor – Job Instance Runner
// ---------------------------------------------------------------------------
// Runs one job instance's steps strictly in order:
//
//   1. After a failure, a step runs only if its guard calls a status
//      function (success(), failure(), always(), cancelled()).
//   2. Guard false → skipped.
//   3. Env is rendered global → job → step.
//   4. `run` steps go to the CommandRunner, `uses` steps to the action
//      registry. Each step gets its own temp dir for the output side channel.
//   5. The finished step is appended to the context so later steps see it.
//
// A TemplateSyntaxError fails the instance outright; every remaining step is
// skipped, status-function guards included. Post-job hooks (cache save) run
// last, told whether the instance succeeded.
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ChildLogger } from "../../logging.js";
import type {
  ActionStep,
  InstanceResult,
  JobDefinition,
  JobInstance,
  RunStep,
  StepDefinition,
  StepResult,
} from "../types.js";
import type { InstanceEventCallback, JobDeps, PostJobHook } from "./types.js";
import { getChildLogger } from "../../logging.js";
import { ExecutionContext } from "../context.js";
import { CommandFailure, TemplateSyntaxError, TimeoutError, errorMessage } from "../errors.js";
import {
  evaluateGuard,
  renderRecord,
  renderTemplate,
  usesStatusFunction,
} from "../expression/index.js";
import { hashFiles } from "../hash-files.js";
import { maskSecrets } from "./shell.js";

const DEFAULT_SHELL = "bash";

type StepRun = {
  outputs: Record<string, string>;
  exitCode?: number;
  log?: string;
};

/** Carries whatever a failed step produced alongside the underlying error. */
class StepError extends Error {
  constructor(
    readonly original: unknown,
    readonly partial: Partial<StepRun> = {},
  ) {
    super(errorMessage(original));
    this.name = "StepError";
  }
}

/**
 * Render a step's display name against the instance, secrets masked.
 * Names that cannot be rendered yet stay literal.
 */
function resolveStepName(step: StepDefinition, context: ExecutionContext, log: ChildLogger): StepDefinition {
  try {
    const name = renderTemplate(step.name, context.scope());
    return { ...step, name: maskSecrets(name, Object.values(context.getSecrets())) };
  } catch (err) {
    log.debug(`step name "${step.name}" kept literal: ${errorMessage(err)}`);
    return step;
  }
}

function skippedStep(step: StepDefinition, reason: string): StepResult {
  return {
    name: step.name,
    id: step.id,
    outcome: "skipped",
    conclusion: "skipped",
    outputs: {},
    reason,
  };
}

// ---------------------------------------------------------------------------
// runJobInstance
// ---------------------------------------------------------------------------

export async function runJobInstance(
  instance: JobInstance,
  job: JobDefinition,
  deps: JobDeps,
): Promise<InstanceResult> {
  const log = deps.log ?? getChildLogger({ module: "job" });
  const emit: InstanceEventCallback = deps.onEvent ?? (() => {});
  const base = { jobId: job.id, instanceId: instance.instanceId };
  const startedAtMs = Date.now();
  const steps: StepResult[] = [];

  emit({ type: "instance_started", ...base });

  const finish = (status: InstanceResult["status"], error?: string): InstanceResult => {
    const result: InstanceResult = {
      ...base,
      displayName: instance.displayName,
      matrix: { ...instance.matrix.values },
      status,
      steps,
      startedAtMs,
      completedAtMs: Date.now(),
      error,
    };
    emit({
      type: "instance_completed",
      ...base,
      status,
      error,
      durationMs: Date.now() - startedAtMs,
    });
    return result;
  };

  let context: ExecutionContext;
  try {
    context = new ExecutionContext({
      pipelineEnv: deps.pipelineEnv,
      jobEnv: job.env,
      matrix: instance.matrix.values,
      secrets: deps.secrets,
      vars: deps.vars,
      job: { id: job.id, instanceId: instance.instanceId, name: instance.displayName },
      stepIds: job.steps.flatMap((step) => (step.id ? [step.id] : [])),
      hashFiles: (patterns) => hashFiles(deps.workdir, patterns),
    });
  } catch (err) {
    const message = `Job env could not be rendered: ${errorMessage(err)}`;
    log.error(`${instance.instanceId}: ${message}`);
    for (const step of job.steps) {
      steps.push(skippedStep(step, "instance-aborted"));
    }
    return finish("failed", message);
  }

  const postJobHooks: PostJobHook[] = [];
  let abortedBy: string | undefined;
  let firstError: string | undefined;

  for (const definition of job.steps) {
    const step = resolveStepName(definition, context, log);
    let result: StepResult;
    if (abortedBy !== undefined) {
      result = skippedStep(step, "instance-aborted");
    } else {
      try {
        result = await runStep(step, job, instance, context, deps, postJobHooks, emit, log);
      } catch (err) {
        if (!(err instanceof TemplateSyntaxError)) {
          throw err;
        }
        abortedBy = err.message;
        result = {
          name: step.name,
          id: step.id,
          outcome: "failed",
          conclusion: "failed",
          outputs: {},
          errorKind: err.name,
          error: err.message,
        };
        emit({ type: "step_failed", ...base, step: step.name, error: err.message });
      }
    }

    if (result.conclusion === "failed") {
      context.markFailed();
      firstError ??= result.error ?? `Step "${step.name}" failed`;
    }
    if (result.outcome === "skipped") {
      emit({ type: "step_skipped", ...base, step: step.name, reason: result.reason });
    }
    context.appendStep(result);
    steps.push(result);
  }

  const succeeded = context.getJobStatus() === "success";

  // Post steps run in reverse registration order.
  for (const hook of [...postJobHooks].reverse()) {
    try {
      await hook.run(succeeded);
    } catch (err) {
      log.warn(`${instance.instanceId}: post-job "${hook.name}" failed: ${errorMessage(err)}`);
    }
  }

  return finish(succeeded ? "succeeded" : "failed", firstError);
}

// ---------------------------------------------------------------------------
// runStep
// ---------------------------------------------------------------------------

async function runStep(
  step: StepDefinition,
  job: JobDefinition,
  instance: JobInstance,
  context: ExecutionContext,
  deps: JobDeps,
  postJobHooks: PostJobHook[],
  emit: InstanceEventCallback,
  log: ChildLogger,
): Promise<StepResult> {
  const base = { jobId: job.id, instanceId: instance.instanceId, step: step.name };

  if (context.getJobStatus() === "failure" && !usesStatusFunction(step.if)) {
    return skippedStep(step, "previous-step-failed");
  }

  let guard: boolean;
  try {
    guard = evaluateGuard(step.if, context.scope());
  } catch (err) {
    if (err instanceof TemplateSyntaxError) {
      throw err;
    }
    return failedStep(step, new StepError(err), emit, base);
  }
  if (!guard) {
    return skippedStep(step, "condition-false");
  }

  const startedAtMs = Date.now();
  emit({ type: "step_started", ...base });

  try {
    const stepEnv = renderRecord(step.env, context.scope());
    const run =
      step.kind === "run"
        ? await runCommandStep(step, job, instance, context, stepEnv, deps)
        : await runActionStep(step, instance, context, stepEnv, deps, postJobHooks, emit, log);

    const completedAtMs = Date.now();
    emit({
      type: "step_completed",
      ...base,
      status: "succeeded",
      durationMs: completedAtMs - startedAtMs,
    });
    return {
      name: step.name,
      id: step.id,
      outcome: "succeeded",
      conclusion: "succeeded",
      outputs: run.outputs,
      startedAtMs,
      completedAtMs,
      exitCode: run.exitCode,
      log: run.log,
    };
  } catch (err) {
    if (err instanceof TemplateSyntaxError) {
      throw err;
    }
    const stepError = err instanceof StepError ? err : new StepError(err);
    return { ...failedStep(step, stepError, emit, base), startedAtMs };
  }
}

function failedStep(
  step: StepDefinition,
  err: StepError,
  emit: InstanceEventCallback,
  base: { jobId: string; instanceId: string; step: string },
): StepResult {
  const cause = err.original;
  const continued = step.continueOnError === true;
  emit({
    type: continued ? "step_completed" : "step_failed",
    ...base,
    status: continued ? "succeeded" : "failed",
    error: err.message,
  });
  return {
    name: step.name,
    id: step.id,
    outcome: "failed",
    conclusion: continued ? "succeeded" : "failed",
    outputs: err.partial.outputs ?? {},
    completedAtMs: Date.now(),
    exitCode: err.partial.exitCode ?? (cause instanceof CommandFailure ? cause.exitCode : undefined),
    errorKind: cause instanceof Error ? cause.name : undefined,
    error: err.message,
    log: err.partial.log,
  };
}

// ---------------------------------------------------------------------------
// run: steps
// ---------------------------------------------------------------------------

function resolveTimeoutMs(step: StepDefinition, job: JobDefinition, deps: JobDeps): number | undefined {
  const seconds = step.timeoutSeconds ?? job.timeoutSeconds ?? deps.defaultTimeoutSeconds;
  return seconds !== undefined && seconds > 0 ? seconds * 1000 : undefined;
}

async function runCommandStep(
  step: RunStep,
  job: JobDefinition,
  instance: JobInstance,
  context: ExecutionContext,
  stepEnv: Record<string, string>,
  deps: JobDeps,
): Promise<StepRun> {
  const scope = context.scope(stepEnv);
  const command = renderTemplate(step.run, scope);
  const cwd = step.workingDirectory
    ? path.resolve(deps.workdir, renderTemplate(step.workingDirectory, scope))
    : deps.workdir;
  const timeoutMs = resolveTimeoutMs(step, job, deps);

  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "gridrun-step-"));
  try {
    const result = await deps.runner.run({
      command,
      env: {
        ...context.getEnv(),
        ...stepEnv,
        GRIDRUN: "true",
        GRIDRUN_JOB: job.id,
        GRIDRUN_INSTANCE: instance.instanceId,
        GRIDRUN_WORKSPACE: deps.workdir,
      },
      cwd,
      shell: step.shell ?? DEFAULT_SHELL,
      timeoutMs,
      outputFile: path.join(tmpDir, "output"),
      secrets: Object.values(deps.secrets ?? {}),
    });

    if (result.timedOut && timeoutMs !== undefined) {
      throw new StepError(new TimeoutError(timeoutMs, result.exitCode), {
        outputs: result.outputs,
        exitCode: result.exitCode,
        log: result.output,
      });
    }
    if (result.exitCode !== 0) {
      throw new StepError(new CommandFailure(result.exitCode), {
        outputs: result.outputs,
        exitCode: result.exitCode,
        log: result.output,
      });
    }
    return { outputs: result.outputs, exitCode: result.exitCode, log: result.output };
  } finally {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
}

// ---------------------------------------------------------------------------
// uses: steps
// ---------------------------------------------------------------------------

async function runActionStep(
  step: ActionStep,
  instance: JobInstance,
  context: ExecutionContext,
  stepEnv: Record<string, string>,
  deps: JobDeps,
  postJobHooks: PostJobHook[],
  emit: InstanceEventCallback,
  log: ChildLogger,
): Promise<StepRun> {
  const action = deps.actions.get(step.uses);
  if (!action) {
    throw new Error(`Unknown action "${step.uses}"`);
  }
  const scope = context.scope(stepEnv);
  const outputs = await action.execute({
    step,
    inputs: renderRecord(step.with, scope),
    scope,
    instance,
    workdir: deps.workdir,
    cache: deps.cache,
    aggregator: deps.aggregator,
    registerPostJob: (hook) => postJobHooks.push(hook),
    emit,
    log,
  });
  return { outputs };
}
