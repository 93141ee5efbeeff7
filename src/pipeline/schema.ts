// ---------------------------------------------------------------------------
// Pipeline Definition – File Schema & Validation
// ---------------------------------------------------------------------------
// Two passes:
//   1. Shape: the parsed YAML document is checked against a TypeBox schema
//      (kebab-case keys as written in workflow files).
//   2. References: needs, step ids, run/uses exclusivity, action inputs,
//      matrix rules, the job graph and the syntax of every template.
// Normalisation turns the file shape into the camelCase PipelineDefinition.
// ---------------------------------------------------------------------------

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { StepActionRegistry } from "./executor/actions.js";
import type {
  JobDefinition,
  MatrixConfig,
  MatrixValue,
  MatrixValues,
  PipelineDefinition,
  StepDefinition,
} from "./types.js";
import { PipelineEngine } from "./engine.js";
import { ConfigurationError, TemplateSyntaxError } from "./errors.js";
import { parseTemplate, usesStatusFunction } from "./expression/index.js";
import { expandMatrix } from "./matrix.js";

const MAX_REPORTED_ISSUES = 20;

export const IDENTIFIER_PATTERN = "^[A-Za-z_][A-Za-z0-9_-]*$";

// ===========================================================================
// FILE SCHEMA
// ===========================================================================

const ScalarSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean()]);

const StringMapSchema = Type.Record(Type.String(), ScalarSchema);

const StepSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    id: Type.Optional(Type.String({ pattern: IDENTIFIER_PATTERN })),
    if: Type.Optional(Type.Union([Type.String(), Type.Boolean()])),
    run: Type.Optional(Type.String()),
    shell: Type.Optional(Type.Union([Type.Literal("sh"), Type.Literal("bash")])),
    "working-directory": Type.Optional(Type.String()),
    uses: Type.Optional(Type.String()),
    with: Type.Optional(StringMapSchema),
    env: Type.Optional(StringMapSchema),
    "continue-on-error": Type.Optional(Type.Boolean()),
    "timeout-minutes": Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  },
  { additionalProperties: false },
);

/** Axis lists and include/exclude rule lists share one map in the file. */
const MatrixSchema = Type.Record(
  Type.String(),
  Type.Array(Type.Union([ScalarSchema, Type.Record(Type.String(), ScalarSchema)])),
);

const StrategySchema = Type.Object(
  {
    matrix: Type.Optional(MatrixSchema),
    "fail-fast": Type.Optional(Type.Boolean()),
    "max-parallel": Type.Optional(Type.Integer({ minimum: 1 })),
  },
  { additionalProperties: false },
);

const JobSchema = Type.Object(
  {
    name: Type.Optional(Type.String()),
    needs: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
    env: Type.Optional(StringMapSchema),
    strategy: Type.Optional(StrategySchema),
    "timeout-minutes": Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    /** Accepted for compatibility; runner provisioning is not handled here. */
    "runs-on": Type.Optional(Type.Unknown()),
    steps: Type.Array(StepSchema, { minItems: 1 }),
  },
  { additionalProperties: false },
);

export const PipelineFileSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    /** Trigger configuration; accepted and ignored. */
    on: Type.Optional(Type.Unknown()),
    env: Type.Optional(StringMapSchema),
    jobs: Type.Record(Type.String(), JobSchema),
  },
  { additionalProperties: false },
);

export type PipelineFile = Static<typeof PipelineFileSchema>;
type JobFile = Static<typeof JobSchema>;
type StepFile = Static<typeof StepSchema>;
type MatrixFile = Static<typeof MatrixSchema>;

// ===========================================================================
// SHAPE
// ===========================================================================

/** Check the raw document's shape. Throws ConfigurationError listing every problem. */
export function validatePipelineFile(raw: unknown): PipelineFile {
  if (Value.Check(PipelineFileSchema, raw)) {
    return raw;
  }
  const issues: string[] = [];
  for (const error of Value.Errors(PipelineFileSchema, raw)) {
    issues.push(`${error.path || "/"}: ${error.message}`);
    if (issues.length >= MAX_REPORTED_ISSUES) {
      break;
    }
  }
  throw new ConfigurationError(issues.length > 0 ? issues : ["Pipeline document is invalid"]);
}

// ===========================================================================
// NORMALISATION
// ===========================================================================

function toStringMap(map: Record<string, MatrixValue> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(map ?? {})) {
    out[key] = String(value);
  }
  return out;
}

function minutesToSeconds(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : Math.round(minutes * 60);
}

function isScalar(value: MatrixValue | MatrixValues): value is MatrixValue {
  return typeof value !== "object";
}

function normalizeMatrix(jobId: string, matrix: MatrixFile, issues: string[]): MatrixConfig {
  const config: MatrixConfig = { axes: {} };
  for (const [key, entries] of Object.entries(matrix)) {
    if (key === "include" || key === "exclude") {
      const rules: MatrixValues[] = [];
      for (const entry of entries) {
        if (isScalar(entry)) {
          issues.push(`Job "${jobId}": matrix ${key} entries must be mappings`);
        } else {
          rules.push({ ...entry });
        }
      }
      config[key] = rules;
      continue;
    }
    const values: MatrixValue[] = [];
    for (const entry of entries) {
      if (isScalar(entry)) {
        values.push(entry);
      } else {
        issues.push(`Job "${jobId}": matrix axis "${key}" values must be scalars`);
      }
    }
    config.axes[key] = values;
  }
  return config;
}

function normalizeStep(jobId: string, step: StepFile, index: number, issues: string[]): StepDefinition | null {
  const where = `Job "${jobId}" step ${index + 1}`;
  const base = {
    id: step.id,
    if: step.if === undefined ? undefined : String(step.if),
    env: step.env ? toStringMap(step.env) : undefined,
    continueOnError: step["continue-on-error"],
    timeoutSeconds: minutesToSeconds(step["timeout-minutes"]),
  };

  if (step.run !== undefined && step.uses !== undefined) {
    issues.push(`${where}: a step takes either "run" or "uses", not both`);
    return null;
  }
  if (step.run !== undefined) {
    if (step.with !== undefined) {
      issues.push(`${where}: "with" only applies to "uses" steps`);
    }
    const firstLine = step.run.trim().split("\n")[0] ?? "";
    return {
      ...base,
      kind: "run",
      name: step.name ?? `Run ${firstLine}`,
      run: step.run,
      shell: step.shell,
      workingDirectory: step["working-directory"],
    };
  }
  if (step.uses !== undefined) {
    if (step.shell !== undefined || step["working-directory"] !== undefined) {
      issues.push(`${where}: "shell" and "working-directory" only apply to "run" steps`);
    }
    return {
      ...base,
      kind: "action",
      name: step.name ?? step.uses,
      uses: step.uses,
      with: toStringMap(step.with),
    };
  }
  issues.push(`${where}: a step needs either "run" or "uses"`);
  return null;
}

function normalizeJob(id: string, job: JobFile, issues: string[]): JobDefinition {
  const steps: StepDefinition[] = [];
  job.steps.forEach((step, index) => {
    const normalized = normalizeStep(id, step, index, issues);
    if (normalized) {
      steps.push(normalized);
    }
  });

  const needs = job.needs === undefined ? [] : typeof job.needs === "string" ? [job.needs] : job.needs;
  const strategy = job.strategy;
  return {
    id,
    name: job.name,
    needs: [...needs],
    env: toStringMap(job.env),
    strategy: {
      matrix: strategy?.matrix ? normalizeMatrix(id, strategy.matrix, issues) : undefined,
      failFast: strategy?.["fail-fast"] ?? true,
      maxParallel: strategy?.["max-parallel"],
    },
    timeoutSeconds: minutesToSeconds(job["timeout-minutes"]),
    steps,
  };
}

/** Convert a shape-checked file into a definition. Throws on structural problems. */
export function normalizePipeline(file: PipelineFile): PipelineDefinition {
  const issues: string[] = [];
  const jobs: JobDefinition[] = [];
  for (const [id, job] of Object.entries(file.jobs)) {
    if (!new RegExp(IDENTIFIER_PATTERN).test(id)) {
      issues.push(`Job id "${id}" must start with a letter or "_" and contain only letters, digits, "-" and "_"`);
    }
    jobs.push(normalizeJob(id, job, issues));
  }
  if (jobs.length === 0) {
    issues.push("Pipeline defines no jobs");
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return { name: file.name, env: toStringMap(file.env), jobs };
}

// ===========================================================================
// REFERENCES
// ===========================================================================

/**
 * Cross-reference checks on a normalised definition. Returns every problem
 * found; an empty list means the pipeline can run.
 */
export function validateDefinition(definition: PipelineDefinition, actions: StepActionRegistry): string[] {
  const issues: string[] = [
    ...PipelineEngine.validate(definition.jobs).errors,
    ...templateIssues(definition.env, definition.jobs),
  ];

  for (const job of definition.jobs) {
    const stepIds = new Set<string>();
    for (const step of job.steps) {
      if (step.id !== undefined) {
        if (stepIds.has(step.id)) {
          issues.push(`Job "${job.id}": duplicate step id "${step.id}"`);
        }
        stepIds.add(step.id);
      }
      if (step.kind === "action") {
        for (const problem of actions.validateInputs(step.uses, step.with)) {
          issues.push(`Job "${job.id}" step "${step.name}": ${problem}`);
        }
      }
    }

    try {
      expandMatrix(job.strategy.matrix);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) {
        throw err;
      }
      issues.push(...err.issues.map((issue) => `Job "${job.id}": ${issue}`));
    }
  }

  return issues;
}

// ===========================================================================
// TEMPLATES
// ===========================================================================

/** The syntax error in a template, or null when it parses. */
function templateError(template: string | undefined): string | null {
  if (template === undefined) {
    return null;
  }
  try {
    parseTemplate(template);
    return null;
  } catch (err) {
    if (!(err instanceof TemplateSyntaxError)) {
      throw err;
    }
    return err.message;
  }
}

function guardError(guard: string | undefined): string | null {
  try {
    usesStatusFunction(guard);
    return null;
  } catch (err) {
    if (!(err instanceof TemplateSyntaxError)) {
      throw err;
    }
    return err.message;
  }
}

function stepTemplates(step: StepDefinition): Array<string | undefined> {
  const own = step.kind === "run" ? [step.run, step.workingDirectory] : Object.values(step.with);
  return [...own, ...Object.values(step.env ?? {}), step.name];
}

/**
 * Syntax-check every template a run would render: pipeline and job env, job
 * names, and each step's guard, command, inputs, env and name. A step reports
 * only its first problem.
 */
export function templateIssues(env: Record<string, string>, jobs: JobDefinition[]): string[] {
  const issues: string[] = [];
  const check = (where: string, template: string | undefined) => {
    const error = templateError(template);
    if (error !== null) {
      issues.push(`${where}: ${error}`);
    }
  };

  for (const [key, value] of Object.entries(env)) {
    check(`Pipeline env "${key}"`, value);
  }
  for (const job of jobs) {
    check(`Job "${job.id}" name`, job.name);
    for (const [key, value] of Object.entries(job.env)) {
      check(`Job "${job.id}" env "${key}"`, value);
    }
    job.steps.forEach((step, index) => {
      const error = guardError(step.if) ?? stepTemplates(step).map(templateError).find((e) => e !== null);
      if (error) {
        issues.push(`Job "${job.id}" step ${index + 1}: ${error}`);
      }
    });
  }
  return issues;
}
