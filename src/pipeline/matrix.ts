// ---------------------------------------------------------------------------
// Matrix Expansion
// ---------------------------------------------------------------------------
// Cartesian product of the declared axes (first axis varies slowest), minus
// exclude rules, plus include rules:
//
//   - exclude: a rule matches when every key in it equals the combination's
//     value for that key (partial match).
//   - include: merged into each combination where none of its keys would
//     overwrite an original axis value; appended as a new combination when it
//     merges into none.
// ---------------------------------------------------------------------------

import type {
  JobDefinition,
  JobInstance,
  MatrixConfig,
  MatrixInstance,
  MatrixValue,
  MatrixValues,
} from "./types.js";
import { ConfigurationError } from "./errors.js";
import { renderTemplate } from "./expression/index.js";

function matchesRule(values: MatrixValues, rule: MatrixValues): boolean {
  return Object.entries(rule).every(([key, value]) => values[key] === value);
}

/**
 * Expand a matrix into concrete instances. An absent matrix yields one
 * instance with no values.
 */
export function expandMatrix(matrix?: MatrixConfig): MatrixInstance[] {
  if (!matrix) {
    return [{ index: 0, values: {} }];
  }

  const axisNames = Object.keys(matrix.axes);
  const errors: string[] = [];

  for (const axis of axisNames) {
    if (matrix.axes[axis].length === 0) {
      errors.push(`Matrix axis "${axis}" has no values`);
    }
  }
  (matrix.exclude ?? []).forEach((rule, idx) => {
    for (const key of Object.keys(rule)) {
      if (!axisNames.includes(key)) {
        errors.push(`Exclude rule #${idx + 1} references undeclared axis "${key}"`);
      }
    }
  });
  if (errors.length > 0) {
    throw new ConfigurationError(errors);
  }

  let combinations: MatrixValues[] = [];
  if (axisNames.length > 0) {
    const expand = (index: number, current: MatrixValues) => {
      if (index === axisNames.length) {
        combinations.push({ ...current });
        return;
      }
      const axis = axisNames[index];
      for (const value of matrix.axes[axis]) {
        expand(index + 1, { ...current, [axis]: value });
      }
    };
    expand(0, {});

    const excludes = matrix.exclude ?? [];
    combinations = combinations.filter((combo) => !excludes.some((rule) => matchesRule(combo, rule)));
    if (combinations.length === 0) {
      throw new ConfigurationError("Every matrix combination is excluded");
    }
  }

  const originals = combinations.map((combo) => ({ ...combo }));
  for (const include of matrix.include ?? []) {
    let merged = false;
    combinations.forEach((combo, idx) => {
      const original = originals[idx];
      const overwritesOriginal = Object.entries(include).some(
        ([key, value]) => key in original && original[key] !== value,
      );
      if (!overwritesOriginal) {
        combinations[idx] = { ...combo, ...include };
        merged = true;
      }
    });
    if (!merged) {
      combinations.push({ ...include });
      originals.push({ ...include });
    }
  }

  if (combinations.length === 0) {
    throw new ConfigurationError("Matrix produces no combinations");
  }

  return combinations.map((values, index) => ({ index, values }));
}

function formatValue(value: MatrixValue): string {
  return String(value);
}

/** `build` for an empty assignment, `build (py38, api)` otherwise. */
export function instanceLabel(jobId: string, values: MatrixValues): string {
  const parts = Object.values(values).map(formatValue);
  return parts.length === 0 ? jobId : `${jobId} (${parts.join(", ")})`;
}

/**
 * Expand a job into schedulable instances. The display name renders the
 * job's `name` template against `matrix` only; other namespaces are empty.
 */
export function expandJob(job: JobDefinition): JobInstance[] {
  return expandMatrix(job.strategy.matrix).map((matrix) => {
    const instanceId = instanceLabel(job.id, matrix.values);
    let displayName = instanceId;
    if (job.name) {
      displayName = renderTemplate(job.name, {
        lookup: (namespace) => (namespace === "matrix" ? { ...matrix.values } : null),
      });
    }
    return { jobId: job.id, instanceId, displayName, matrix };
  });
}
