// ---------------------------------------------------------------------------
// Pipeline Definition Loader
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import type { StepActionRegistry } from "./executor/actions.js";
import type { PipelineDefinition } from "./types.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { createDefaultActionRegistry } from "./executor/actions.js";
import { normalizePipeline, validateDefinition, validatePipelineFile } from "./schema.js";

export type LoadPipelineOptions = {
  /** Registry `uses:` names are checked against. Defaults to the built-ins. */
  actions?: StepActionRegistry;
  /** Shown in error messages. */
  source?: string;
};

/**
 * Parse and validate a pipeline document. Every problem found is reported
 * together in one ConfigurationError.
 */
export function parsePipelineDefinition(text: string, opts: LoadPipelineOptions = {}): PipelineDefinition {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const where = opts.source ? ` in ${opts.source}` : "";
    throw new ConfigurationError(`YAML syntax error${where}: ${errorMessage(err)}`);
  }

  const definition = normalizePipeline(validatePipelineFile(raw));
  const issues = validateDefinition(definition, opts.actions ?? createDefaultActionRegistry());
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return definition;
}

export async function loadPipelineFile(filePath: string, opts: LoadPipelineOptions = {}): Promise<PipelineDefinition> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read pipeline file ${filePath}: ${errorMessage(err)}`);
  }
  return parsePipelineDefinition(text, { ...opts, source: opts.source ?? filePath });
}
