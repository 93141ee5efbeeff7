// ---------------------------------------------------------------------------
// Pipeline Executor – Step Action Registry
// ---------------------------------------------------------------------------
// Registry of the actions a `uses:` step can name, with their declared
// inputs. The loader validates `uses` / `with` against it; the job runner
// dispatches through it.
// ---------------------------------------------------------------------------

import { existsSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { StepActionContext, StepActionDefinition } from "./types.js";
import { splitPathList } from "../cache/archive.js";

// ===========================================================================
// ACTION REGISTRY
// ===========================================================================

export class StepActionRegistry {
  private readonly defs = new Map<string, StepActionDefinition>();

  /** Add or overwrite an action definition. */
  register(def: StepActionDefinition): void {
    this.defs.set(def.name, def);
  }

  get(name: string): StepActionDefinition | undefined {
    return this.defs.get(name);
  }

  has(name: string): boolean {
    return this.defs.has(name);
  }

  list(): StepActionDefinition[] {
    return [...this.defs.values()];
  }

  /** Problems with a step's `with` block: missing required or unknown inputs. */
  validateInputs(name: string, inputs: Record<string, string>): string[] {
    const def = this.defs.get(name);
    if (!def) {
      return [`Unknown action "${name}"`];
    }
    const errors: string[] = [];
    const known = new Set(def.inputs.map((input) => input.key));
    for (const input of def.inputs) {
      if (input.required && !(inputs[input.key] ?? "").trim()) {
        errors.push(`Action "${name}" requires input "${input.key}"`);
      }
    }
    for (const key of Object.keys(inputs)) {
      if (!known.has(key)) {
        errors.push(`Action "${name}" has no input "${key}"`);
      }
    }
    return errors;
  }

  registerBuiltins(): void {
    for (const def of BUILTIN_ACTIONS) {
      this.register(def);
    }
  }
}

export function createDefaultActionRegistry(): StepActionRegistry {
  const registry = new StepActionRegistry();
  registry.registerBuiltins();
  return registry;
}

// ===========================================================================
// BUILT-IN ACTIONS
// ===========================================================================

// ---------------------------------------------------------------------------
// cache
// ---------------------------------------------------------------------------

async function runCacheAction(context: StepActionContext): Promise<Record<string, string>> {
  const { cache, step, scope, workdir, log } = context;
  const paths = splitPathList(context.inputs.path ?? "");

  if (!cache) {
    log.warn(`step "${step.name}": no cache backend configured; continuing without cache`);
    return { "cache-hit": "false", "cache-primary-key": context.inputs.key ?? "", "cache-matched-key": "" };
  }

  // Resolve from the raw templates so hashFiles is evaluated here, at the
  // step's position in the job.
  const restoreKeys = splitPathList(step.with["restore-keys"] ?? "");
  const lookup = await cache.resolve(step.with.key ?? "", paths, scope, restoreKeys);

  let restored = false;
  if (lookup.matchedKey) {
    restored = await cache.restore(lookup.matchedKey, paths, workdir);
  }
  const hit = lookup.hit && restored;

  context.emit({
    type: hit ? "cache_hit" : "cache_miss",
    jobId: context.instance.jobId,
    instanceId: context.instance.instanceId,
    step: step.name,
    key: lookup.key,
  });

  if (!hit) {
    context.registerPostJob({
      name: `Post ${step.name}`,
      run: async (succeeded) => {
        if (!succeeded) {
          log.info(`not saving cache "${lookup.key}": job did not succeed`);
          return;
        }
        if (await cache.save(lookup.key, paths, workdir)) {
          context.emit({
            type: "cache_saved",
            jobId: context.instance.jobId,
            instanceId: context.instance.instanceId,
            step: step.name,
            key: lookup.key,
          });
        }
      },
    });
  }

  return {
    "cache-hit": String(hit),
    "cache-primary-key": lookup.key,
    "cache-matched-key": restored ? (lookup.matchedKey ?? "") : "",
  };
}

// ---------------------------------------------------------------------------
// benchmark
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function runBenchmarkAction(context: StepActionContext): Promise<Record<string, string>> {
  const group = (context.inputs.group ?? "").trim();
  const file = path.resolve(context.workdir, context.inputs.file ?? "");
  context.aggregator?.declare(group);

  if (!existsSync(file)) {
    context.log.info(`benchmark file ${file} not found; "${group}" gets no data from this instance`);
    return { found: "false" };
  }

  const raw = await fs.readFile(file, "utf-8");
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Benchmark file ${file} is not valid JSON`, { cause: err });
  }
  if (!isPlainObject(payload)) {
    throw new Error(`Benchmark file ${file} must contain a JSON object`);
  }

  context.aggregator?.add({
    jobId: context.instance.jobId,
    instanceId: context.instance.instanceId,
    instanceIndex: context.instance.matrix.index,
    group,
    payload,
  });
  return { found: "true" };
}

export const BUILTIN_ACTIONS: readonly StepActionDefinition[] = [
  {
    name: "cache",
    description: "Restore a path set from the cache; save it after the job when the key missed.",
    inputs: [
      { key: "key", required: true, description: "Cache key template." },
      { key: "path", required: true, description: "Newline-separated paths." },
      { key: "restore-keys", description: "Newline-separated fallback key prefixes." },
    ],
    execute: runCacheAction,
  },
  {
    name: "benchmark",
    description: "Contribute a JSON benchmark document to an aggregated report group.",
    inputs: [
      { key: "group", required: true, description: "Report group name." },
      { key: "file", required: true, description: "Path to the JSON document." },
    ],
    execute: runBenchmarkAction,
  },
];
