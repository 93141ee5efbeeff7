// ---------------------------------------------------------------------------
// Pipeline Run Log – Persistence for pipeline execution history
// ---------------------------------------------------------------------------
// Each run is stored as an individual JSON file under:
//   {runLogDir}/{pipeline}/{runId}.json
//
// Pipeline names are free text, so the directory is a slug of the name.
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { PipelineRun } from "./types.js";
import { PIPELINE_RUN_STATUSES } from "./types.js";

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

/** `Core Repo Tests` → `core-repo-tests`. */
export function pipelineDirName(pipeline: string): string {
  const slug = pipeline
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^[-.]+|-+$/g, "");
  return slug || "pipeline";
}

function runsDir(runLogDir: string, pipeline: string): string {
  return path.join(runLogDir, pipelineDirName(pipeline));
}

function runFilePath(runLogDir: string, run: PipelineRun): string {
  return path.join(runsDir(runLogDir, run.pipeline), `${run.id}.json`);
}

function isPipelineRun(value: unknown): value is PipelineRun {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === "string" &&
    typeof record.pipeline === "string" &&
    typeof record.startedAtMs === "number" &&
    Array.isArray(record.instances) &&
    PIPELINE_RUN_STATUSES.some((status) => status === record.status)
  );
}

// ---------------------------------------------------------------------------
// appendPipelineRun
// ---------------------------------------------------------------------------

let writeSeq = 0;

/**
 * Persist a pipeline run to disk. Creates the runs directory if missing.
 * Uses atomic write (tmp + rename) for crash safety.
 */
export async function appendPipelineRun(runLogDir: string, run: PipelineRun): Promise<string> {
  const dir = runsDir(runLogDir, run.pipeline);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filePath = runFilePath(runLogDir, run);
  const tmp = filePath + ".tmp." + process.pid + "." + writeSeq++;
  const content = JSON.stringify(run, null, 2);

  await fs.writeFile(tmp, content, "utf-8");
  await fs.rename(tmp, filePath);
  return filePath;
}

// ---------------------------------------------------------------------------
// loadPipelineRuns
// ---------------------------------------------------------------------------

/**
 * Load all runs for a given pipeline, sorted newest-first by `startedAtMs`.
 * Returns an empty array when the pipeline has no runs or the directory is
 * missing.
 */
export async function loadPipelineRuns(
  runLogDir: string,
  pipeline: string,
  limit?: number,
): Promise<PipelineRun[]> {
  const dir = runsDir(runLogDir, pipeline);

  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    // No runs yet.
    return [];
  }

  const runs: PipelineRun[] = [];
  for (const file of entries.filter((f) => f.endsWith(".json"))) {
    try {
      const parsed: unknown = JSON.parse(await fs.readFile(path.join(dir, file), "utf-8"));
      // Names that slug alike share a directory.
      if (isPipelineRun(parsed) && parsed.pipeline === pipeline) {
        runs.push(parsed);
      }
    } catch {
      // Skip malformed files.
    }
  }

  runs.sort((a, b) => b.startedAtMs - a.startedAtMs);

  if (limit !== undefined && limit > 0) {
    return runs.slice(0, limit);
  }
  return runs;
}

// ---------------------------------------------------------------------------
// loadPipelineRun (single)
// ---------------------------------------------------------------------------

/**
 * Load a single run by ID. Returns `null` when not found.
 */
export async function loadPipelineRun(
  runLogDir: string,
  pipeline: string,
  runId: string,
): Promise<PipelineRun | null> {
  const filePath = path.join(runsDir(runLogDir, pipeline), `${runId}.json`);
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
    return isPipelineRun(parsed) && parsed.pipeline === pipeline ? parsed : null;
  } catch {
    return null;
  }
}
