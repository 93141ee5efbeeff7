// ---------------------------------------------------------------------------
// CLI Dependencies – collaborators the commands build on
// ---------------------------------------------------------------------------

import type { CacheBackend } from "../pipeline/cache/backend.js";
import type { CommandRunner } from "../pipeline/executor/types.js";
import type { ReportSink } from "../pipeline/report.js";
import { FileCacheBackend } from "../pipeline/cache/backend.js";
import { ShellCommandRunner } from "../pipeline/executor/shell.js";
import { FileReportSink, LogReportSink } from "../pipeline/report.js";

export type CliDeps = {
  createCommandRunner: () => CommandRunner;
  createCacheBackend: (cacheDir: string) => CacheBackend;
  /** `reportDir` undefined means reports go to the log. */
  createReportSink: (reportDir?: string) => ReportSink;
};

export function createDefaultDeps(): CliDeps {
  return {
    createCommandRunner: () => new ShellCommandRunner(),
    createCacheBackend: (cacheDir) => new FileCacheBackend(cacheDir),
    createReportSink: (reportDir) => (reportDir ? new FileReportSink(reportDir) : new LogReportSink()),
  };
}
