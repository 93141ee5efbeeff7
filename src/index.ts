// ---------------------------------------------------------------------------
// gridrun – public API
// ---------------------------------------------------------------------------

export type * from "./pipeline/types.js";
export type { ChildLogger, LogLevel } from "./logging.js";
export type { GridrunConfig, LoadConfigOptions } from "./config/config.js";
export type { CacheBackend } from "./pipeline/cache/backend.js";
export type { CacheLookupResult } from "./pipeline/cache/resolver.js";
export type {
  CommandRequest,
  CommandResult,
  CommandRunner,
  JobDeps,
  PostJobHook,
  StepActionContext,
  StepActionDefinition,
} from "./pipeline/executor/types.js";
export type { ExecutePipelineOptions } from "./pipeline/executor/run.js";
export type { ReportSink } from "./pipeline/report.js";

export { getChildLogger, setLogLevel } from "./logging.js";
export { loadConfig } from "./config/config.js";
export {
  CacheUnavailable,
  CommandFailure,
  ConfigurationError,
  ForwardReferenceError,
  GridrunError,
  TemplateSyntaxError,
  TimeoutError,
} from "./pipeline/errors.js";
export * from "./pipeline/expression/index.js";
export { expandJob, expandMatrix, instanceLabel } from "./pipeline/matrix.js";
export { hashFiles, matchFiles } from "./pipeline/hash-files.js";
export { ExecutionContext } from "./pipeline/context.js";
export { FileCacheBackend, MemoryCacheBackend } from "./pipeline/cache/backend.js";
export { CacheResolver } from "./pipeline/cache/resolver.js";
export { PipelineCycleError, PipelineEngine } from "./pipeline/engine.js";
export { StepActionRegistry, createDefaultActionRegistry } from "./pipeline/executor/actions.js";
export { ShellCommandRunner } from "./pipeline/executor/shell.js";
export { runJobInstance } from "./pipeline/executor/job.js";
export { WorkerPool, runJobInstances } from "./pipeline/executor/scheduler.js";
export { executePipeline } from "./pipeline/executor/run.js";
export { BenchmarkAggregator } from "./pipeline/aggregator.js";
export { FileReportSink, LogReportSink } from "./pipeline/report.js";
export { loadPipelineFile, parsePipelineDefinition } from "./pipeline/loader.js";
export { appendPipelineRun, loadPipelineRun, loadPipelineRuns } from "./pipeline/run-log.js";
export { runCli } from "./cli/program.js";
