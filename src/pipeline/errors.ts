// ---------------------------------------------------------------------------
// Pipeline Errors
// ---------------------------------------------------------------------------
// Scope of each error:
//   ConfigurationError    – pipeline never starts
//   TemplateSyntaxError   – fails the job instance
//   ForwardReferenceError – fails the step
//   CommandFailure        – fails the step unless continueOnError
//   TimeoutError          – CommandFailure raised by an expired timeout
//   CacheUnavailable      – logged, treated as a cache miss
// ---------------------------------------------------------------------------

export type GridrunErrorCode =
  | "CONFIGURATION"
  | "TEMPLATE_SYNTAX"
  | "FORWARD_REFERENCE"
  | "COMMAND_FAILURE"
  | "TIMEOUT"
  | "CACHE_UNAVAILABLE";

export class GridrunError extends Error {
  readonly code: GridrunErrorCode;

  constructor(code: GridrunErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GridrunError";
    this.code = code;
  }
}

export class ConfigurationError extends GridrunError {
  readonly issues: string[];

  constructor(issues: string | string[]) {
    const list = Array.isArray(issues) ? issues : [issues];
    super(
      "CONFIGURATION",
      list.length === 1 ? list[0] : `Invalid pipeline:\n${list.map((i) => `  - ${i}`).join("\n")}`,
    );
    this.name = "ConfigurationError";
    this.issues = list;
  }
}

export class TemplateSyntaxError extends GridrunError {
  readonly template: string;

  constructor(message: string, template: string) {
    super("TEMPLATE_SYNTAX", `${message} in "${template}"`);
    this.name = "TemplateSyntaxError";
    this.template = template;
  }
}

export class ForwardReferenceError extends GridrunError {
  readonly stepId: string;

  constructor(stepId: string) {
    super("FORWARD_REFERENCE", `Step "${stepId}" has not run yet; its outputs are not available`);
    this.name = "ForwardReferenceError";
    this.stepId = stepId;
  }
}

export class CommandFailure extends GridrunError {
  readonly exitCode: number;

  constructor(exitCode: number, message?: string, code: GridrunErrorCode = "COMMAND_FAILURE") {
    super(code, message ?? `Command exited with code ${exitCode}`);
    this.name = "CommandFailure";
    this.exitCode = exitCode;
  }
}

export class TimeoutError extends CommandFailure {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, exitCode = 124) {
    super(exitCode, `Command timed out after ${timeoutMs}ms`, "TIMEOUT");
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class CacheUnavailable extends GridrunError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_UNAVAILABLE", message, options);
    this.name = "CacheUnavailable";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
