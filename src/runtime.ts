// ---------------------------------------------------------------------------
// Runtime – where user-facing CLI output goes
// ---------------------------------------------------------------------------
// Diagnostics go through getChildLogger(); command results and summaries go
// through the runtime so tests can capture them.
// ---------------------------------------------------------------------------

export type RuntimeEnv = {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (...args) => console.log(...args),
  error: (...args) => console.error(...args),
};
