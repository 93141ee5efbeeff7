// ---------------------------------------------------------------------------
// Configuration – defaults < gridrun.config.json < GRIDRUN_* env < overrides
// ---------------------------------------------------------------------------

import { existsSync, readFileSync } from "node:fs";
import * as path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { LogLevel } from "../logging.js";
import { isLogLevel } from "../logging.js";
import { ConfigurationError, errorMessage } from "../pipeline/errors.js";

export const CONFIG_FILENAME = "gridrun.config.json";

const DEFAULT_DIR = ".gridrun";

const DEFAULT_TIMEOUT_SECONDS = 3600;

export const GridrunConfigFileSchema = Type.Object(
  {
    logLevel: Type.Optional(
      Type.Union([
        Type.Literal("silent"),
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
      ]),
    ),
    maxParallel: Type.Optional(Type.Integer({ minimum: 1 })),
    cacheDir: Type.Optional(Type.String({ minLength: 1 })),
    runLogDir: Type.Optional(Type.String({ minLength: 1 })),
    reportDir: Type.Optional(Type.String({ minLength: 1 })),
    defaultTimeoutSeconds: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  },
  { additionalProperties: false },
);

export type GridrunConfigFile = Static<typeof GridrunConfigFileSchema>;

export type GridrunConfig = {
  logLevel: LogLevel;
  /** Undefined means unbounded. */
  maxParallel?: number;
  cacheDir: string;
  runLogDir: string;
  /** Undefined means reports go to the log. */
  reportDir?: string;
  defaultTimeoutSeconds: number;
  /** The config file that was read, if any. */
  configPath?: string;
};

export type LoadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; it must exist. */
  configPath?: string;
  /** Highest precedence (CLI flags). */
  overrides?: GridrunConfigFile;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resolveHome(env: NodeJS.ProcessEnv): string {
  return env.HOME ?? env.USERPROFILE ?? ".";
}

/** Resolve `~/…` against home and anything relative against `baseDir`. */
export function resolveConfigPath(value: string, baseDir: string, env: NodeJS.ProcessEnv): string {
  if (value === "~" || value.startsWith("~/")) {
    return path.join(resolveHome(env), value.slice(1));
  }
  return path.resolve(baseDir, value);
}

function checkShape(raw: unknown, source: string): GridrunConfigFile {
  if (Value.Check(GridrunConfigFileSchema, raw)) {
    return raw;
  }
  const issues = [...Value.Errors(GridrunConfigFileSchema, raw)].map(
    (error) => `${source}: ${error.path || "/"}: ${error.message}`,
  );
  throw new ConfigurationError(issues.length > 0 ? issues : [`${source}: invalid configuration`]);
}

function readConfigFile(filePath: string): GridrunConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }
  return checkShape(raw, filePath);
}

function positiveNumber(name: string, raw: string, integer: boolean): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ConfigurationError(`${name} must be a positive ${integer ? "integer" : "number"}, got "${raw}"`);
  }
  return value;
}

/** Read GRIDRUN_* variables. Unset or empty variables are ignored. */
export function configFromEnv(env: NodeJS.ProcessEnv): GridrunConfigFile {
  const out: GridrunConfigFile = {};
  const read = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const logLevel = read("GRIDRUN_LOG_LEVEL")?.toLowerCase();
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`GRIDRUN_LOG_LEVEL must be one of silent, debug, info, warn, error`);
    }
    out.logLevel = logLevel;
  }
  const maxParallel = read("GRIDRUN_MAX_PARALLEL");
  if (maxParallel !== undefined) {
    out.maxParallel = positiveNumber("GRIDRUN_MAX_PARALLEL", maxParallel, true);
  }
  const timeout = read("GRIDRUN_DEFAULT_TIMEOUT_SECONDS");
  if (timeout !== undefined) {
    out.defaultTimeoutSeconds = positiveNumber("GRIDRUN_DEFAULT_TIMEOUT_SECONDS", timeout, false);
  }
  out.cacheDir = read("GRIDRUN_CACHE_DIR");
  out.runLogDir = read("GRIDRUN_RUN_LOG_DIR");
  out.reportDir = read("GRIDRUN_REPORT_DIR");
  return out;
}

/** Later layers win; an undefined value never overrides. */
function mergeLayers(layers: GridrunConfigFile[]): GridrunConfigFile {
  const merged: GridrunConfigFile = {};
  for (const layer of layers) {
    merged.logLevel = layer.logLevel ?? merged.logLevel;
    merged.maxParallel = layer.maxParallel ?? merged.maxParallel;
    merged.cacheDir = layer.cacheDir ?? merged.cacheDir;
    merged.runLogDir = layer.runLogDir ?? merged.runLogDir;
    merged.reportDir = layer.reportDir ?? merged.reportDir;
    merged.defaultTimeoutSeconds = layer.defaultTimeoutSeconds ?? merged.defaultTimeoutSeconds;
  }
  return merged;
}

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

export function loadConfig(opts: LoadConfigOptions = {}): GridrunConfig {
  const cwd = opts.cwd ?? process.cwd();
  const env = opts.env ?? process.env;
  const home = resolveHome(env);

  const explicitPath = opts.configPath ?? env.GRIDRUN_CONFIG;
  const configPath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILENAME);
  let fileLayer: GridrunConfigFile = {};
  let loadedFrom: string | undefined;
  if (existsSync(configPath)) {
    fileLayer = readConfigFile(configPath);
    loadedFrom = configPath;
  } else if (explicitPath) {
    throw new ConfigurationError(`Config file ${configPath} does not exist`);
  }

  // Relative paths in the file are relative to the file, elsewhere to cwd.
  const fileDir = loadedFrom ? path.dirname(loadedFrom) : cwd;
  const relativeTo = (layer: GridrunConfigFile, baseDir: string): GridrunConfigFile => ({
    ...layer,
    cacheDir: layer.cacheDir ? resolveConfigPath(layer.cacheDir, baseDir, env) : undefined,
    runLogDir: layer.runLogDir ? resolveConfigPath(layer.runLogDir, baseDir, env) : undefined,
    reportDir: layer.reportDir ? resolveConfigPath(layer.reportDir, baseDir, env) : undefined,
  });

  const overrides = opts.overrides ? checkShape(opts.overrides, "options") : {};
  const merged = mergeLayers([
    relativeTo(fileLayer, fileDir),
    relativeTo(configFromEnv(env), cwd),
    relativeTo(overrides, cwd),
  ]);

  return {
    logLevel: merged.logLevel ?? "info",
    maxParallel: merged.maxParallel,
    cacheDir: merged.cacheDir ?? path.join(home, DEFAULT_DIR, "cache"),
    runLogDir: merged.runLogDir ?? path.join(home, DEFAULT_DIR, "runs"),
    reportDir: merged.reportDir,
    defaultTimeoutSeconds: merged.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    configPath: loadedFrom,
  };
}
