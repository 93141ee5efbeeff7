// ---------------------------------------------------------------------------
// Pipeline Executor – Shell Command Runner
// ---------------------------------------------------------------------------
// Runs a rendered `run` step through sh/bash. Step outputs come from two
// side channels:
//   - the file named by GRIDRUN_OUTPUT: `name=value` lines, or heredocs
//       name<<EOF
//       multi-line value
//       EOF
//   - legacy stdout commands: `::set-output name=x::value`
// The file wins when both set the same name.
// ---------------------------------------------------------------------------

import { spawn, type ChildProcess } from "node:child_process";
import * as fs from "node:fs/promises";
import type { StepShell } from "../types.js";
import type { CommandRequest, CommandResult, CommandRunner } from "./types.js";

const OUTPUT_TAIL_BYTES = 64 * 1024;
const TIMEOUT_EXIT_CODE = 124;
const SPAWN_FAILURE_EXIT_CODE = 127;
const KILL_GRACE_MS = 2000;

const SHELL_ARGS: Record<StepShell, (command: string) => string[]> = {
  sh: (command) => ["-e", "-c", command],
  bash: (command) => ["--noprofile", "--norc", "-eo", "pipefail", "-c", command],
};

// ---------------------------------------------------------------------------
// Output parsing
// ---------------------------------------------------------------------------

/** Parse the GRIDRUN_OUTPUT file format. Unterminated heredocs run to EOF. */
export function parseOutputFile(content: string): Record<string, string> {
  const outputs: Record<string, string> = {};
  const lines = content.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line.trim()) {
      continue;
    }
    const heredoc = /^([^=<\s]+)<<(.+)$/.exec(line);
    if (heredoc) {
      const [, name, delimiter] = heredoc;
      const body: string[] = [];
      i++;
      while (i < lines.length && lines[i] !== delimiter) {
        body.push(lines[i]);
        i++;
      }
      outputs[name] = body.join("\n");
      continue;
    }
    const eq = line.indexOf("=");
    if (eq > 0) {
      outputs[line.slice(0, eq).trim()] = line.slice(eq + 1);
    }
  }
  return outputs;
}

/** Parse one stdout line as a `::set-output name=x::value` command. */
export function parseSetOutputLine(line: string): [string, string] | null {
  const match = /^::set-output name=([^:]+)::(.*)$/.exec(line.trim());
  return match ? [match[1], match[2]] : null;
}

/** Collect `::set-output name=x::value` commands from stdout. */
export function parseSetOutputCommands(stdout: string): Record<string, string> {
  const outputs: Record<string, string> = {};
  for (const line of stdout.split(/\r?\n/)) {
    const parsed = parseSetOutputLine(line);
    if (parsed) {
      outputs[parsed[0]] = parsed[1];
    }
  }
  return outputs;
}

/** Replace every occurrence of each non-empty secret with `***`. */
export function maskSecrets(text: string, secrets: string[] = []): string {
  let out = text;
  // Longest first so a secret containing another is masked whole.
  for (const secret of [...secrets].filter(Boolean).sort((a, b) => b.length - a.length)) {
    out = out.split(secret).join("***");
  }
  return out;
}

async function readOutputFile(filePath: string): Promise<Record<string, string>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch {
    // Command never wrote outputs.
    return {};
  }
  return parseOutputFile(raw);
}

function tail(text: string): string {
  return text.length > OUTPUT_TAIL_BYTES ? text.slice(text.length - OUTPUT_TAIL_BYTES) : text;
}

/**
 * Signal the command's whole process group so children the shell forked die
 * with it. Falls back to the shell alone when the group is already gone.
 */
function terminate(proc: ChildProcess, signal: NodeJS.Signals): void {
  if (proc.pid !== undefined) {
    try {
      process.kill(-proc.pid, signal);
      return;
    } catch {
      // ESRCH: no such group.
    }
  }
  proc.kill(signal);
}

// ---------------------------------------------------------------------------
// ShellCommandRunner
// ---------------------------------------------------------------------------

type SpawnResult = {
  exitCode: number;
  timedOut: boolean;
  /** Outputs from `::set-output` lines, parsed as stdout streams in. */
  setOutputs: Record<string, string>;
  combined: string;
};

export class ShellCommandRunner implements CommandRunner {
  async run(request: CommandRequest): Promise<CommandResult> {
    const { exitCode, timedOut, setOutputs, combined } = await this.spawnCommand(request);

    const outputs = {
      ...setOutputs,
      ...(await readOutputFile(request.outputFile)),
    };

    return {
      exitCode,
      timedOut,
      output: maskSecrets(tail(combined), request.secrets),
      outputs,
    };
  }

  private spawnCommand(request: CommandRequest): Promise<SpawnResult> {
    return new Promise((resolve) => {
      const setOutputs: Record<string, string> = {};
      let partialLine = "";
      let combined = "";
      let timedOut = false;
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const takeLines = (text: string) => {
        const lines = (partialLine + text).split(/\r?\n/);
        partialLine = lines.pop() ?? "";
        for (const line of lines) {
          const parsed = parseSetOutputLine(line);
          if (parsed) {
            setOutputs[parsed[0]] = parsed[1];
          }
        }
      };

      const finish = (exitCode: number) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        takeLines("\n");
        resolve({ exitCode, timedOut, setOutputs, combined });
      };

      // Own process group, so a timeout can reach everything the shell started.
      const proc = spawn(request.shell, SHELL_ARGS[request.shell](request.command), {
        cwd: request.cwd,
        env: { ...process.env, ...request.env, GRIDRUN_OUTPUT: request.outputFile },
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });

      proc.stdout?.setEncoding("utf8");
      proc.stderr?.setEncoding("utf8");
      proc.stdout?.on("data", (text: string) => {
        takeLines(text);
        combined = tail(combined + text);
      });
      proc.stderr?.on("data", (text: string) => {
        combined = tail(combined + text);
      });

      if (request.timeoutMs !== undefined && request.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          terminate(proc, "SIGTERM");
          // Outlives finish(): group members that ignore SIGTERM still go.
          setTimeout(() => terminate(proc, "SIGKILL"), KILL_GRACE_MS).unref();
        }, request.timeoutMs);
      }

      proc.on("error", (err: Error) => {
        combined = tail(`${combined}${err.message}\n`);
        finish(SPAWN_FAILURE_EXIT_CODE);
      });

      // After a timeout, a survivor holding the pipes must not keep the step open.
      proc.on("exit", () => {
        if (timedOut) {
          proc.stdout?.destroy();
          proc.stderr?.destroy();
          finish(TIMEOUT_EXIT_CODE);
        }
      });

      proc.on("close", (code: number | null) => {
        finish(timedOut ? TIMEOUT_EXIT_CODE : (code ?? 1));
      });
    });
  }
}
