// ---------------------------------------------------------------------------
// Report Sinks – where merged benchmark documents go
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ChildLogger } from "../logging.js";
import type { BenchmarkPayload } from "./types.js";
import { getChildLogger } from "../logging.js";

export interface ReportSink {
  /** `document` is null when no instance produced data for the group. */
  publish(group: string, document: BenchmarkPayload | null): Promise<void>;
}

/** `Unit Tests / py38` → `unit-tests-py38`. */
export function slugifyGroup(group: string): string {
  const slug = group
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "report";
}

// ---------------------------------------------------------------------------
// FileReportSink
// ---------------------------------------------------------------------------

let writeSeq = 0;

export class FileReportSink implements ReportSink {
  private readonly log: ChildLogger;

  constructor(
    private readonly dir: string,
    log?: ChildLogger,
  ) {
    this.log = log ?? getChildLogger({ module: "report" });
  }

  reportPath(group: string): string {
    return path.join(this.dir, `${slugifyGroup(group)}.json`);
  }

  async publish(group: string, document: BenchmarkPayload | null): Promise<void> {
    if (document === null) {
      this.log.info(`no benchmark data for "${group}"; nothing written`);
      return;
    }
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
    const filePath = this.reportPath(group);
    const tmp = filePath + ".tmp." + process.pid + "." + writeSeq++;
    await fs.writeFile(tmp, JSON.stringify(document, null, 2), "utf-8");
    await fs.rename(tmp, filePath);
    this.log.info(`report "${group}" written to ${filePath}`);
  }
}

// ---------------------------------------------------------------------------
// LogReportSink
// ---------------------------------------------------------------------------

export class LogReportSink implements ReportSink {
  private readonly log: ChildLogger;

  constructor(log?: ChildLogger) {
    this.log = log ?? getChildLogger({ module: "report" });
  }

  async publish(group: string, document: BenchmarkPayload | null): Promise<void> {
    if (document === null) {
      this.log.info(`report "${group}": no data`);
      return;
    }
    const summary = Object.entries(document)
      .map(([key, value]) => (Array.isArray(value) ? `${key}[${value.length}]` : key))
      .join(", ");
    this.log.info(`report "${group}": ${summary}`);
  }
}
