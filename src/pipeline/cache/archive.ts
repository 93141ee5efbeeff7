// ---------------------------------------------------------------------------
// Cache Archive – pack a path set into one blob and back
// ---------------------------------------------------------------------------
// Blob = gzip(JSON { version: 1, entries: [{ path, mode, data }] }) where
// `path` keeps the spelling of the cached path (`.tox/x`, `~/.cache/pip/y`)
// and `data` is base64. Paths that do not exist are skipped.
// ---------------------------------------------------------------------------

import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";

export type ArchiveEntry = {
  path: string;
  mode: number;
  data: string;
};

export type CacheArchive = {
  version: 1;
  entries: ArchiveEntry[];
};

/** Resolve a cached path spelling against the workspace (`~/` → home dir). */
export function resolveCachePath(spec: string, workdir: string): string {
  if (spec === "~" || spec.startsWith("~/")) {
    return path.join(os.homedir(), spec.slice(1));
  }
  return path.resolve(workdir, spec);
}

/** Split a multi-line `path` input into individual path specs. */
export function splitPathList(raw: string): string[] {
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

async function collect(spec: string, absolute: string, out: ArchiveEntry[]): Promise<void> {
  const stat = await fs.stat(absolute);
  if (stat.isDirectory()) {
    const names = (await fs.readdir(absolute)).sort();
    for (const name of names) {
      await collect(`${spec.replace(/\/+$/, "")}/${name}`, path.join(absolute, name), out);
    }
    return;
  }
  if (stat.isFile()) {
    const data = await fs.readFile(absolute);
    out.push({ path: spec, mode: stat.mode & 0o777, data: data.toString("base64") });
  }
}

export async function packPaths(paths: string[], workdir: string): Promise<Buffer> {
  const entries: ArchiveEntry[] = [];
  for (const spec of paths) {
    const absolute = resolveCachePath(spec, workdir);
    if (!existsSync(absolute)) {
      continue;
    }
    await collect(spec, absolute, entries);
  }
  const archive: CacheArchive = { version: 1, entries };
  return gzipSync(Buffer.from(JSON.stringify(archive), "utf-8"));
}

function isArchiveEntry(value: unknown): value is ArchiveEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return typeof record.path === "string" && typeof record.mode === "number" && typeof record.data === "string";
}

export function readArchive(bytes: Buffer): CacheArchive {
  const parsed: unknown = JSON.parse(gunzipSync(bytes).toString("utf-8"));
  if (typeof parsed !== "object" || parsed === null || !("version" in parsed) || parsed.version !== 1) {
    throw new Error("Unsupported cache archive format");
  }
  const entries = "entries" in parsed ? parsed.entries : undefined;
  if (!Array.isArray(entries) || !entries.every(isArchiveEntry)) {
    throw new Error("Unsupported cache archive format");
  }
  return { version: 1, entries };
}

/** Write every archived file back under the workspace. Returns the file count. */
export async function unpackArchive(bytes: Buffer, workdir: string): Promise<number> {
  const archive = readArchive(bytes);
  for (const entry of archive.entries) {
    const target = resolveCachePath(entry.path, workdir);
    const dir = path.dirname(target);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    await fs.writeFile(target, Buffer.from(entry.data, "base64"), { mode: entry.mode });
  }
  return archive.entries.length;
}
