// ---------------------------------------------------------------------------
// Cache Backends – key → blob stores
// ---------------------------------------------------------------------------
// Storage layout (FileCacheBackend):
//   {dir}/blobs/{sha256(key)[0:2]}/{sha256(key)}.bin   – archive bytes
//   {dir}/index.jsonl                                  – append-only key log
// The engine never deletes entries; eviction belongs to whoever owns the dir.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

export interface CacheBackend {
  get(key: string): Promise<Buffer | null>;
  put(key: string, bytes: Buffer): Promise<void>;
  has(key: string): Promise<boolean>;
  /** Keys in insertion order (newest last). Used for restore-key prefix lookups. */
  list?(): Promise<string[]>;
}

// ---------------------------------------------------------------------------
// MemoryCacheBackend
// ---------------------------------------------------------------------------

export class MemoryCacheBackend implements CacheBackend {
  private readonly blobs = new Map<string, Buffer>();

  async get(key: string): Promise<Buffer | null> {
    const blob = this.blobs.get(key);
    return blob ? Buffer.from(blob) : null;
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    // Re-inserting moves the key to the end so list() stays newest-last.
    this.blobs.delete(key);
    this.blobs.set(key, Buffer.from(bytes));
  }

  async has(key: string): Promise<boolean> {
    return this.blobs.has(key);
  }

  async list(): Promise<string[]> {
    return [...this.blobs.keys()];
  }
}

// ---------------------------------------------------------------------------
// FileCacheBackend
// ---------------------------------------------------------------------------

let writeSeq = 0;

function digestKey(key: string): string {
  return createHash("sha256").update(key).digest("hex");
}

export class FileCacheBackend implements CacheBackend {
  constructor(private readonly dir: string) {}

  private blobPath(key: string): string {
    const digest = digestKey(key);
    return path.join(this.dir, "blobs", digest.slice(0, 2), `${digest}.bin`);
  }

  private indexPath(): string {
    return path.join(this.dir, "index.jsonl");
  }

  async get(key: string): Promise<Buffer | null> {
    const filePath = this.blobPath(key);
    if (!existsSync(filePath)) {
      return null;
    }
    return fs.readFile(filePath);
  }

  async has(key: string): Promise<boolean> {
    return existsSync(this.blobPath(key));
  }

  /**
   * Atomic write (tmp + rename). Concurrent writers of the same key race on
   * the rename; the last one wins.
   */
  async put(key: string, bytes: Buffer): Promise<void> {
    const filePath = this.blobPath(key);
    const dir = path.dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    const tmp = filePath + ".tmp." + process.pid + "." + writeSeq++;
    await fs.writeFile(tmp, bytes);
    await fs.rename(tmp, filePath);
    await fs.appendFile(
      this.indexPath(),
      JSON.stringify({ key, savedAtMs: Date.now() }) + "\n",
      "utf-8",
    );
  }

  async list(): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.indexPath(), "utf-8");
    } catch {
      return [];
    }
    const keys: string[] = [];
    for (const line of raw.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        const parsed: unknown = JSON.parse(line);
        if (typeof parsed === "object" && parsed !== null && "key" in parsed && typeof parsed.key === "string") {
          const existing = keys.indexOf(parsed.key);
          if (existing !== -1) {
            keys.splice(existing, 1);
          }
          keys.push(parsed.key);
        }
      } catch {
        // Skip malformed lines
      }
    }
    return keys;
  }
}
