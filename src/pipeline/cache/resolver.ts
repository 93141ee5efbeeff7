// ---------------------------------------------------------------------------
// Cache Resolver – key rendering, lookup, restore and save
// ---------------------------------------------------------------------------
// Restore-with-fallback-to-save:
//   1. resolve()  renders the key template (hashFiles runs now) and checks the
//                 backend; restore keys are prefix fallbacks (newest first).
//   2. restore()  unpacks the blob; best effort, a failure is just a miss.
//   3. save()     after the job, only when resolve() missed; an existing key is
//                 left untouched.
// Backend failures surface as CacheUnavailable and degrade to a miss.
// ---------------------------------------------------------------------------

import type { ChildLogger } from "../../logging.js";
import type { EvaluationScope } from "../expression/index.js";
import type { CacheBackend } from "./backend.js";
import { getChildLogger } from "../../logging.js";
import { CacheUnavailable, errorMessage } from "../errors.js";
import { renderTemplate } from "../expression/index.js";
import { packPaths, unpackArchive } from "./archive.js";

export type CacheLookupResult = {
  hit: boolean;
  /** Rendered primary key. */
  key: string;
  /** Key a restore should read from: the primary key on a hit, a restore-key match otherwise. */
  matchedKey?: string;
  paths: string[];
};

export type CacheResolverOpts = {
  backend: CacheBackend;
  log?: ChildLogger;
};

export class CacheResolver {
  private readonly backend: CacheBackend;
  private readonly log: ChildLogger;

  constructor(opts: CacheResolverOpts) {
    this.backend = opts.backend;
    this.log = opts.log ?? getChildLogger({ module: "cache" });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new CacheUnavailable(`Cache ${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  // -------------------------------------------------------------------------
  // resolve
  // -------------------------------------------------------------------------

  async resolve(
    keyTemplate: string,
    paths: string[],
    scope: EvaluationScope,
    restoreKeyTemplates: string[] = [],
  ): Promise<CacheLookupResult> {
    const key = renderTemplate(keyTemplate, scope);
    const restoreKeys = restoreKeyTemplates.map((tpl) => renderTemplate(tpl, scope)).filter(Boolean);

    try {
      if (await this.call("lookup", () => this.backend.has(key))) {
        return { hit: true, key, matchedKey: key, paths };
      }

      const list = this.backend.list?.bind(this.backend);
      if (restoreKeys.length > 0 && list) {
        const keys = await this.call("list", list);
        for (const prefix of restoreKeys) {
          const match = [...keys].reverse().find((candidate) => candidate.startsWith(prefix));
          if (match) {
            return { hit: false, key, matchedKey: match, paths };
          }
        }
      }
    } catch (err) {
      if (!(err instanceof CacheUnavailable)) {
        throw err;
      }
      this.log.warn(`${err.message}; continuing without cache`);
    }

    return { hit: false, key, paths };
  }

  // -------------------------------------------------------------------------
  // restore
  // -------------------------------------------------------------------------

  /** Unpack the entry into the workspace. Returns false on any miss or failure. */
  async restore(key: string, paths: string[], workdir: string): Promise<boolean> {
    try {
      const bytes = await this.call("read", () => this.backend.get(key));
      if (!bytes) {
        return false;
      }
      const count = await unpackArchive(bytes, workdir);
      this.log.debug(`restored ${count} file(s) for ${paths.join(", ")} from "${key}"`);
      return true;
    } catch (err) {
      this.log.warn(`cache restore for "${key}" failed: ${errorMessage(err)}`);
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // save
  // -------------------------------------------------------------------------

  /**
   * Archive the paths under `key`. A key that already exists is left as-is:
   * keys embed content hashes, so an existing entry holds the same content.
   */
  async save(key: string, paths: string[], workdir: string): Promise<boolean> {
    try {
      if (await this.call("lookup", () => this.backend.has(key))) {
        this.log.debug(`cache key "${key}" already present; skipping save`);
        return false;
      }
      const bytes = await packPaths(paths, workdir);
      await this.call("write", () => this.backend.put(key, bytes));
      return true;
    } catch (err) {
      if (!(err instanceof CacheUnavailable)) {
        throw err;
      }
      this.log.warn(`${err.message}; cache not saved`);
      return false;
    }
  }
}
