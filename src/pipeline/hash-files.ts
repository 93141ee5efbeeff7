// ---------------------------------------------------------------------------
// hashFiles – content hash over a glob-matched file set
// ---------------------------------------------------------------------------
// Patterns are relative to the workspace and use `/` separators:
//   `*` any run of characters except `/`, `**` any number of directories,
//   `?` a single character, and a leading `!` excludes earlier matches.
// The digest is sha256 over the per-file sha256 digests in sorted path order,
// so it depends only on which files match and what they contain.
// ---------------------------------------------------------------------------

import { createHash } from "node:crypto";
import { readFileSync, readdirSync, realpathSync, statSync, type Dirent, type Stats } from "node:fs";
import * as path from "node:path";

const SKIPPED_DIRS = new Set([".git"]);

export function globToRegExp(pattern: string): RegExp {
  let source = "";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === "*") {
      if (pattern[i + 1] === "*") {
        // `**/` matches zero or more whole directories; a trailing `**` matches the rest.
        if (pattern[i + 2] === "/") {
          source += "(?:.*/)?";
          i += 3;
        } else {
          source += ".*";
          i += 2;
        }
        continue;
      }
      source += "[^/]*";
    } else if (ch === "?") {
      source += "[^/]";
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
    i++;
  }
  return new RegExp(`^${source}$`);
}

/** What a symlink points at; undefined for dangling or looping links. */
function linkTarget(full: string): Stats | undefined {
  try {
    return statSync(full);
  } catch {
    return undefined;
  }
}

/**
 * Whether a directory (as path segments) can hold a file some include
 * pattern matches. Segments containing `**` match any depth.
 */
function mayContainMatches(patternSegments: string[], dirSegments: string[]): boolean {
  for (let i = 0; i < dirSegments.length; i++) {
    const segment = patternSegments[i];
    if (segment === undefined) {
      return false;
    }
    if (segment.includes("**")) {
      return true;
    }
    if (i === patternSegments.length - 1 || !globToRegExp(segment).test(dirSegments[i])) {
      return false;
    }
  }
  return true;
}

/**
 * Files under `root` as `/`-separated relative paths. Symlinks are followed,
 * except into a directory the walk is already inside, and directories no
 * include pattern can reach are not read.
 */
function listFiles(root: string, includes: string[][]): string[] {
  const out: string[] = [];

  const walk = (dir: string, segments: string[], ancestors: ReadonlySet<string>) => {
    let real: string;
    let entries: Dirent[];
    try {
      real = realpathSync(dir);
      entries = readdirSync(dir, { withFileTypes: true });
    } catch {
      // Unreadable directories contribute no files.
      return;
    }
    if (ancestors.has(real)) {
      return;
    }
    const inside = new Set(ancestors).add(real);

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      let isDirectory = entry.isDirectory();
      let isFile = entry.isFile();
      if (entry.isSymbolicLink()) {
        const target = linkTarget(full);
        isDirectory = target?.isDirectory() ?? false;
        isFile = target?.isFile() ?? false;
      }

      const childSegments = [...segments, entry.name];
      if (isDirectory) {
        if (!SKIPPED_DIRS.has(entry.name) && includes.some((p) => mayContainMatches(p, childSegments))) {
          walk(full, childSegments, inside);
        }
      } else if (isFile) {
        out.push(childSegments.join("/"));
      }
    }
  };
  walk(root, [], new Set());
  return out;
}

/** Relative paths (sorted) of files under `workdir` matching the patterns. */
export function matchFiles(workdir: string, patterns: string[]): string[] {
  const rules = patterns
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => {
      const negate = p.startsWith("!");
      const body = (negate ? p.slice(1) : p).replace(/^\.\//, "");
      return { negate, body, re: globToRegExp(body) };
    });
  const includes = rules.filter((rule) => !rule.negate).map((rule) => rule.body.split("/"));

  const matched: string[] = [];
  for (const file of listFiles(workdir, includes)) {
    let include = false;
    for (const rule of rules) {
      if (rule.re.test(file)) {
        include = !rule.negate;
      }
    }
    if (include) {
      matched.push(file);
    }
  }
  return matched.sort();
}

/** sha256 hex digest of the matched files' contents, or '' when none match. */
export function hashFiles(workdir: string, patterns: string[]): string {
  const files = matchFiles(workdir, patterns);
  if (files.length === 0) {
    return "";
  }
  const outer = createHash("sha256");
  for (const file of files) {
    const inner = createHash("sha256").update(readFileSync(path.join(workdir, file))).digest();
    outer.update(inner);
  }
  return outer.digest("hex");
}
