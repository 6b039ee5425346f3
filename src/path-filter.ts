// src/path-filter.ts — Include/exclude decision for a single filesystem entry
// First matching rule wins. No caching: every call reads filesystem metadata afresh.

import { existsSync, lstatSync, realpathSync, statSync, type Stats } from "node:fs";
import { basename, extname, relative, resolve, sep } from "node:path";
import ignoreModule from "ignore";
import type {
  ExclusionReason,
  FilterConfig,
  FilterVerdict,
  PatternMatcher,
} from "./types.js";
import { MARKDOWN_EXTENSION } from "./types.js";

/**
 * Decide whether `entryPath` belongs in the archive.
 */
export function evaluateEntry(entryPath: string, config: FilterConfig): FilterVerdict {
  if (resolveLocation(entryPath) === config.outputPath) return excluded("self-output");

  if (isSymlink(entryPath) && !config.followSymlinks) return excluded("symlink");

  if (!existsSync(entryPath)) return excluded("missing");

  let stats: Stats;
  try {
    stats = statSync(entryPath);
  } catch {
    // Vanished between the existence check and stat
    return excluded("missing");
  }
  const isDirectory = stats.isDirectory();

  if (config.patternMatcher) {
    const rel = toPosix(relative(config.rootPath, entryPath));
    if (config.patternMatcher(rel) || (isDirectory && config.patternMatcher(`${rel}/`))) {
      return excluded("pattern");
    }
  }

  const name = basename(entryPath);

  if (isDirectory) {
    if (config.ignoredDirs.has(name)) return excluded("ignored-dir");
    if (name.startsWith(".")) return excluded("hidden");
    return { included: true, isDirectory: true };
  }

  if (!stats.isFile()) return excluded("not-a-file");
  if (config.ignoredFiles.has(name)) return excluded("ignored-file");
  if (name.startsWith(".")) return excluded("hidden");

  const ext = extname(name).toLowerCase();
  if (ext === MARKDOWN_EXTENSION || config.extensions.has(ext)) {
    return { included: true, isDirectory: false };
  }
  return excluded("extension");
}

export function isIncluded(entryPath: string, config: FilterConfig): boolean {
  return evaluateEntry(entryPath, config).included;
}

/**
 * Lowercase and dot-prefix an extension list: `["PY", ".Ts"]` → `{".py", ".ts"}`.
 */
export function normalizeExtensions(extensions: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const ext of extensions) {
    const lower = ext.trim().toLowerCase();
    if (!lower) continue;
    normalized.add(lower.startsWith(".") ? lower : `.${lower}`);
  }
  return normalized;
}

/**
 * Build a gitignore-style predicate over root-relative posix paths.
 * Returns undefined when there is nothing to match against.
 */
export function createPatternMatcher(patterns: readonly string[]): PatternMatcher | undefined {
  const active = patterns.map((p) => p.trim()).filter((p) => p && !p.startsWith("#"));
  if (active.length === 0) return undefined;
  // `ignore` is CommonJS; its factory is exposed on `.default` for ESM consumers.
  // Names such as `...` look like parent traversals to it and would otherwise throw.
  const matcher = ignoreModule.default({ allowRelativePaths: true }).add(active);
  return (relativePath) => matcher.ignores(relativePath);
}

/**
 * Resolve a location the way the output path is resolved: symlinks followed, and for
 * paths that do not exist yet, the deepest existing parent is resolved instead.
 */
export function resolveLocation(target: string): string {
  const absolute = resolve(target);
  try {
    return realpathSync(absolute);
  } catch {
    const parent = resolve(absolute, "..");
    if (parent === absolute) return absolute;
    return resolve(resolveLocation(parent), basename(absolute));
  }
}

export function toPosix(relativePath: string): string {
  return relativePath.split(sep).join("/");
}

function isSymlink(entryPath: string): boolean {
  try {
    return lstatSync(entryPath).isSymbolicLink();
  } catch {
    return false;
  }
}

function excluded(reason: ExclusionReason): FilterVerdict {
  return { included: false, reason };
}
