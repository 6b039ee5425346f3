// src/tree-builder.ts — Post-order directory walk producing a pruned, sorted tree
// A directory exists in the result only if at least one descendant file survived filtering.

import { readdirSync, realpathSync } from "node:fs";
import { extname, join, relative } from "node:path";
import type { FilterConfig, TreeNode, Warning } from "./types.js";
import { MARKDOWN_EXTENSION } from "./types.js";
import { evaluateEntry, toPosix } from "./path-filter.js";

/** Listing failures that mean "this directory contributes nothing". */
const ABSORBED_LISTING_ERRORS = new Set(["EACCES", "EPERM", "ENOENT", "ENOTDIR"]);

interface WalkContext {
  config: FilterConfig;
  warnings: Warning[];
}

/**
 * Walk `rootPath` and return the pruned tree, or undefined when nothing survives.
 * The root itself is not tested against the filter.
 */
export function buildTree(
  rootPath: string,
  config: FilterConfig,
  warnings: Warning[] = [],
): TreeNode | undefined {
  const ancestors = new Set<string>();
  const rootReal = realLocation(rootPath);
  if (rootReal) ancestors.add(rootReal);
  return buildDirectory(rootPath, 0, { config, warnings }, ancestors);
}

/**
 * Case-insensitive name order. Names equal ignoring case fall back to code-unit order
 * so the result never depends on the order the filesystem lists entries in.
 */
export function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function buildDirectory(
  dirPath: string,
  depth: number,
  ctx: WalkContext,
  ancestors: Set<string>,
): TreeNode | undefined {
  let names: string[];
  try {
    names = readdirSync(dirPath);
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === undefined || !ABSORBED_LISTING_ERRORS.has(code)) throw err;
    ctx.warnings.push({
      level: "warn",
      module: "tree-builder",
      message: `Cannot list directory (${code}) — skipped`,
      file: dirPath,
    });
    return undefined;
  }

  names.sort(compareNames);

  const children: TreeNode[] = [];
  for (const name of names) {
    const entryPath = join(dirPath, name);
    const verdict = evaluateEntry(entryPath, ctx.config);
    if (!verdict.included) continue;

    if (!verdict.isDirectory) {
      children.push({
        path: entryPath,
        isDirectory: false,
        depth: depth + 1,
        children: [],
        isMarkdown: extname(name).toLowerCase() === MARKDOWN_EXTENSION,
      });
      continue;
    }

    const child = ctx.config.followSymlinks
      ? buildLinkedDirectory(entryPath, depth + 1, ctx, ancestors)
      : buildDirectory(entryPath, depth + 1, ctx, ancestors);
    if (child) children.push(child);
  }

  if (children.length === 0) return undefined;

  return {
    path: dirPath,
    isDirectory: true,
    depth,
    children,
    isMarkdown: false,
  };
}

/**
 * Symlinks may point back up the tree; a directory already on the ancestor chain is
 * skipped instead of walked again.
 */
function buildLinkedDirectory(
  dirPath: string,
  depth: number,
  ctx: WalkContext,
  ancestors: Set<string>,
): TreeNode | undefined {
  const real = realLocation(dirPath);
  if (real === undefined) return undefined;
  if (ancestors.has(real)) {
    ctx.warnings.push({
      level: "info",
      module: "tree-builder",
      message: `Symlink cycle at ${toPosix(relative(ctx.config.rootPath, dirPath))} — skipped`,
      file: dirPath,
    });
    return undefined;
  }
  ancestors.add(real);
  try {
    return buildDirectory(dirPath, depth, ctx, ancestors);
  } finally {
    ancestors.delete(real);
  }
}

function realLocation(target: string): string | undefined {
  try {
    return realpathSync(target);
  } catch {
    return undefined;
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
