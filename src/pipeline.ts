// src/pipeline.ts — Pipeline Orchestrator
// PathFilter → TreeBuilder → HeadingAssigner → DocumentRenderer, synchronously, once per run.

import { existsSync, mkdirSync, readFileSync, realpathSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, join, resolve } from "node:path";
import type {
  AggregateOptions,
  AggregateResult,
  ArchiveStats,
  CheckResult,
  FilterConfig,
  TreeNode,
  Warning,
} from "./types.js";
import {
  DEFAULT_IGNORED_DIRS,
  DEFAULT_IGNORED_FILES,
  NoMatchingFilesError,
  NotADirectoryError,
} from "./types.js";
import { DEFAULT_SOURCE_EXTENSIONS } from "./language-hints.js";
import { createPatternMatcher, normalizeExtensions, resolveLocation } from "./path-filter.js";
import { buildTree } from "./tree-builder.js";
import { AnchorRegistry } from "./anchor-registry.js";
import { assignHeadings } from "./heading-assigner.js";
import { renderDocument } from "./document-renderer.js";
import { readContent } from "./content-reader.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean | undefined, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Build the archive document in memory. Throws NotADirectoryError before any traversal
 * when the input is not a directory, and NoMatchingFilesError when filtering leaves
 * nothing. Everything else recoverable ends up in `warnings`.
 */
export function aggregate(
  options: AggregateOptions,
  warnings: Warning[] = [],
): AggregateResult {
  const startTime = performance.now();
  const rootPath = resolveInputDir(options.inputDir);
  const outputPath = resolveLocation(options.outputFile ?? defaultOutputPath(rootPath));
  const verbose = options.verbose;

  const filterConfig = buildFilterConfig(rootPath, outputPath, options, warnings);
  vlog(verbose, `Scanning ${rootPath} (${filterConfig.extensions.size} extensions)`);

  const tree = buildTree(rootPath, filterConfig, warnings);
  if (!tree) {
    throw new NoMatchingFilesError(rootPath);
  }

  const registry = new AnchorRegistry();
  assignHeadings(tree, rootPath, registry);

  const title = options.title || defaultTitle(rootPath);
  const lines = renderDocument(tree, { rootPath, title, readContent });
  const content = lines.join("\n") + "\n";

  const stats = countNodes(tree);
  stats.bytes = Buffer.byteLength(content, "utf-8");

  const elapsedMs = Math.round(performance.now() - startTime);
  vlog(
    verbose,
    `  ${stats.directories} directories, ${stats.files} files (${stats.markdownFiles} markdown), ${stats.bytes} bytes in ${elapsedMs}ms`,
  );

  return { content, title, rootPath, outputPath, stats, warnings };
}

/**
 * Build the document and write it, creating the output directory when needed.
 */
export function aggregateDirectory(
  options: AggregateOptions,
  warnings: Warning[] = [],
): AggregateResult {
  const result = aggregate(options, warnings);
  mkdirSync(dirname(result.outputPath), { recursive: true });
  writeFileSync(result.outputPath, result.content, "utf-8");
  vlog(options.verbose, `Written to ${result.outputPath}`);
  return result;
}

/**
 * Compare a fresh render against the document already on disk.
 */
export function checkDocument(
  options: AggregateOptions,
  warnings: Warning[] = [],
): CheckResult {
  const result = aggregate(options, warnings);
  if (!existsSync(result.outputPath)) {
    return { upToDate: false, outputPath: result.outputPath, reason: "missing", warnings };
  }
  const existing = readFileSync(result.outputPath, "utf-8");
  if (existing !== result.content) {
    return { upToDate: false, outputPath: result.outputPath, reason: "changed", warnings };
  }
  return { upToDate: true, outputPath: result.outputPath, warnings };
}

export function defaultTitle(rootPath: string): string {
  return `${basename(rootPath)} Source Archive`;
}

/** `<parent>/<name>.md`, next to the scanned directory. */
export function defaultOutputPath(rootPath: string): string {
  return join(dirname(rootPath), `${basename(rootPath)}.md`);
}

/**
 * Patterns from the `.gitignore` at the scan root. A missing file yields none.
 */
export function readGitignorePatterns(rootPath: string, warnings: Warning[] = []): string[] {
  const gitignorePath = join(rootPath, ".gitignore");
  if (!existsSync(gitignorePath)) return [];
  try {
    return readFileSync(gitignorePath, "utf-8")
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line && !line.startsWith("#"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "pipeline",
      message: `Cannot read .gitignore: ${msg}`,
      file: gitignorePath,
    });
    return [];
  }
}

function resolveInputDir(inputDir: string): string {
  const absolute = resolve(inputDir);
  let real: string;
  try {
    real = realpathSync(absolute);
  } catch {
    throw new NotADirectoryError(absolute);
  }
  if (!statSync(real).isDirectory()) {
    throw new NotADirectoryError(real);
  }
  return real;
}

function buildFilterConfig(
  rootPath: string,
  outputPath: string,
  options: AggregateOptions,
  warnings: Warning[],
): FilterConfig {
  const extensions =
    options.extensions && options.extensions.length > 0
      ? options.extensions
      : DEFAULT_SOURCE_EXTENSIONS;

  const patterns = [
    ...(options.useGitignore ? readGitignorePatterns(rootPath, warnings) : []),
    ...(options.ignorePatterns ?? []),
  ];

  return {
    rootPath,
    outputPath,
    extensions: normalizeExtensions(extensions),
    ignoredDirs: new Set([...DEFAULT_IGNORED_DIRS, ...(options.ignoredDirs ?? [])]),
    ignoredFiles: new Set([...DEFAULT_IGNORED_FILES, ...(options.ignoredFiles ?? [])]),
    followSymlinks: options.followSymlinks ?? false,
    patternMatcher: createPatternMatcher(patterns),
  };
}

function countNodes(node: TreeNode): ArchiveStats {
  const stats: ArchiveStats = { directories: 0, files: 0, markdownFiles: 0, bytes: 0 };
  const stack: TreeNode[] = [...node.children];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.isDirectory) {
      stats.directories++;
      stack.push(...current.children);
    } else {
      stats.files++;
      if (current.isMarkdown) stats.markdownFiles++;
    }
  }
  return stats;
}
