// src/types.ts — Shared types for the source archive pipeline

// ─── Tree ────────────────────────────────────────────────────────────────────

/**
 * One filesystem entry that survived filtering.
 * `anchor` and `headingText` stay undefined on the root node.
 */
export interface TreeNode {
  readonly path: string;
  readonly isDirectory: boolean;
  readonly depth: number;
  readonly children: readonly TreeNode[];
  readonly isMarkdown: boolean;
  anchor?: string;
  headingText?: string;
}

// ─── Filtering ───────────────────────────────────────────────────────────────

/** Returns true when the root-relative posix path is excluded by a pattern. */
export type PatternMatcher = (relativePath: string) => boolean;

export interface FilterConfig {
  rootPath: string;
  outputPath: string;
  extensions: ReadonlySet<string>;
  ignoredDirs: ReadonlySet<string>;
  ignoredFiles: ReadonlySet<string>;
  followSymlinks: boolean;
  patternMatcher?: PatternMatcher;
}

export type ExclusionReason =
  | "self-output"
  | "symlink"
  | "missing"
  | "pattern"
  | "ignored-dir"
  | "ignored-file"
  | "hidden"
  | "extension"
  | "not-a-file";

export type FilterVerdict =
  | { included: true; isDirectory: boolean }
  | { included: false; reason: ExclusionReason };

// ─── Configuration ───────────────────────────────────────────────────────────

export interface AggregateOptions {
  inputDir: string;
  /** Defaults to `<inputDir>.md` beside the input directory. */
  outputFile?: string;
  /** Defaults to `<inputDir basename> Source Archive`. */
  title?: string;
  /** Replaces the default allow-list when non-empty. */
  extensions?: string[];
  /** Added to DEFAULT_IGNORED_DIRS. */
  ignoredDirs?: string[];
  /** Added to DEFAULT_IGNORED_FILES. */
  ignoredFiles?: string[];
  ignorePatterns?: string[];
  useGitignore?: boolean;
  followSymlinks?: boolean;
  /** Progress lines on stderr. */
  verbose?: boolean;
}

export interface ResolvedConfig {
  inputDir: string;
  outputFile?: string;
  title?: string;
  extensions: string[];
  ignoredDirs: string[];
  ignoredFiles: string[];
  ignorePatterns: string[];
  useGitignore: boolean;
  followSymlinks: boolean;
  dryRun: boolean;
  verbose: boolean;
  quiet: boolean;
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface ArchiveStats {
  directories: number;
  files: number;
  markdownFiles: number;
  bytes: number;
}

export interface AggregateResult {
  content: string;
  title: string;
  rootPath: string;
  outputPath: string;
  stats: ArchiveStats;
  warnings: Warning[];
}

export interface CheckResult {
  upToDate: boolean;
  outputPath: string;
  reason?: "missing" | "changed";
  warnings: Warning[];
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class NotADirectoryError extends Error {
  constructor(public readonly inputPath: string) {
    super(`Input path is not a directory: ${inputPath}`);
    this.name = "NotADirectoryError";
  }
}

export class NoMatchingFilesError extends Error {
  constructor(public readonly rootPath: string) {
    super(`No matching files found under ${rootPath}`);
    this.name = "NoMatchingFilesError";
  }
}

export class FileReadError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`Cannot read file: ${filePath}${cause ? ` (${cause.message})` : ""}`);
    this.name = "FileReadError";
    if (cause) this.cause = cause;
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

export const MARKDOWN_EXTENSION = ".md";

export const DEFAULT_IGNORED_DIRS = [
  ".git",
  ".hg",
  ".svn",
  ".tox",
  ".venv",
  ".idea",
  ".vscode",
  "__pycache__",
  "node_modules",
  "dist",
  "build",
  "target",
  "venv",
] as const;

export const DEFAULT_IGNORED_FILES = [".DS_Store"] as const;

export const TOP_ANCHOR = "document-top";
export const TOC_ANCHOR = "table-of-contents";
export const BACK_LINK = `[Back to Top](#${TOP_ANCHOR}) • [Back to TOC](#${TOC_ANCHOR})`;
export const MAX_HEADING_LEVEL = 6;
