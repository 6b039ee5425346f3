// src/index.ts — Library API
// aggregate() builds the document in memory; aggregateDirectory() also writes it.

export type {
  TreeNode,
  FilterConfig,
  FilterVerdict,
  ExclusionReason,
  PatternMatcher,
  AggregateOptions,
  AggregateResult,
  ArchiveStats,
  CheckResult,
  ResolvedConfig,
  Warning,
} from "./types.js";

export {
  NotADirectoryError,
  NoMatchingFilesError,
  FileReadError,
  ENGINE_VERSION,
  DEFAULT_IGNORED_DIRS,
  DEFAULT_IGNORED_FILES,
  TOP_ANCHOR,
  TOC_ANCHOR,
  BACK_LINK,
} from "./types.js";

export {
  aggregate,
  aggregateDirectory,
  checkDocument,
  defaultOutputPath,
  defaultTitle,
  readGitignorePatterns,
} from "./pipeline.js";
export { evaluateEntry, isIncluded, normalizeExtensions, createPatternMatcher } from "./path-filter.js";
export { buildTree, compareNames } from "./tree-builder.js";
export { AnchorRegistry, slugify } from "./anchor-registry.js";
export { assignHeadings } from "./heading-assigner.js";
export { renderDocument, buildTableOfContents } from "./document-renderer.js";
export type { RenderOptions } from "./document-renderer.js";
export { readContent, decodeText } from "./content-reader.js";
export { DEFAULT_SOURCE_EXTENSIONS, languageFor } from "./language-hints.js";
