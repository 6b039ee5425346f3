// src/bin/check.ts — Staleness detection for a written archive
// Re-renders the document and compares it byte-for-byte with the file on disk.

import { relative } from "node:path";
import { checkDocument } from "../pipeline.js";
import type { AggregateOptions, Warning } from "../types.js";

interface CheckOptions {
  quiet?: boolean;
}

function stderr(msg: string): void {
  process.stderr.write(msg + "\n");
}

/**
 * Returns true if the archive needs regeneration (for exit code).
 */
export function runCheck(
  options: AggregateOptions,
  warnings: Warning[] = [],
  checkOptions: CheckOptions = {},
): boolean {
  const result = checkDocument(options, warnings);
  const shown = relative(process.cwd(), result.outputPath) || result.outputPath;

  if (!checkOptions.quiet) {
    for (const w of result.warnings) {
      stderr(`[${w.level}] ${w.module}: ${w.message}`);
    }
  }

  if (result.upToDate) {
    if (!checkOptions.quiet) stderr(`  ${shown} is up to date.`);
    return false;
  }

  if (result.reason === "missing") {
    stderr(`  No archive found at ${shown}`);
  } else {
    stderr(`  ${shown} is stale: contents differ from a fresh render`);
  }
  stderr(`  Run \`npx source-archive\` with the same arguments to regenerate.`);
  return true;
}
