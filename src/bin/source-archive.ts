#!/usr/bin/env node
// CLI entry point for source-archive

import { aggregate, aggregateDirectory, ENGINE_VERSION, NoMatchingFilesError, NotADirectoryError } from "../index.js";
import { parseCliArgs, resolveConfig, toAggregateOptions } from "../config.js";
import type { Warning } from "../types.js";

const HELP_TEXT = `
source-archive v${ENGINE_VERSION}

Usage:
  source-archive <input_dir> [output_file]         Write the archive document
  source-archive check <input_dir> [output_file]   Exit 1 if the document is stale (for CI)

Arguments:
  input_dir            Directory to scan (default: current directory)
  output_file          Destination markdown file (default: <input_dir>.md beside it)
                       Extensions are never positional: use --extensions py,ts
                       or repeat --extensions, not --extensions py ts

Options:
  --title <text>       Document title (default: "<input_dir name> Source Archive")
  --extensions <ext>   Replace the default extension list; repeat or comma-separate
  --ignore-dir <name>  Extra directory name to skip (repeatable)
  --ignore-file <name> Extra file name to skip (repeatable)
  --ignore <pattern>   Gitignore-style pattern to exclude (repeatable)
  --gitignore          Also exclude patterns from <input_dir>/.gitignore
  --follow-symlinks    Walk into symlinked files and directories
  --config, -c         Path to config file (default: ./source-archive.config.json)
  --dry-run            Print the document to stdout instead of writing it
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress and timing
  --version            Print version
  --help, -h           Show this help text

Examples:
  npx source-archive ./src
  npx source-archive ./src docs/src.md --title "Core sources"
  npx source-archive . --extensions ts,tsx --ignore "**/*.test.ts" --gitignore
`.trim();

async function main(): Promise<void> {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help) {
    process.stdout.write(HELP_TEXT + "\n");
    return;
  }

  if (args.version) {
    process.stdout.write(`${ENGINE_VERSION}\n`);
    return;
  }

  const isCheck = args.positionals[0] === "check";
  if (isCheck) args.positionals.shift();

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  const options = toAggregateOptions(config);

  try {
    if (isCheck) {
      const { runCheck } = await import("./check.js");
      const isStale = runCheck(options, warnings, { quiet: config.quiet });
      process.exitCode = isStale ? 1 : 0;
      return;
    }

    if (config.dryRun) {
      const result = aggregate(options, warnings);
      printWarnings(warnings, config.quiet);
      process.stdout.write(result.content);
      return;
    }

    const result = aggregateDirectory(options, warnings);
    printWarnings(warnings, config.quiet);
    if (!config.quiet) process.stderr.write(`Written to ${result.outputPath}\n`);
  } catch (err: unknown) {
    if (err instanceof NotADirectoryError || err instanceof NoMatchingFilesError) {
      printWarnings(warnings, config.quiet);
      process.stderr.write(`[error] ${err.message}\n`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    const where = w.file ? ` (${w.file})` : "";
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}${where}\n`);
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
