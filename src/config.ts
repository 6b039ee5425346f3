// src/config.ts — Config Resolver
// Precedence: defaults ← config file ← CLI args. List options from the file and the CLI
// are concatenated; scalar options from the CLI win.

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type { AggregateOptions, ResolvedConfig, Warning } from "./types.js";

export const CONFIG_FILENAME = "source-archive.config.json";
export const PACKAGE_JSON_KEY = "sourceArchive";

// A bare word such as `ts` or `.rs`: what `--extensions py ts` leaves behind as a positional
const EXTENSION_LIKE = /^\.?[A-Za-z0-9+]{1,6}$/;

export interface ParsedArgs {
  positionals: string[];
  title?: string;
  extensions: string[];
  ignoreDirs: string[];
  ignoreFiles: string[];
  ignorePatterns: string[];
  gitignore: boolean;
  followSymlinks: boolean;
  config?: string;
  dryRun: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/** Shape accepted in source-archive.config.json or package.json#sourceArchive. */
export interface FileConfig {
  input?: string;
  output?: string;
  title?: string;
  extensions?: string[];
  ignoreDirs?: string[];
  ignoreFiles?: string[];
  ignore?: string[];
  gitignore?: boolean;
  followSymlinks?: boolean;
}

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};

  const inputDir = args.positionals[0] ?? fileConfig.input ?? ".";
  const outputFile = args.positionals[1] ?? fileConfig.output;

  if (args.positionals.length > 2) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring extra arguments: ${args.positionals.slice(2).join(" ")}`,
    });
  }

  const strayOutput = args.positionals[1];
  if (args.extensions.length > 0 && strayOutput !== undefined && EXTENSION_LIKE.test(strayOutput)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Output file "${strayOutput}" looks like an extension; list extensions as --extensions ${[...args.extensions, strayOutput].join(",")}`,
    });
  }

  return {
    inputDir: resolve(cwd, inputDir),
    outputFile: outputFile !== undefined ? resolve(cwd, outputFile) : undefined,
    title: args.title ?? fileConfig.title,
    extensions: args.extensions.length > 0 ? args.extensions : fileConfig.extensions ?? [],
    ignoredDirs: [...(fileConfig.ignoreDirs ?? []), ...args.ignoreDirs],
    ignoredFiles: [...(fileConfig.ignoreFiles ?? []), ...args.ignoreFiles],
    ignorePatterns: [...(fileConfig.ignore ?? []), ...args.ignorePatterns],
    useGitignore: args.gitignore || (fileConfig.gitignore ?? false),
    followSymlinks: args.followSymlinks || (fileConfig.followSymlinks ?? false),
    dryRun: args.dryRun,
    verbose: args.verbose,
    quiet: args.quiet,
  };
}

/**
 * The subset of a resolved config the pipeline consumes.
 */
export function toAggregateOptions(config: ResolvedConfig): AggregateOptions {
  return {
    inputDir: config.inputDir,
    outputFile: config.outputFile,
    title: config.title,
    extensions: config.extensions,
    ignoredDirs: config.ignoredDirs,
    ignoredFiles: config.ignoredFiles,
    ignorePatterns: config.ignorePatterns,
    useGitignore: config.useGitignore,
    followSymlinks: config.followSymlinks,
    verbose: config.verbose,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // sourceArchive key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && isRecord(pkg[PACKAGE_JSON_KEY])) {
        return validateFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "info",
        module: "config",
        message: `Skipping unreadable package.json: ${msg}`,
        file: pkgJson,
      });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    if (!isRecord(parsed)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file must contain a JSON object: ${filePath}`,
      });
      return null;
    }
    return validateFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Keep the fields with the expected type; report and drop the rest.
 */
export function validateFileConfig(
  raw: Record<string, unknown>,
  source: string,
  warnings: Warning[] = [],
): FileConfig {
  const config: FileConfig = {};
  const reject = (key: string, expected: string): void => {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring "${key}" in ${source}: expected ${expected}`,
      file: source,
    });
  };

  for (const key of ["input", "output", "title"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "string") config[key] = value;
    else reject(key, "a string");
  }

  for (const key of ["extensions", "ignoreDirs", "ignoreFiles", "ignore"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (isStringArray(value)) config[key] = value;
    else reject(key, "an array of strings");
  }

  for (const key of ["gitignore", "followSymlinks"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "boolean") config[key] = value;
    else reject(key, "a boolean");
  }

  return config;
}

/**
 * Parse CLI args using mri. Repeatable options also accept comma-separated extensions.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help", "version", "gitignore", "follow-symlinks"],
    string: ["title", "extensions", "ignore-dir", "ignore-file", "ignore", "config"],
  });

  return {
    positionals: args._.map(String),
    title: stringOption(args.title),
    extensions: listOption(args.extensions).flatMap((e) => e.split(",")).filter(Boolean),
    ignoreDirs: listOption(args["ignore-dir"]),
    ignoreFiles: listOption(args["ignore-file"]),
    ignorePatterns: listOption(args.ignore),
    gitignore: args.gitignore === true,
    followSymlinks: args["follow-symlinks"] === true,
    config: stringOption(args.config),
    dryRun: args["dry-run"] === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
    version: args.version === true,
  };
}

function stringOption(value: unknown): string | undefined {
  if (Array.isArray(value)) return stringOption(value[value.length - 1]);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function listOption(value: unknown): string[] {
  if (value === undefined) return [];
  const values: unknown[] = Array.isArray(value) ? value : [value];
  return values.filter((v): v is string => typeof v === "string" && v !== "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}
