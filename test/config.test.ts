import { describe, it, expect, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { parseCliArgs, resolveConfig, toAggregateOptions, validateFileConfig } from "../src/config.js";
import type { ParsedArgs } from "../src/config.js";
import type { Warning } from "../src/types.js";
import { cleanupFixture, setupFixture } from "./fixture-utils.js";

let cwd = "";

afterEach(() => {
  if (cwd) cleanupFixture(cwd);
  cwd = "";
});

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    positionals: [],
    extensions: [],
    ignoreDirs: [],
    ignoreFiles: [],
    ignorePatterns: [],
    gitignore: false,
    followSymlinks: false,
    dryRun: false,
    quiet: false,
    verbose: false,
    help: false,
    version: false,
    ...overrides,
  };
}

describe("parseCliArgs", () => {
  it("reads positionals and flags", async () => {
    const parsed = await parseCliArgs([
      "src",
      "out.md",
      "--title",
      "My Project",
      "--extensions",
      "py,ts",
      "--extensions",
      "rs",
      "--ignore-dir",
      "vendor",
      "--ignore",
      "*.gen.ts",
      "--gitignore",
      "--follow-symlinks",
      "--dry-run",
      "-q",
    ]);
    expect(parsed).toEqual({
      positionals: ["src", "out.md"],
      title: "My Project",
      extensions: ["py", "ts", "rs"],
      ignoreDirs: ["vendor"],
      ignoreFiles: [],
      ignorePatterns: ["*.gen.ts"],
      gitignore: true,
      followSymlinks: true,
      config: undefined,
      dryRun: true,
      quiet: true,
      verbose: false,
      help: false,
      version: false,
    });
  });

  it("defaults everything when no args are given", async () => {
    expect(await parseCliArgs([])).toEqual(args({ title: undefined, config: undefined }));
  });

  it("accepts short aliases", async () => {
    const parsed = await parseCliArgs(["-c", "custom.json", "-v", "-h"]);
    expect(parsed.config).toBe("custom.json");
    expect(parsed.verbose).toBe(true);
    expect(parsed.help).toBe(true);
  });
});

describe("resolveConfig", () => {
  it("uses defaults without a config file", () => {
    cwd = setupFixture({});
    const warnings: Warning[] = [];
    const config = resolveConfig(args(), warnings, cwd);
    expect(config).toEqual({
      inputDir: cwd,
      outputFile: undefined,
      title: undefined,
      extensions: [],
      ignoredDirs: [],
      ignoredFiles: [],
      ignorePatterns: [],
      useGitignore: false,
      followSymlinks: false,
      dryRun: false,
      verbose: false,
      quiet: false,
    });
    expect(warnings).toEqual([]);
  });

  it("resolves positionals against the working directory", () => {
    cwd = setupFixture({});
    const config = resolveConfig(args({ positionals: ["src", "docs/out.md"] }), [], cwd);
    expect(config.inputDir).toBe(join(cwd, "src"));
    expect(config.outputFile).toBe(join(cwd, "docs", "out.md"));
  });

  it("warns about extra positionals", () => {
    cwd = setupFixture({});
    const warnings: Warning[] = [];
    resolveConfig(args({ positionals: ["a", "b", "c", "d"] }), warnings, cwd);
    expect(warnings.map((w) => w.message)).toEqual(["Ignoring extra arguments: c d"]);
  });

  it("warns when the output positional looks like a stray extension", () => {
    cwd = setupFixture({});
    const warnings: Warning[] = [];
    const config = resolveConfig(args({ positionals: ["src", "ts"], extensions: ["py"] }), warnings, cwd);
    expect(config.outputFile).toBe(join(cwd, "ts"));
    expect(warnings).toEqual([
      {
        level: "warn",
        module: "config",
        message: 'Output file "ts" looks like an extension; list extensions as --extensions py,ts',
      },
    ]);
  });

  it("accepts ordinary output names alongside extensions", () => {
    cwd = setupFixture({});
    const warnings: Warning[] = [];
    resolveConfig(args({ positionals: ["src", "docs/src.md"], extensions: ["py"] }), warnings, cwd);
    resolveConfig(args({ positionals: ["src", "ts"] }), warnings, cwd);
    expect(warnings).toEqual([]);
  });

  it("layers CLI values over the config file", () => {
    cwd = setupFixture({
      "source-archive.config.json": JSON.stringify({
        input: "lib",
        output: "lib.md",
        title: "From File",
        extensions: ["go"],
        ignoreDirs: ["fixtures"],
        ignore: ["*.pb.go"],
        gitignore: true,
      }),
    });
    const fromFile = resolveConfig(args(), [], cwd);
    expect(fromFile.inputDir).toBe(join(cwd, "lib"));
    expect(fromFile.outputFile).toBe(join(cwd, "lib.md"));
    expect(fromFile.title).toBe("From File");
    expect(fromFile.extensions).toEqual(["go"]);
    expect(fromFile.useGitignore).toBe(true);

    const merged = resolveConfig(
      args({ positionals: ["app"], title: "From CLI", extensions: ["py"], ignoreDirs: ["tmp"], ignorePatterns: ["*.log"] }),
      [],
      cwd,
    );
    expect(merged.inputDir).toBe(join(cwd, "app"));
    expect(merged.outputFile).toBe(join(cwd, "lib.md"));
    expect(merged.title).toBe("From CLI");
    expect(merged.extensions).toEqual(["py"]);
    expect(merged.ignoredDirs).toEqual(["fixtures", "tmp"]);
    expect(merged.ignorePatterns).toEqual(["*.pb.go", "*.log"]);
  });

  it("reads the sourceArchive key from package.json", () => {
    cwd = setupFixture({
      "package.json": JSON.stringify({ name: "demo", sourceArchive: { title: "Pkg Title", followSymlinks: true } }),
    });
    const config = resolveConfig(args(), [], cwd);
    expect(config.title).toBe("Pkg Title");
    expect(config.followSymlinks).toBe(true);
  });

  it("prefers the dedicated config file over package.json", () => {
    cwd = setupFixture({
      "package.json": JSON.stringify({ sourceArchive: { title: "Pkg" } }),
      "source-archive.config.json": JSON.stringify({ title: "Dedicated" }),
    });
    expect(resolveConfig(args(), [], cwd).title).toBe("Dedicated");
  });

  it("loads an explicit config path", () => {
    cwd = setupFixture({ "conf/archive.json": JSON.stringify({ ignoreFiles: ["LICENSE.md"] }) });
    const config = resolveConfig(args({ config: "conf/archive.json", ignoreFiles: ["CHANGELOG.md"] }), [], cwd);
    expect(config.ignoredFiles).toEqual(["LICENSE.md", "CHANGELOG.md"]);
  });

  it("warns and falls back to defaults for missing or malformed files", () => {
    cwd = setupFixture({ "broken.json": "{ not json", "list.json": "[1, 2]" });
    const warnings: Warning[] = [];
    expect(resolveConfig(args({ config: "nope.json" }), warnings, cwd).title).toBeUndefined();
    resolveConfig(args({ config: "list.json" }), warnings, cwd);
    resolveConfig(args({ config: "broken.json" }), warnings, cwd);
    expect(warnings).toHaveLength(3);
    expect(warnings[0].message).toBe("Config file not found: nope.json");
    expect(warnings[1].message).toBe(`Config file must contain a JSON object: ${join(cwd, "list.json")}`);
    expect(warnings[2].message.startsWith(`Failed to parse config file ${join(cwd, "broken.json")}: `)).toBe(true);
  });

  it("reports an unreadable package.json and continues", () => {
    cwd = setupFixture({ "package.json": "{" });
    const warnings: Warning[] = [];
    expect(resolveConfig(args(), warnings, cwd).inputDir).toBe(cwd);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].level).toBe("info");
  });
});

describe("validateFileConfig", () => {
  it("drops fields of the wrong type with a warning", () => {
    const warnings: Warning[] = [];
    const config = validateFileConfig(
      { title: 42, extensions: ["py", 3], gitignore: "yes", ignoreDirs: ["x"], unknown: true },
      "cfg.json",
      warnings,
    );
    expect(config).toEqual({ ignoreDirs: ["x"] });
    expect(warnings.map((w) => w.message)).toEqual([
      'Ignoring "title" in cfg.json: expected a string',
      'Ignoring "extensions" in cfg.json: expected an array of strings',
      'Ignoring "gitignore" in cfg.json: expected a boolean',
    ]);
  });
});

describe("toAggregateOptions", () => {
  it("carries the pipeline fields only", () => {
    cwd = setupFixture({});
    const options = toAggregateOptions(resolveConfig(args({ dryRun: true, verbose: true }), [], cwd));
    expect(options).toEqual({
      inputDir: cwd,
      outputFile: undefined,
      title: undefined,
      extensions: [],
      ignoredDirs: [],
      ignoredFiles: [],
      ignorePatterns: [],
      useGitignore: false,
      followSymlinks: false,
      verbose: true,
    });
  });
});
