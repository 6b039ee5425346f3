import { describe, it, expect, afterEach, vi } from "vitest";
import { dirname, join, relative } from "node:path";
import { runCheck } from "../src/bin/check.js";
import { aggregateDirectory } from "../src/pipeline.js";
import { cleanupFixture, setupFixture } from "./fixture-utils.js";

let root = "";

afterEach(() => {
  vi.restoreAllMocks();
  if (root) cleanupFixture(root);
  root = "";
});

function captureStderr(): string[] {
  const lines: string[] = [];
  vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk));
    return true;
  });
  return lines;
}

describe("runCheck", () => {
  it("flags a missing archive", () => {
    root = setupFixture({ "main.py": "" });
    const outputFile = join(dirname(root), "archive.md");
    const lines = captureStderr();
    expect(runCheck({ inputDir: root, outputFile })).toBe(true);
    expect(lines).toEqual([
      `  No archive found at ${relative(process.cwd(), outputFile)}\n`,
      "  Run `npx source-archive` with the same arguments to regenerate.\n",
    ]);
  });

  it("stays silent for a fresh archive in quiet mode", () => {
    root = setupFixture({ "main.py": "" });
    const outputFile = join(dirname(root), "archive.md");
    aggregateDirectory({ inputDir: root, outputFile });
    const lines = captureStderr();
    expect(runCheck({ inputDir: root, outputFile }, [], { quiet: true })).toBe(false);
    expect(lines).toEqual([]);
  });
});
