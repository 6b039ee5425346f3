import { describe, it, expect, afterEach } from "vitest";
import { join } from "node:path";
import { decodeText, readContent } from "../src/content-reader.js";
import { FileReadError } from "../src/types.js";
import { cleanupFixture, setupFixture } from "./fixture-utils.js";

let root = "";

afterEach(() => {
  if (root) cleanupFixture(root);
  root = "";
});

describe("decodeText", () => {
  it("replaces invalid bytes and normalizes line endings", () => {
    const bytes = new Uint8Array([0x68, 0x69, 0xff, 0x0d, 0x0a, 0x6f, 0x6b]);
    expect(decodeText(bytes)).toBe("hi�\nok");
  });

  it("turns lone carriage returns into newlines", () => {
    expect(decodeText(new TextEncoder().encode("a\rb\r\rc"))).toBe("a\nb\n\nc");
  });

  it("drops a leading byte order mark", () => {
    expect(decodeText(new Uint8Array([0xef, 0xbb, 0xbf, 0x78]))).toBe("x");
  });
});

describe("readContent", () => {
  it("reads the whole file", () => {
    root = setupFixture({ "a.py": "line 1\r\nline 2\n" });
    expect(readContent(join(root, "a.py"))).toBe("line 1\nline 2\n");
  });

  it("decodes undecodable files instead of failing", () => {
    root = setupFixture({ "blob.py": new Uint8Array([0x78, 0xc3, 0x28]) });
    expect(readContent(join(root, "blob.py"))).toBe("x�(");
  });

  it("wraps filesystem failures in FileReadError", () => {
    root = setupFixture({});
    const target = join(root, "gone.py");
    expect(() => readContent(target)).toThrow(FileReadError);
    expect(() => readContent(target)).toThrow(`Cannot read file: ${target}`);
  });
});
