// src/content-reader.ts — Whole-file reads with lossy UTF-8 decoding

import { readFileSync } from "node:fs";
import { FileReadError } from "./types.js";

// Non-fatal decoder: invalid byte sequences become U+FFFD instead of throwing
const decoder = new TextDecoder("utf-8");

/**
 * Read a file fully and return its text with line endings normalized to `\n`.
 * Bad bytes never fail the read; filesystem errors surface as FileReadError.
 */
export function readContent(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (err: unknown) {
    throw new FileReadError(filePath, err instanceof Error ? err : undefined);
  }
  return decodeText(bytes);
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes).replace(/\r\n?/g, "\n");
}
