// src/language-hints.ts — Extension → fenced-code language table
// The table lives in data/language-hints.json, one level above both src/ and dist/.

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";

const HINTS_FILE = fileURLToPath(new URL("../data/language-hints.json", import.meta.url));

function loadLanguageHints(): ReadonlyMap<string, string> {
  const parsed: unknown = JSON.parse(readFileSync(HINTS_FILE, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Malformed language table: ${HINTS_FILE}`);
  }
  const hints = new Map<string, string>();
  for (const [ext, language] of Object.entries(parsed)) {
    if (typeof language === "string") hints.set(ext.toLowerCase(), language);
  }
  return hints;
}

export const LANGUAGE_HINTS = loadLanguageHints();

/** Every extension with a known language is included by default. */
export const DEFAULT_SOURCE_EXTENSIONS: readonly string[] = [...LANGUAGE_HINTS.keys()];

/**
 * Language tag for a fenced block. Empty string for unknown extensions.
 */
export function languageFor(filePath: string): string {
  return LANGUAGE_HINTS.get(extname(filePath).toLowerCase()) ?? "";
}
