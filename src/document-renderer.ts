// src/document-renderer.ts — Tree → markdown lines
// Two traversals over one tree: the table of contents, then the body. Both are pre-order
// over the same stored child order, so bullets and headings correspond one to one.

import { relative } from "node:path";
import type { TreeNode } from "./types.js";
import { BACK_LINK, MAX_HEADING_LEVEL, TOC_ANCHOR, TOP_ANCHOR } from "./types.js";
import { languageFor } from "./language-hints.js";
import { readContent } from "./content-reader.js";
import { toPosix } from "./path-filter.js";

export interface RenderOptions {
  rootPath: string;
  title: string;
  /** Injected for tests; defaults to a lossy UTF-8 read from disk. */
  readContent?: (filePath: string) => string;
}

/**
 * Render the whole document as lines (no trailing newlines on individual lines).
 */
export function renderDocument(root: TreeNode, options: RenderOptions): string[] {
  const read = options.readContent ?? readContent;
  const lines: string[] = [];

  lines.push(`# ${options.title}`);
  lines.push(anchorMarker(TOP_ANCHOR));
  lines.push("");

  const toc = buildTableOfContents(root);
  if (toc.length > 0) {
    lines.push("## Table of Contents");
    lines.push(anchorMarker(TOC_ANCHOR));
    lines.push("");
    lines.push(...toc);
    lines.push("");
  }

  for (const child of root.children) {
    renderNode(child, options.rootPath, read, lines);
  }

  return lines;
}

/**
 * One bullet per headed node, indented two spaces per level below the first.
 */
export function buildTableOfContents(node: TreeNode): string[] {
  const lines: string[] = [];
  for (const child of node.children) {
    if (child.anchor !== undefined && child.headingText !== undefined) {
      const indent = "  ".repeat(Math.max(child.depth - 1, 0));
      lines.push(`${indent}- [${child.headingText}](#${child.anchor})`);
    }
    if (child.isDirectory) {
      lines.push(...buildTableOfContents(child));
    }
  }
  return lines;
}

export function headingLevel(depth: number): number {
  return Math.min(depth + 1, MAX_HEADING_LEVEL);
}

/**
 * Shortest backtick fence that no line of `content` can close early.
 */
export function fenceFor(content: string): string {
  let longest = 0;
  for (const match of content.matchAll(/^ {0,3}(`{3,})/gm)) {
    longest = Math.max(longest, match[1].length);
  }
  return "`".repeat(longest >= 3 ? longest + 1 : 3);
}

function renderNode(
  node: TreeNode,
  rootPath: string,
  read: (filePath: string) => string,
  lines: string[],
): void {
  if (node.headingText !== undefined) {
    lines.push(`${"#".repeat(headingLevel(node.depth))} ${node.headingText}`);
    if (node.anchor !== undefined) lines.push(anchorMarker(node.anchor));
  }
  lines.push("");

  if (node.isDirectory) {
    for (const child of node.children) {
      renderNode(child, rootPath, read, lines);
    }
    return;
  }

  const rel = toPosix(relative(rootPath, node.path));
  const content = stripTrailingNewlines(read(node.path));

  if (node.isMarkdown) {
    lines.push(`<!-- Begin ${rel} -->`);
    if (content) lines.push(content);
    lines.push(`<!-- End ${rel} -->`);
  } else {
    const fence = fenceFor(content);
    lines.push(`${fence}${languageFor(node.path)}`);
    lines.push(content);
    lines.push(fence);
  }
  lines.push(BACK_LINK);
  lines.push("");
}

function anchorMarker(id: string): string {
  return `<a id="${id}"></a>`;
}

function stripTrailingNewlines(text: string): string {
  return text.replace(/\n+$/, "");
}
