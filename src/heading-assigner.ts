// src/heading-assigner.ts — Pre-order pass setting headingText and anchor on every node

import { relative } from "node:path";
import type { TreeNode } from "./types.js";
import { AnchorRegistry } from "./anchor-registry.js";
import { toPosix } from "./path-filter.js";

/**
 * Label and anchor every node below the root. Parents register before their
 * descendants and siblings register in stored order; anchor suffixes depend on it.
 */
export function assignHeadings(
  root: TreeNode,
  rootPath: string,
  registry: AnchorRegistry = new AnchorRegistry(),
): AnchorRegistry {
  visit(root, rootPath, registry);
  return registry;
}

function visit(node: TreeNode, rootPath: string, registry: AnchorRegistry): void {
  if (node.depth > 0) {
    const rel = toPosix(relative(rootPath, node.path));
    node.headingText = node.isDirectory ? `${rel}/` : rel;
    node.anchor = registry.register(node.headingText);
  }
  for (const child of node.children) {
    visit(child, rootPath, registry);
  }
}
