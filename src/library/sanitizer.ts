/**
 * Filename sanitizer — strips characters the launch scripts choke on.
 *
 * Walks the tree explicitly in post-order: a directory's contents are
 * renamed before the directory itself, so pending paths never go stale.
 * Only names change; file contents are never opened.
 */

import { readdir, rename, stat } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { EventLogger } from "../events/logger.js";

/** Upper bound on replacement passes over a single name. */
const MAX_PASSES = 16;

export interface SanitizeOptions {
  /** Disallowed substring → replacement. */
  replacements: Readonly<Record<string, string>>;
  dryRun?: boolean;
  logger?: EventLogger;
}

export interface SanitizeRename {
  from: string;
  to: string;
}

export interface SanitizeConflict {
  path: string;
  reason: string;
}

export interface SanitizeResult {
  root: string;
  renames: SanitizeRename[];
  conflicts: SanitizeConflict[];
  dryRun: boolean;
}

interface TreeNode {
  name: string;
  path: string;
  children: TreeNode[];
}

/**
 * Apply the replacements until the name stops changing. The result is a
 * fixed point, so sanitizing it again is a no-op.
 */
export function sanitizeName(name: string, replacements: Readonly<Record<string, string>>): string {
  let current = name;
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    let next = current;
    for (const [from, to] of Object.entries(replacements)) {
      next = next.split(from).join(to);
    }
    if (next === current) break;
    current = next;
  }
  return current;
}

async function readTree(dir: string): Promise<TreeNode[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const nodes: TreeNode[] = [];
  for (const entry of entries) {
    const path = join(dir, entry.name);
    nodes.push({
      name: entry.name,
      path,
      children: entry.isDirectory() ? await readTree(path) : [],
    });
  }
  return nodes;
}

/** Children first, then the node itself. */
function postOrder(nodes: readonly TreeNode[]): TreeNode[] {
  const ordered: TreeNode[] = [];
  const visit = (node: TreeNode): void => {
    for (const child of node.children) visit(child);
    ordered.push(node);
  };
  for (const node of nodes) visit(node);
  return ordered;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
}

/**
 * Sanitize every file and directory name below `root` (the root itself is
 * left alone).
 */
export async function sanitizeTree(root: string, options: SanitizeOptions): Promise<SanitizeResult> {
  const { replacements, dryRun = false, logger } = options;
  const result: SanitizeResult = { root, renames: [], conflicts: [], dryRun };

  const rootStats = await stat(root);
  if (!rootStats.isDirectory()) {
    throw new Error(`${root} is not a directory`);
  }

  // Targets claimed earlier in this run, so a dry run reports the same
  // collisions a real run would hit.
  const claimed = new Set<string>();

  for (const node of postOrder(await readTree(root))) {
    const cleaned = sanitizeName(node.name, replacements);
    if (cleaned === node.name) continue;

    if (cleaned.length === 0) {
      result.conflicts.push({ path: node.path, reason: "sanitized name would be empty" });
      continue;
    }

    const target = join(dirname(node.path), cleaned);
    if (claimed.has(target) || (await pathExists(target))) {
      result.conflicts.push({ path: node.path, reason: `${cleaned} already exists` });
      continue;
    }

    if (!dryRun) {
      try {
        await rename(node.path, target);
      } catch (error) {
        result.conflicts.push({ path: node.path, reason: (error as Error).message });
        continue;
      }
    }

    claimed.add(target);
    result.renames.push({ from: node.path, to: target });
  }

  await logger?.tryLog("sanitize.completed", "sanitizer", {
    payload: { root, renamed: result.renames.length, conflicts: result.conflicts.length, dryRun },
  });

  return result;
}
