/**
 * Path derivation for taxonomy categories.
 *
 * A category's path depends only on its ancestor chain, never on the order
 * siblings are processed in.
 */

import { join, resolve } from "node:path";
import type { Category } from "../schemas/taxonomy.js";

/** Characters NTFS rejects in a file or directory name, plus control characters. */
const INVALID_SEGMENT_CHARS = /[<>:"/\\|?*\u0000-\u001F]/;

/** DOS device names, reserved with or without an extension. */
const RESERVED_DEVICE_NAME = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

export type SegmentCheck = { valid: true } | { valid: false; reason: string };

/**
 * Check whether a name can be used as a single path segment on the
 * cabinet's filesystem.
 */
export function checkSegment(name: string): SegmentCheck {
  if (name.length === 0) {
    return { valid: false, reason: "name is empty" };
  }
  if (name === "." || name === "..") {
    return { valid: false, reason: `"${name}" is a relative path marker` };
  }
  const invalid = INVALID_SEGMENT_CHARS.exec(name);
  if (invalid) {
    const shown = invalid[0].charCodeAt(0) < 0x20
      ? `control character 0x${invalid[0].charCodeAt(0).toString(16).padStart(2, "0")}`
      : `"${invalid[0]}"`;
    return { valid: false, reason: `name contains ${shown}` };
  }
  if (/[. ]$/.test(name)) {
    return { valid: false, reason: "name ends with a dot or space" };
  }
  if (RESERVED_DEVICE_NAME.test(name)) {
    return { valid: false, reason: `"${name}" is a reserved device name` };
  }
  return { valid: true };
}

/** Resolve a root to an absolute path without a trailing separator. */
export function resolveRoot(root: string): string {
  return resolve(root);
}

/** A category flattened out of its tree. */
export interface FlatCategory {
  /** Names from the top-level category down to this one. */
  segments: string[];
  /** Segments joined with the platform separator, relative to the root. */
  relativePath: string;
}

/**
 * Flatten a taxonomy into one entry per category, parents before children,
 * in declaration order.
 */
export function flattenTaxonomy(categories: readonly Category[]): FlatCategory[] {
  const flat: FlatCategory[] = [];

  const visit = (nodes: readonly Category[], ancestors: string[]): void => {
    for (const node of nodes) {
      const segments = [...ancestors, node.name];
      flat.push({ segments, relativePath: join(...segments) });
      visit(node.children, segments);
    }
  };

  visit(categories, []);
  return flat;
}

/** Number of categories (directories) a taxonomy declares. */
export function countCategories(categories: readonly Category[]): number {
  return flattenTaxonomy(categories).length;
}
