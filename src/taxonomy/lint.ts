/**
 * Taxonomy linter.
 *
 * Rules:
 * - duplicate-sibling (error): two siblings whose names collide on a
 *   case-insensitive filesystem
 * - invalid-name (warning): a name that is not a usable path segment; the
 *   scaffolder reports it as NameInvalid and skips that subtree
 */

import type { Category } from "../schemas/taxonomy.js";
import { checkSegment } from "../scaffold/paths.js";

export type TaxonomyIssueSeverity = "error" | "warning";

export interface TaxonomyIssue {
  severity: TaxonomyIssueSeverity;
  rule: "duplicate-sibling" | "invalid-name";
  /** Slash-joined location inside the taxonomy. */
  path: string;
  message: string;
}

export function lintTaxonomy(categories: readonly Category[]): TaxonomyIssue[] {
  const issues: TaxonomyIssue[] = [];

  const visit = (nodes: readonly Category[], parent: string): void => {
    const seen = new Map<string, string>();

    for (const node of nodes) {
      const path = parent ? `${parent}/${node.name}` : node.name;
      const key = node.name.toLowerCase();

      const previous = seen.get(key);
      if (previous !== undefined) {
        issues.push({
          severity: "error",
          rule: "duplicate-sibling",
          path,
          message: `"${node.name}" collides with sibling "${previous}"`,
        });
      } else {
        seen.set(key, node.name);
      }

      const check = checkSegment(node.name);
      if (!check.valid) {
        issues.push({
          severity: "warning",
          rule: "invalid-name",
          path,
          message: `${check.reason}; this category and its children will be skipped`,
        });
        continue;
      }

      visit(node.children, path);
    }
  };

  visit(categories, "");
  return issues;
}

export function hasLintErrors(issues: readonly TaxonomyIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}
