import type { Category, TaxonomyDocument } from "../schemas/taxonomy.js";
import { countCategories } from "../scaffold/paths.js";

/** Indented tree view of a taxonomy, two spaces per level. */
export function renderTaxonomyTree(doc: TaxonomyDocument): string {
  const lines = [`${doc.name} (${countCategories(doc.categories)} categories)`];
  if (doc.description) {
    lines.push(`  ${doc.description}`);
  }
  lines.push("");

  const visit = (nodes: readonly Category[], depth: number): void => {
    for (const node of nodes) {
      lines.push(`${"  ".repeat(depth + 1)}${node.name}`);
      visit(node.children, depth + 1);
    }
  };
  visit(doc.categories, 0);

  return lines.join("\n");
}
