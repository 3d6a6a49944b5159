/**
 * Taxonomy commands — list, show, lint.
 */

import type { Command } from "commander";
import { hasLintErrors, lintTaxonomy } from "../../taxonomy/lint.js";
import { BUILTIN_TAXONOMIES, loadTaxonomy, readTaxonomyDocument } from "../../taxonomy/loader.js";
import { renderTaxonomyTree } from "../../taxonomy/render.js";
import { countCategories } from "../../scaffold/paths.js";
import { reportFailure } from "../context.js";

export function registerTaxonomyCommands(program: Command): void {
  const taxonomy = program
    .command("taxonomy")
    .description("Inspect folder taxonomies");

  taxonomy
    .command("list")
    .description("List built-in taxonomies")
    .action(async () => {
      try {
        for (const name of BUILTIN_TAXONOMIES) {
          const doc = await loadTaxonomy(name);
          const description = doc.description ? `  ${doc.description}` : "";
          console.log(`${name} (${countCategories(doc.categories)} categories)${description}`);
        }
      } catch (error) {
        reportFailure("list taxonomies", error);
      }
    });

  taxonomy
    .command("show <name|file>")
    .description("Print a taxonomy as an indented tree")
    .action(async (ref: string) => {
      try {
        console.log(renderTaxonomyTree(await loadTaxonomy(ref)));
      } catch (error) {
        reportFailure("show taxonomy", error);
      }
    });

  taxonomy
    .command("lint <name|file>")
    .description("Check a taxonomy for colliding siblings and invalid folder names")
    .action(async (ref: string) => {
      try {
        const doc = await readTaxonomyDocument(ref);

        const issues = lintTaxonomy(doc.categories);
        if (issues.length === 0) {
          console.log(`✅ ${doc.name}: no issues`);
          return;
        }

        for (const issue of issues) {
          const icon = issue.severity === "error" ? "✗" : "⚠";
          console.log(`  ${icon} ${issue.path}: ${issue.message}`);
        }
        if (hasLintErrors(issues)) process.exitCode = 1;
      } catch (error) {
        reportFailure("lint taxonomy", error);
      }
    });
}
