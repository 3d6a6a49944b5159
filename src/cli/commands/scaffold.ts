/**
 * Scaffold command — build the cabinet folder tree.
 */

import type { Command } from "commander";
import type { CabinetConfig } from "../../schemas/config.js";
import type { Category } from "../../schemas/taxonomy.js";
import { formatRunSummary } from "../../scaffold/formatter.js";
import { scaffold } from "../../scaffold/scaffolder.js";
import { BUILTIN_TAXONOMIES, isBuiltinTaxonomy, loadTaxonomy } from "../../taxonomy/loader.js";
import { collect, loadContext, parsePositiveInt, reportFailure } from "../context.js";

interface ScaffoldCommandOptions {
  taxonomy: string[];
  dryRun: boolean;
  json: boolean;
  reverse: boolean;
  concurrency?: number;
}

/**
 * Combine taxonomy references into one category list. Built-in taxonomies
 * are nested under their configured root subfolder; custom files are
 * scaffolded directly under the root.
 */
export async function resolveTaxonomies(refs: readonly string[], config: CabinetConfig): Promise<Category[]> {
  const combined: Category[] = [];
  for (const ref of new Set(refs)) {
    const doc = await loadTaxonomy(ref);
    if (isBuiltinTaxonomy(ref)) {
      const folder = Object.hasOwn(config.scaffold.taxonomies, ref) ? config.scaffold.taxonomies[ref] : ref;
      combined.push({ name: folder, children: doc.categories });
    } else {
      combined.push(...doc.categories);
    }
  }
  return combined;
}

export function registerScaffoldCommands(program: Command): void {
  program
    .command("scaffold [root]")
    .description("Create the cabinet folder tree (missing folders only)")
    .option("-t, --taxonomy <name|file>", "Taxonomy to scaffold (repeatable; default: roms, emulators)", collect, [])
    .option("--dry-run", "Report what would be created without touching the disk", false)
    .option("--json", "Print the run summary as JSON", false)
    .option("--reverse", "Process siblings in reverse declaration order", false)
    .option("--concurrency <n>", "Top-level folders processed at once", parsePositiveInt)
    .action(async (rootArg: string | undefined, opts: ScaffoldCommandOptions) => {
      try {
        const ctx = await loadContext(program, rootArg);
        const refs = opts.taxonomy.length > 0 ? opts.taxonomy : [...BUILTIN_TAXONOMIES];
        const taxonomy = await resolveTaxonomies(refs, ctx.config);

        const summary = await scaffold(ctx.root, taxonomy, {
          order: opts.reverse ? "reverse" : "declared",
          concurrency: opts.concurrency ?? ctx.config.scaffold.concurrency,
          dryRun: opts.dryRun,
          logger: ctx.logger,
        });

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          console.log(formatRunSummary(summary));
        }
      } catch (error) {
        reportFailure("scaffold", error);
      }
    });
}
