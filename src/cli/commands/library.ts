/**
 * Library maintenance commands — sanitize, launchers, relocate,
 * placeholders, list, describe.
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Command } from "commander";
import { writeDescriptions } from "../../library/descriptions.js";
import { writeLauncherConfig } from "../../library/launchers.js";
import { listDirectory } from "../../library/lister.js";
import { parseNameList } from "../../library/names.js";
import { generatePlaceholders } from "../../library/placeholders.js";
import { relocateApplications } from "../../library/relocate.js";
import { sanitizeTree } from "../../library/sanitizer.js";
import { loadContext, reportFailure, warnAuditFailures } from "../context.js";

export function registerLibraryCommands(program: Command): void {
  // --- sanitize ---
  program
    .command("sanitize <dir>")
    .description("Strip disallowed characters from every file and folder name below a directory")
    .option("--dry-run", "Report renames without applying them", false)
    .option("--json", "Print the result as JSON", false)
    .action(async (dir: string, opts: { dryRun: boolean; json: boolean }) => {
      try {
        const ctx = await loadContext(program);
        const result = await sanitizeTree(resolve(dir), {
          replacements: ctx.config.sanitize.replacements,
          dryRun: opts.dryRun,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
          return;
        }

        const verb = result.dryRun ? "Would rename" : "Renamed";
        for (const rename of result.renames) {
          console.log(`  ${rename.from} → ${rename.to}`);
        }
        for (const conflict of result.conflicts) {
          console.log(`  ! ${conflict.path} (${conflict.reason})`);
        }
        console.log(`${verb} ${result.renames.length}, skipped ${result.conflicts.length}`);
      } catch (error) {
        reportFailure("sanitize", error);
      }
    });

  // --- launchers ---
  program
    .command("launchers <scriptsDir>")
    .description("Generate a PCLauncher INI from a folder of launch scripts")
    .option("--output <file>", "INI file to write (default: <scriptsDir>/PC Games.ini)")
    .option("--names <file>", "Game names, one per line (default: every launch script)")
    .option("--exit-method <method>", "ExitMethod written for each game")
    .action(async (scriptsDir: string, opts: { output?: string; names?: string; exitMethod?: string }) => {
      try {
        const ctx = await loadContext(program);
        const names = opts.names !== undefined ? parseNameList(await readFile(opts.names, "utf-8")) : undefined;

        const result = await writeLauncherConfig(scriptsDir, {
          output: opts.output ?? join(scriptsDir, "PC Games.ini"),
          exitMethod: opts.exitMethod ?? ctx.config.launchers.exitMethod,
          extensions: ctx.config.launchers.extensions,
          names,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);

        console.log(`✅ Wrote ${result.records.length} launcher records to ${result.output}`);
        for (const name of result.missingScripts) {
          console.log(`  ⚠ no launch script found for "${name}"`);
        }
      } catch (error) {
        reportFailure("write launchers", error);
      }
    });

  // --- relocate ---
  program
    .command("relocate <iniFile> <newRoot>")
    .description("Move absolute Application= paths of a launcher INI under a new games root")
    .option("--dry-run", "Show the changes without writing the file", false)
    .action(async (iniFile: string, newRoot: string, opts: { dryRun: boolean }) => {
      try {
        const ctx = await loadContext(program);
        const result = await relocateApplications(resolve(iniFile), newRoot, {
          dryRun: opts.dryRun,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);

        for (const change of result.changes) {
          console.log(`  ${change.from} → ${change.to}`);
        }
        const verb = result.dryRun ? "Would update" : "Updated";
        console.log(`${verb} ${result.changes.length} Application paths in ${result.file}`);
      } catch (error) {
        reportFailure("relocate launchers", error);
      }
    });

  // --- placeholders ---
  program
    .command("placeholders [dir]")
    .description("Create a placeholder launcher for every game folder")
    .option("--output-dir <name>", "Subfolder that receives the placeholders")
    .option("--ext <ext>", "Placeholder file extension")
    .action(async (dir: string | undefined, opts: { outputDir?: string; ext?: string }) => {
      try {
        const ctx = await loadContext(program);
        const result = await generatePlaceholders(dir !== undefined ? resolve(dir) : ctx.root, {
          outputDir: opts.outputDir ?? ctx.config.placeholders.outputDir,
          extension: opts.ext ?? ctx.config.placeholders.extension,
          content: ctx.config.placeholders.content,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);
        console.log(
          `✅ ${result.created.length} placeholders created, ${result.skipped.length} already present in ${result.outputPath}`,
        );
      } catch (error) {
        reportFailure("create placeholders", error);
      }
    });

  // --- list ---
  program
    .command("list [dir]")
    .description("Write a text listing of a folder's entries")
    .option("--output <name>", "Listing file name, written inside the folder")
    .action(async (dir: string | undefined, opts: { output?: string }) => {
      try {
        const ctx = await loadContext(program);
        const result = await listDirectory(dir !== undefined ? resolve(dir) : ctx.root, {
          fileName: opts.output ?? ctx.config.listing.fileName,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);
        console.log(`✅ Listed ${result.entries.length} entries in ${result.outputPath}`);
      } catch (error) {
        reportFailure("list directory", error);
      }
    });

  // --- describe ---
  program
    .command("describe [dir]")
    .description("Write a description file inside every game folder")
    .option("--force", "Overwrite existing description files", false)
    .action(async (dir: string | undefined, opts: { force: boolean }) => {
      try {
        const ctx = await loadContext(program);
        const result = await writeDescriptions(dir !== undefined ? resolve(dir) : ctx.root, {
          fileName: ctx.config.descriptions.fileName,
          template: ctx.config.descriptions.template,
          force: opts.force,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);
        console.log(`✅ ${result.written.length} descriptions written, ${result.skipped.length} kept`);
      } catch (error) {
        reportFailure("write descriptions", error);
      }
    });
}
