/**
 * TeknoParrot profile commands — launchers, relocate.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { writeProfileLaunchers } from "../../library/profiles.js";
import { relocateGamePaths } from "../../library/relocate.js";
import { loadContext, reportFailure, warnAuditFailures } from "../context.js";

interface LaunchersCommandOptions {
  output: string;
  executable?: string;
  minimized?: boolean;
  args?: string;
}

export function registerProfileCommands(program: Command): void {
  const profiles = program
    .command("profiles")
    .description("Maintain TeknoParrot UserProfiles");

  profiles
    .command("launchers <profilesDir>")
    .description("Write one .bat launcher per profile")
    .requiredOption("--output <dir>", "Folder that receives the launchers")
    .option("--executable <exe>", "TeknoParrotUi executable, bare name or absolute path")
    .option("--minimized", "Start TeknoParrot minimized")
    .option("--args <args>", "Extra arguments appended to every start line")
    .action(async (profilesDir: string, opts: LaunchersCommandOptions) => {
      try {
        const ctx = await loadContext(program);
        const settings = ctx.config.teknoparrot;
        const result = await writeProfileLaunchers(resolve(profilesDir), {
          outputDir: resolve(opts.output),
          executable: opts.executable ?? settings.executable,
          startMinimized: opts.minimized ?? settings.startMinimized,
          extraArgs: opts.args ?? settings.extraArgs,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);

        for (const skip of result.skipped) {
          console.log(`  ⚠ ${skip.profile}: ${skip.reason}`);
        }
        console.log(`✅ Wrote ${result.written.length} launchers to ${result.outputDir}`);
      } catch (error) {
        reportFailure("write profile launchers", error);
      }
    });

  profiles
    .command("relocate <profilesDir> <drive>")
    .description("Move every profile's GamePath to another drive letter")
    .option("--dry-run", "Show the changes without writing the profiles", false)
    .action(async (profilesDir: string, drive: string, opts: { dryRun: boolean }) => {
      try {
        const ctx = await loadContext(program);
        const result = await relocateGamePaths(resolve(profilesDir), drive, {
          dryRun: opts.dryRun,
          logger: ctx.logger,
        });
        warnAuditFailures(ctx.logger?.failures ?? []);

        for (const change of result.changes) {
          console.log(`  ${change.file}: ${change.from} → ${change.to}`);
        }
        const verb = result.dryRun ? "Would update" : "Updated";
        console.log(`${verb} ${result.changes.length} profiles to drive ${result.drive}:, ${result.unchanged.length} unchanged`);
      } catch (error) {
        reportFailure("relocate profiles", error);
      }
    });
}
