/**
 * Transcode command — run a media conversion preset on one file, or on every
 * matching file of a folder.
 */

import { stdin as input, stdout as output } from "node:process";
import * as readline from "node:readline/promises";
import type { Command } from "commander";
import { transcodeFolder } from "../../transcode/batch.js";
import { TranscodeError, transcode, type TranscodeRequest } from "../../transcode/invoker.js";
import { presetNames, resolvePreset } from "../../transcode/presets.js";
import { loadContext, reportFailure, warnAuditFailures } from "../context.js";

interface TranscodeCommandOptions {
  input?: string;
  dest?: string;
  name?: string;
  folder?: string;
}

const PROMPTS: Record<keyof TranscodeRequest, string> = {
  input: "Input file: ",
  dest: "Destination directory: ",
  name: "Output name (without extension): ",
};

/**
 * Fill in missing request fields, asking on the terminal when there is one.
 */
export async function completeRequest(
  opts: TranscodeCommandOptions,
  ask: ((question: string) => Promise<string>) | undefined,
): Promise<TranscodeRequest> {
  const request: TranscodeRequest = { input: "", dest: "", name: "" };
  for (const key of ["input", "dest", "name"] as const) {
    let value = opts[key]?.trim() ?? "";
    if (value === "" && ask) {
      value = (await ask(PROMPTS[key])).trim();
    }
    if (value === "") {
      throw new TranscodeError(`Missing --${key}`);
    }
    request[key] = value;
  }
  return request;
}

export function registerTranscodeCommands(program: Command): void {
  program
    .command("transcode <preset>")
    .description("Convert a media file with an external tool (presets: video, xiso)")
    .option("--input <file>", "Source file")
    .option("--dest <dir>", "Destination directory")
    .option("--name <name>", "Output file name, without extension")
    .option("--folder <dir>", "Convert every matching file of a folder (output to --dest, default: the folder)")
    .action(async (presetName: string, opts: TranscodeCommandOptions) => {
      const rl = input.isTTY && opts.folder === undefined ? readline.createInterface({ input, output }) : undefined;
      try {
        const ctx = await loadContext(program);
        const preset = resolvePreset(presetName, ctx.config.transcode.presets);
        if (!preset) {
          throw new TranscodeError(
            `Unknown preset "${presetName}" (available: ${presetNames(ctx.config.transcode.presets).join(", ")})`,
          );
        }

        if (opts.folder !== undefined) {
          if (opts.input !== undefined || opts.name !== undefined) {
            throw new TranscodeError("--input and --name cannot be combined with --folder");
          }
          const batch = await transcodeFolder(opts.folder, {
            preset,
            dest: opts.dest,
            logger: ctx.logger,
            onFile: (file) => console.log(`→ ${file}`),
            onLine: (line) => console.log(line),
          });
          warnAuditFailures(ctx.logger?.failures ?? []);

          for (const skip of batch.skipped) {
            console.log(`  - ${skip.input} (${skip.reason})`);
          }
          for (const failure of batch.failed) {
            console.log(`  ✗ ${failure.input}: ${failure.error}`);
          }
          console.log(
            `Converted ${batch.converted.length}, skipped ${batch.skipped.length}, failed ${batch.failed.length}`,
          );
          if (batch.failed.length > 0) process.exitCode = 1;
          return;
        }

        const request = await completeRequest(opts, rl ? (question) => rl.question(question) : undefined);

        const result = await transcode(request, {
          preset,
          logger: ctx.logger,
          onLine: (line) => console.log(line),
        });
        warnAuditFailures(ctx.logger?.failures ?? []);
        console.log(`✅ Wrote ${result.output}`);
      } catch (error) {
        reportFailure("transcode", error);
      } finally {
        rl?.close();
      }
    });
}
