/**
 * Description writer — a text file inside every game folder, filled from a
 * template where `{name}` stands for the folder name.
 */

import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { compareNames } from "./names.js";

export interface DescriptionOptions {
  fileName: string;
  template: string;
  /** Overwrite descriptions that already exist. */
  force?: boolean;
  logger?: EventLogger;
}

export interface DescriptionResult {
  written: string[];
  skipped: string[];
}

export function renderDescription(template: string, name: string): string {
  return template.split("{name}").join(name);
}

export async function writeDescriptions(dir: string, options: DescriptionOptions): Promise<DescriptionResult> {
  const workDir = resolve(dir);
  const entries = await readdir(workDir, { withFileTypes: true });
  const folders = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort(compareNames);

  const result: DescriptionResult = { written: [], skipped: [] };
  for (const folder of folders) {
    const target = join(workDir, folder, options.fileName);
    if (!options.force && (await isFile(target))) {
      result.skipped.push(folder);
      continue;
    }
    await writeFileAtomic(target, renderDescription(options.template, folder));
    result.written.push(folder);
  }

  await options.logger?.tryLog("descriptions.written", "descriptions", {
    payload: { dir: workDir, written: result.written.length, skipped: result.skipped.length },
  });

  return result;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
}
