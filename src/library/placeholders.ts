/**
 * Placeholder generator — one dummy launcher per game folder.
 *
 * For every immediate subdirectory of the working directory (except the
 * output folder itself) a placeholder named after it is written into the
 * output folder. Does not recurse. Existing placeholders are kept.
 */

import { mkdir, readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { compareNames, sameName } from "./names.js";

export interface PlaceholderOptions {
  /** Output subfolder name, relative to the working directory. */
  outputDir: string;
  extension: string;
  content: string;
  logger?: EventLogger;
}

export interface PlaceholderResult {
  outputPath: string;
  created: string[];
  skipped: string[];
}

export async function generatePlaceholders(dir: string, options: PlaceholderOptions): Promise<PlaceholderResult> {
  const workDir = resolve(dir);
  const outputPath = join(workDir, options.outputDir);

  const entries = await readdir(workDir, { withFileTypes: true });
  const folders = entries
    .filter((e) => e.isDirectory() && !sameName(e.name, options.outputDir))
    .map((e) => e.name)
    .sort(compareNames);

  await mkdir(outputPath, { recursive: true });

  const result: PlaceholderResult = { outputPath, created: [], skipped: [] };
  for (const folder of folders) {
    const fileName = `${folder}${options.extension}`;
    const target = join(outputPath, fileName);
    if (await exists(target)) {
      result.skipped.push(fileName);
      continue;
    }
    await writeFileAtomic(target, options.content);
    result.created.push(fileName);
  }

  await options.logger?.tryLog("placeholders.written", "placeholders", {
    payload: { outputPath, created: result.created.length, skipped: result.skipped.length },
  });

  return result;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
}
