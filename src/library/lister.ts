/**
 * Directory lister — flat text listing of a folder's immediate entries.
 */

import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { EOL, compareNames, sameName } from "./names.js";

export interface ListingOptions {
  /** Listing file name, written inside the listed directory. */
  fileName: string;
  logger?: EventLogger;
}

export interface ListingResult {
  outputPath: string;
  entries: string[];
}

/** Write the names of every entry except the listing file itself. */
export async function listDirectory(dir: string, options: ListingOptions): Promise<ListingResult> {
  const workDir = resolve(dir);
  const outputPath = join(workDir, options.fileName);

  const entries = (await readdir(workDir))
    .filter((name) => !sameName(name, options.fileName))
    .sort(compareNames);

  await writeFileAtomic(outputPath, entries.map((name) => name + EOL).join(""));

  await options.logger?.tryLog("listing.written", "lister", {
    payload: { outputPath, entries: entries.length },
  });

  return { outputPath, entries };
}
