/**
 * Folder conversion — runs a preset over every matching file of a folder,
 * one at a time.
 *
 * Candidates are the files whose extension is one of the preset's `inputs`.
 * The output keeps the source name with the preset's extension in place of
 * the source extension. A file is skipped when it already carries the
 * output extension (e.g. `Halo.xiso.iso`), when its output already exists,
 * or when the output would overwrite it. A failed conversion is recorded
 * and the batch moves on.
 */

import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { EventLogger } from "../events/logger.js";
import { compareNames } from "../library/names.js";
import type { TranscodePreset } from "../schemas/config.js";
import { TranscodeError, transcode } from "./invoker.js";
import type { OutputLineHandler, ProcessRunner } from "./runner.js";

export interface BatchTranscodeOptions {
  preset: TranscodePreset;
  /** Destination directory (default: the source folder). */
  dest?: string;
  runner?: ProcessRunner;
  onLine?: OutputLineHandler;
  /** Called before each conversion starts. */
  onFile?: (input: string, output: string) => void;
  logger?: EventLogger;
}

export interface BatchConverted {
  input: string;
  output: string;
}

export interface BatchSkipped {
  input: string;
  reason: string;
}

export interface BatchFailed {
  input: string;
  error: string;
}

export interface BatchTranscodeResult {
  folder: string;
  dest: string;
  converted: BatchConverted[];
  skipped: BatchSkipped[];
  failed: BatchFailed[];
}

/**
 * @throws TranscodeError if a folder is missing or the preset lists no inputs
 */
export async function transcodeFolder(folder: string, options: BatchTranscodeOptions): Promise<BatchTranscodeResult> {
  const { preset, runner, onLine, onFile, logger } = options;
  const source = resolve(folder);
  const dest = resolve(options.dest ?? folder);

  if (!(await isDirectory(source))) {
    throw new TranscodeError(`Input folder not found: ${source}`);
  }
  if (!(await isDirectory(dest))) {
    throw new TranscodeError(`Destination directory not found: ${dest}`);
  }
  if (preset.inputs.length === 0) {
    throw new TranscodeError(`Preset ${preset.executable} lists no input extensions for folder conversion`);
  }

  const inputs = preset.inputs.map((ext) => ext.toLowerCase());
  const outputExt = preset.extension.toLowerCase();
  // ".xiso.iso" marks an earlier output; ".mp4" on its own does not.
  const outputIsMarker = !inputs.includes(outputExt);

  const entries = await readdir(source, { withFileTypes: true });
  const files = entries
    .filter((e) => e.isFile())
    .map((e) => e.name)
    .sort(compareNames);

  const result: BatchTranscodeResult = { folder: source, dest, converted: [], skipped: [], failed: [] };
  for (const file of files) {
    const lower = file.toLowerCase();
    const ext = inputs.find((candidate) => lower.endsWith(candidate));
    if (ext === undefined) continue;

    const input = join(source, file);
    if (outputIsMarker && lower.endsWith(outputExt)) {
      result.skipped.push({ input, reason: "already converted" });
      continue;
    }

    const name = file.slice(0, file.length - ext.length);
    const output = join(dest, `${name}${preset.extension}`);
    if (output === input) {
      result.skipped.push({ input, reason: "output would overwrite the input" });
      continue;
    }
    if (await exists(output)) {
      result.skipped.push({ input, reason: "output already exists" });
      continue;
    }

    onFile?.(input, output);
    try {
      const done = await transcode({ input, dest, name }, { preset, runner, onLine, logger });
      result.converted.push({ input, output: done.output });
    } catch (error) {
      result.failed.push({ input, error: (error as Error).message });
    }
  }

  await logger?.tryLog("transcode.batch.completed", "transcoder", {
    payload: {
      folder: source,
      dest,
      converted: result.converted.length,
      skipped: result.skipped.length,
      failed: result.failed.length,
    },
  });

  return result;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
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
