/**
 * Media transcoder invoker.
 *
 * Validates the request, expands the preset's argument template and hands
 * the command to a ProcessRunner. Transcoding itself is the external tool's
 * business; only its exit code is interpreted.
 */

import { stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { EventLogger } from "../events/logger.js";
import type { TranscodePreset } from "../schemas/config.js";
import { checkSegment } from "../scaffold/paths.js";
import { buildArguments } from "./presets.js";
import { spawnRunner, type OutputLineHandler, type ProcessRunner } from "./runner.js";

export class TranscodeError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = "TranscodeError";
  }
}

export interface TranscodeRequest {
  input: string;
  /** Destination directory; must exist. */
  dest: string;
  /** Output base name, without extension. */
  name: string;
}

export interface TranscodeOptions {
  preset: TranscodePreset;
  runner?: ProcessRunner;
  onLine?: OutputLineHandler;
  logger?: EventLogger;
}

export interface TranscodeResult {
  command: string;
  args: string[];
  output: string;
  exitCode: number;
}

export async function transcode(request: TranscodeRequest, options: TranscodeOptions): Promise<TranscodeResult> {
  const { preset, runner = spawnRunner, onLine, logger } = options;
  const input = resolve(request.input);
  const dest = resolve(request.dest);

  if (!(await isKind(input, "file"))) {
    throw new TranscodeError(`Input file not found: ${input}`);
  }
  if (!(await isKind(dest, "directory"))) {
    throw new TranscodeError(`Destination directory not found: ${dest}`);
  }
  const nameCheck = checkSegment(request.name);
  if (!nameCheck.valid) {
    throw new TranscodeError(`Invalid output name "${request.name}": ${nameCheck.reason}`);
  }

  const output = join(dest, `${request.name}${preset.extension}`);
  const args = buildArguments(preset, input, output);

  await logger?.tryLog("transcode.started", "transcoder", {
    payload: { command: preset.executable, input, output },
  });

  let exitCode: number;
  try {
    exitCode = await runner.run(preset.executable, args, onLine);
  } catch (error) {
    const message = (error as Error).message;
    await logger?.tryLog("transcode.failed", "transcoder", { payload: { input, output, error: message } });
    throw new TranscodeError(message);
  }

  if (exitCode !== 0) {
    await logger?.tryLog("transcode.failed", "transcoder", { payload: { input, output, exitCode } });
    throw new TranscodeError(`${preset.executable} exited with code ${exitCode}`, exitCode);
  }

  await logger?.tryLog("transcode.completed", "transcoder", { payload: { input, output } });
  return { command: preset.executable, args, output, exitCode };
}

async function isKind(path: string, kind: "file" | "directory"): Promise<boolean> {
  try {
    const info = await stat(path);
    return kind === "file" ? info.isFile() : info.isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
}
