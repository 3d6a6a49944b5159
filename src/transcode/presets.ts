/**
 * Transcoder presets.
 *
 * A preset is an executable plus a fixed argument template in which
 * `{input}` and `{output}` are substituted. Config entries with the same
 * name replace a built-in preset; new names add presets.
 */

import type { TranscodePreset } from "../schemas/config.js";

export const BUILTIN_PRESETS: Readonly<Record<string, TranscodePreset>> = {
  video: {
    executable: "ffmpeg",
    args: [
      "-y",
      "-i", "{input}",
      "-map", "0:v:0",
      "-map", "0:a?",
      "-c:v", "libx264",
      "-profile:v", "high",
      "-level", "4.1",
      "-pix_fmt", "yuv420p",
      "-preset", "slow",
      "-crf", "18",
      "-c:a", "aac",
      "-b:a", "128k",
      "-ar", "48000",
      "-ac", "2",
      "-movflags", "+faststart",
      "{output}",
    ],
    extension: ".mp4",
    inputs: [".mp4", ".mkv", ".mov", ".avi", ".webm", ".m4v"],
  },
  xiso: {
    executable: "xdvdfs",
    args: ["pack", "{input}", "{output}"],
    extension: ".xiso.iso",
    inputs: [".iso"],
  },
};

export function presetNames(overrides: Record<string, TranscodePreset> = {}): string[] {
  return [...new Set([...Object.keys(BUILTIN_PRESETS), ...Object.keys(overrides)])].sort();
}

/** Look up a preset; `undefined` when neither config nor built-ins know it. */
export function resolvePreset(
  name: string,
  overrides: Record<string, TranscodePreset> = {},
): TranscodePreset | undefined {
  if (Object.hasOwn(overrides, name)) return overrides[name];
  if (Object.hasOwn(BUILTIN_PRESETS, name)) return BUILTIN_PRESETS[name];
  return undefined;
}

export function buildArguments(preset: TranscodePreset, input: string, output: string): string[] {
  return preset.args.map((arg) => arg.split("{input}").join(input).split("{output}").join(output));
}
