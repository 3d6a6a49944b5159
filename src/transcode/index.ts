export { BUILTIN_PRESETS, presetNames, resolvePreset, buildArguments } from "./presets.js";
export { spawnRunner } from "./runner.js";
export type { ProcessRunner, OutputLineHandler } from "./runner.js";
export { transcode, TranscodeError } from "./invoker.js";
export type { TranscodeRequest, TranscodeOptions, TranscodeResult } from "./invoker.js";
export { transcodeFolder } from "./batch.js";
export type {
  BatchTranscodeOptions,
  BatchTranscodeResult,
  BatchConverted,
  BatchSkipped,
  BatchFailed,
} from "./batch.js";
