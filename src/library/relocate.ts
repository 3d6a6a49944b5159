/**
 * Launcher relocation — moves the absolute `Application=` paths of a
 * PCLauncher INI under a new games root, and re-letters the `GamePath` of
 * TeknoParrot profiles when the games drive changes.
 *
 * `G:\PC\Brawlout\Brawlout.exe` relocated to `E:\Games` becomes
 * `E:\Games\Brawlout\Brawlout.exe`: the drive and the first folder are
 * replaced. Relative values (`..\..\Games\x.exe`) are left as they are, as
 * is every other line.
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { listProfileFiles } from "./profiles.js";

export interface RelocateChange {
  from: string;
  to: string;
}

export interface RelocateResult {
  file: string;
  changes: RelocateChange[];
  dryRun: boolean;
}

export interface GamePathChange extends RelocateChange {
  file: string;
}

export interface GamePathRelocateResult {
  dir: string;
  /** Upper-case drive letter, e.g. "E". */
  drive: string;
  changes: GamePathChange[];
  /** Profiles without an absolute GamePath, or already on the drive. */
  unchanged: string[];
  dryRun: boolean;
}

const APPLICATION_KEY = /^\s*application\s*=/i;
const DRIVE_PATH = /^[A-Za-z]:/;
const GAME_PATH = /<GamePath>([^<]*)<\/GamePath>/;

/** Relocate a single `Application=` value; `null` when it is not absolute. */
export function relocatePath(value: string, newRoot: string): string | null {
  const trimmed = value.trim();
  const first = trimmed.charAt(0);
  const quoted = trimmed.length > 1 && (first === '"' || first === "'") && trimmed.endsWith(first);
  const content = quoted ? trimmed.slice(1, -1) : trimmed;

  if (!DRIVE_PATH.test(content)) {
    return null;
  }

  const parts = content.replace(/\//g, "\\").split("\\");
  const rest = parts.length >= 3 ? parts.slice(2) : parts.slice(1);
  const base = newRoot.replace(/\//g, "\\").replace(/\\+$/, "");
  const relocated = [base, ...rest].join("\\");

  return quoted ? `${first}${relocated}${first}` : relocated;
}

/** Rewrite INI text, preserving every untouched line byte for byte. */
export function relocateIniText(text: string, newRoot: string): { text: string; changes: RelocateChange[] } {
  const changes: RelocateChange[] = [];
  const lines = text.split(/(?<=\n)/);

  const rewritten = lines.map((line) => {
    if (!APPLICATION_KEY.test(line)) return line;

    const eol = line.endsWith("\r\n") ? "\r\n" : line.endsWith("\n") ? "\n" : "";
    const body = line.slice(0, line.length - eol.length);
    const eq = body.indexOf("=");
    const rawValue = body.slice(eq + 1);
    const prefix = body.slice(0, eq + 1 + rawValue.length - rawValue.trimStart().length);
    const value = rawValue.trim();

    const relocated = relocatePath(value, newRoot);
    if (relocated === null) return line;

    changes.push({ from: value, to: relocated });
    return `${prefix}${relocated}${eol}`;
  });

  return { text: rewritten.join(""), changes };
}

export async function relocateApplications(
  iniPath: string,
  newRoot: string,
  options: { dryRun?: boolean; logger?: EventLogger } = {},
): Promise<RelocateResult> {
  const { dryRun = false, logger } = options;
  const original = await readFile(iniPath, "utf-8");
  const { text, changes } = relocateIniText(original, newRoot);

  if (!dryRun && changes.length > 0) {
    await writeFileAtomic(iniPath, text);
  }

  await logger?.tryLog("launchers.relocated", "relocator", {
    payload: { file: iniPath, newRoot, changed: changes.length, dryRun },
  });

  return { file: iniPath, changes, dryRun };
}

/**
 * Upper-case drive letter from "E", "e:" or "E:\".
 *
 * @throws Error on anything else
 */
export function parseDriveLetter(drive: string): string {
  const match = /^([A-Za-z])(?::[\\/]?)?$/.exec(drive.trim());
  if (!match) {
    throw new Error(`Invalid drive "${drive}": expected a letter such as E or E:`);
  }
  return match[1].toUpperCase();
}

/**
 * Swap the drive letter of a profile's `<GamePath>`, leaving every other byte
 * alone. `null` when the profile has no drive path or is already on `drive`.
 */
export function relocateGamePathText(xml: string, drive: string): { text: string; change: RelocateChange } | null {
  const match = GAME_PATH.exec(xml);
  if (!match) return null;

  const value = match[1];
  if (value.length <= 2 || value[1] !== ":" || value[0] === drive) {
    return null;
  }

  const relocated = drive + value.slice(1);
  const start = match.index + "<GamePath>".length;
  return {
    text: xml.slice(0, start) + relocated + xml.slice(start + value.length),
    change: { from: value, to: relocated },
  };
}

export async function relocateGamePaths(
  profilesDir: string,
  drive: string,
  options: { dryRun?: boolean; logger?: EventLogger } = {},
): Promise<GamePathRelocateResult> {
  const { dryRun = false, logger } = options;
  const letter = parseDriveLetter(drive);
  const dir = resolve(profilesDir);

  const result: GamePathRelocateResult = { dir, drive: letter, changes: [], unchanged: [], dryRun };
  for (const file of await listProfileFiles(dir)) {
    const path = join(dir, file);
    const relocated = relocateGamePathText(await readFile(path, "utf-8"), letter);
    if (!relocated) {
      result.unchanged.push(file);
      continue;
    }
    if (!dryRun) {
      await writeFileAtomic(path, relocated.text);
    }
    result.changes.push({ file, ...relocated.change });
  }

  await logger?.tryLog("profiles.relocated", "relocator", {
    payload: { dir, drive: letter, changed: result.changes.length, dryRun },
  });

  return result;
}
