/**
 * TeknoParrot profiles — reading `UserProfiles/*.xml` and writing one `.bat`
 * launcher per profile for the front-end to start.
 *
 * A launcher looks like:
 *
 *   @echo off
 *   REM TeknoParrot launcher for profile: Initial D 8
 *   start "" "TeknoParrotUi.exe" --profile="D:\TeknoParrot\UserProfiles\ID8.xml"
 *   exit
 *
 * When the executable is an absolute Windows path the script first changes
 * into its folder and starts it by file name.
 */

import { mkdir, readFile, readdir } from "node:fs/promises";
import { basename, extname, join, resolve, win32 } from "node:path";
import * as cheerio from "cheerio";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { checkSegment } from "../scaffold/paths.js";
import { EOL, compareNames } from "./names.js";

export interface TeknoParrotProfile {
  /** Absolute path of the profile XML. */
  path: string;
  /** `GameNameInternal`, or the file stem when the profile has none. */
  name: string;
  gamePath?: string;
}

export interface ProfileLauncherOptions {
  /** TeknoParrotUi executable, bare name or absolute Windows path. */
  executable: string;
  startMinimized: boolean;
  /** Appended verbatim to the start line. */
  extraArgs: string;
}

export interface ProfileLaunchersOptions extends ProfileLauncherOptions {
  outputDir: string;
  logger?: EventLogger;
}

export interface ProfileLauncherSkip {
  profile: string;
  reason: string;
}

export interface ProfileLaunchersResult {
  outputDir: string;
  written: string[];
  skipped: ProfileLauncherSkip[];
}

const UNSAFE_CHARS = /[<>:"/\\|?*\u0000-\u001F]/g;

/** Profile XML files directly inside `dir`, sorted. */
export async function listProfileFiles(dir: string): Promise<string[]> {
  const entries = await readdir(resolve(dir), { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.toLowerCase().endsWith(".xml"))
    .map((e) => e.name)
    .sort(compareNames);
}

/** Text of the first element named `tag` (any case, any namespace prefix). */
function elementText($: cheerio.CheerioAPI, tag: string): string | undefined {
  const wanted = tag.toLowerCase();
  const elements = $.root().find("*").toArray();
  const match =
    elements.find((el) => el.tagName.toLowerCase() === wanted) ??
    elements.find((el) => el.tagName.toLowerCase().endsWith(wanted));
  const text = match ? $(match).text().trim() : "";
  return text === "" ? undefined : text;
}

export function parseProfile(xml: string, path: string): TeknoParrotProfile {
  const $ = cheerio.load(xml, { xml: true });
  const stem = basename(path, extname(path));
  return {
    path,
    name: elementText($, "GameNameInternal") ?? stem,
    gamePath: elementText($, "GamePath"),
  };
}

export async function readProfiles(dir: string): Promise<TeknoParrotProfile[]> {
  const profilesDir = resolve(dir);
  const profiles: TeknoParrotProfile[] = [];
  for (const file of await listProfileFiles(profilesDir)) {
    const path = join(profilesDir, file);
    profiles.push(parseProfile(await readFile(path, "utf-8"), path));
  }
  return profiles;
}

/** Launcher file name (without `.bat`) for a profile. */
export function profileLauncherName(profile: TeknoParrotProfile): string {
  const cleaned = profile.name.replace(UNSAFE_CHARS, "_").trim();
  return cleaned !== "" ? cleaned : basename(profile.path, extname(profile.path));
}

export function renderProfileLauncher(profile: TeknoParrotProfile, options: ProfileLauncherOptions): string {
  const executable = options.executable.trim() || "TeknoParrotUi.exe";
  const absolute = win32.isAbsolute(executable);

  const start = [
    'start ""',
    `"${absolute ? win32.basename(executable) : executable}"`,
    options.startMinimized ? "--startMinimized" : "",
    `--profile="${profile.path}"`,
    options.extraArgs.trim(),
  ].filter((part) => part !== "");

  const lines = [
    "@echo off",
    `REM TeknoParrot launcher for profile: ${profile.name}`,
    ...(absolute ? [`cd /d "${win32.dirname(executable)}"`] : []),
    start.join(" "),
    "exit",
  ];
  return lines.map((line) => line + EOL).join("");
}

/**
 * Write a `.bat` launcher for every profile in `profilesDir`. Existing
 * launchers are overwritten; a profile whose launcher name collides with an
 * earlier one is skipped.
 */
export async function writeProfileLaunchers(
  profilesDir: string,
  options: ProfileLaunchersOptions,
): Promise<ProfileLaunchersResult> {
  const outputDir = resolve(options.outputDir);
  const profiles = await readProfiles(profilesDir);

  await mkdir(outputDir, { recursive: true });

  const result: ProfileLaunchersResult = { outputDir, written: [], skipped: [] };
  const taken = new Set<string>();
  for (const profile of profiles) {
    const name = profileLauncherName(profile);
    const check = checkSegment(name);
    if (!check.valid) {
      result.skipped.push({ profile: profile.path, reason: check.reason });
      continue;
    }
    const fileName = `${name}.bat`;
    if (taken.has(fileName.toLowerCase())) {
      result.skipped.push({ profile: profile.path, reason: `launcher name "${fileName}" is already used` });
      continue;
    }
    taken.add(fileName.toLowerCase());

    await writeFileAtomic(join(outputDir, fileName), renderProfileLauncher(profile, options));
    result.written.push(fileName);
  }

  await options.logger?.tryLog("profiles.launchers.written", "profiles", {
    payload: { outputDir, written: result.written.length, skipped: result.skipped.length },
  });

  return result;
}
