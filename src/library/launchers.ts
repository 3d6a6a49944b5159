/**
 * Launcher config writer — RocketLauncher PCLauncher INI generation.
 *
 * One record per game:
 *
 *   [Game Name]
 *   Application=<scripts dir>\Game Name.bat
 *   ExitMethod=WinClose
 *
 * Records are separated by a blank line. The output file is regenerated in
 * full on every run.
 */

import { readdir } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import type { EventLogger } from "../events/logger.js";
import { EOL, compareNames } from "./names.js";

export interface LauncherRecord {
  name: string;
  application: string;
  exitMethod: string;
}

export interface LauncherOptions {
  /** INI file to (re)write. */
  output: string;
  exitMethod: string;
  /** Launch script extensions, in priority order. */
  extensions: readonly string[];
  /** Explicit game names; defaults to every launch script found. */
  names?: readonly string[];
  logger?: EventLogger;
}

export interface LauncherWriteResult {
  output: string;
  records: LauncherRecord[];
  /** Names given explicitly that had no matching script. */
  missingScripts: string[];
}

/**
 * Launch scripts in a directory, keyed by lower-cased base name. When a game
 * has several scripts the extension listed first wins.
 */
export async function collectLaunchScripts(
  sourceDir: string,
  extensions: readonly string[],
): Promise<Map<string, string>> {
  const priority = extensions.map((ext) => ext.toLowerCase());
  const entries = await readdir(sourceDir, { withFileTypes: true });
  const scripts = new Map<string, string>();

  const files = entries
    .filter((e) => e.isFile() && priority.includes(extname(e.name).toLowerCase()))
    .map((e) => e.name)
    .sort((a, b) => priority.indexOf(extname(a).toLowerCase()) - priority.indexOf(extname(b).toLowerCase()));

  for (const file of files) {
    const key = file.slice(0, file.length - extname(file).length).toLowerCase();
    if (!scripts.has(key)) {
      scripts.set(key, file);
    }
  }
  return scripts;
}

export function renderLauncherRecords(records: readonly LauncherRecord[]): string {
  if (records.length === 0) return "";
  const blocks = records.map((record) =>
    [`[${record.name}]`, `Application=${record.application}`, `ExitMethod=${record.exitMethod}`].join(EOL),
  );
  return blocks.join(EOL + EOL) + EOL;
}

export async function writeLauncherConfig(
  sourceDir: string,
  options: LauncherOptions,
): Promise<LauncherWriteResult> {
  const dir = resolve(sourceDir);
  const scripts = await collectLaunchScripts(dir, options.extensions);
  const missingScripts: string[] = [];

  let names: string[];
  if (options.names) {
    names = [...options.names];
  } else {
    names = [...scripts.values()].map((file) => file.slice(0, file.length - extname(file).length));
  }
  names.sort(compareNames);

  const fallbackExtension = options.extensions[0] ?? ".bat";
  const records = names.map((name): LauncherRecord => {
    let file = scripts.get(name.toLowerCase());
    if (file === undefined) {
      missingScripts.push(name);
      file = `${name}${fallbackExtension}`;
    }
    return { name, application: join(dir, file), exitMethod: options.exitMethod };
  });

  const output = resolve(options.output);
  await writeFileAtomic(output, renderLauncherRecords(records));

  await options.logger?.tryLog("launchers.written", "launchers", {
    payload: { output, records: records.length, missingScripts: missingScripts.length },
  });

  return { output, records, missingScripts };
}
