/**
 * Cabinet config loader.
 *
 * Resolution: explicit --config path, else <root>/cabinet.yaml when present,
 * else built-in defaults. The file is validated against the CabinetConfig
 * schema; unknown keys are ignored, missing keys take their defaults.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { CabinetConfig } from "../schemas/config.js";

export const CONFIG_FILE_NAME = "cabinet.yaml";

export class CabinetConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
    this.name = "CabinetConfigError";
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/** Validate raw config data, applying defaults. */
export function parseCabinetConfig(raw: unknown, source = "config"): CabinetConfig {
  const result = CabinetConfig.safeParse(raw ?? {});
  if (!result.success) {
    throw new CabinetConfigError(
      `Invalid cabinet configuration in ${source}`,
      result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    );
  }
  return result.data;
}

/**
 * Load the cabinet config.
 *
 * @param root - Cabinet root, searched for cabinet.yaml
 * @param configPath - Explicit config file; must exist if given
 */
export async function loadCabinetConfig(root: string, configPath?: string): Promise<CabinetConfig> {
  const path = configPath ? resolve(configPath) : join(resolve(root), CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if ((code === "ENOENT" || code === "ENOTDIR") && !configPath) {
      return parseCabinetConfig({}, "defaults");
    }
    throw new CabinetConfigError(`Cannot read config ${path}: ${(error as Error).message}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content) as unknown;
  } catch (error) {
    throw new CabinetConfigError(`Config ${path} is not valid YAML: ${(error as Error).message}`);
  }

  return parseCabinetConfig(raw, path);
}

/** Expand a leading `~` to the user's home directory. */
export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/** Default cabinet root: CABINET_ROOT, else the working directory. */
export function defaultRoot(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env["CABINET_ROOT"];
  return fromEnv !== undefined && fromEnv !== "" ? fromEnv : process.cwd();
}

/** Events directory: CABINET_EVENTS_DIR wins over the config value. */
export function resolveEventsDir(config: CabinetConfig, env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env["CABINET_EVENTS_DIR"];
  return resolve(expandHome(fromEnv !== undefined && fromEnv !== "" ? fromEnv : config.events.dir));
}
