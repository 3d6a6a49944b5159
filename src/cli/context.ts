/**
 * Shared CLI plumbing: global options, config and event logger resolution,
 * and failure reporting.
 */

import { resolve } from "node:path";
import { InvalidArgumentError, type Command } from "commander";
import { CabinetConfigError, loadCabinetConfig, resolveEventsDir } from "../config/loader.js";
import { EventLogger } from "../events/logger.js";
import type { CabinetConfig } from "../schemas/config.js";
import { TaxonomyError } from "../taxonomy/loader.js";

export interface GlobalOptions {
  root: string;
  config?: string;
}

export interface CliContext {
  root: string;
  config: CabinetConfig;
  logger?: EventLogger;
}

/**
 * Resolve root, config and logger. `rootOverride` replaces the global
 * `--root`, and cabinet.yaml is then looked up under it.
 */
export async function loadContext(program: Command, rootOverride?: string): Promise<CliContext> {
  const opts = program.opts<GlobalOptions>();
  const root = resolve(rootOverride ?? opts.root);
  const config = await loadCabinetConfig(root, opts.config);
  const logger = config.events.enabled ? new EventLogger(resolveEventsDir(config)) : undefined;
  return { root, config, logger };
}

/** Print `Failed to <action>: <message>` and mark the process as failed. */
export function reportFailure(action: string, error: unknown): void {
  let message: string;
  if (error instanceof TaxonomyError || error instanceof CabinetConfigError) {
    message = error.format();
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }
  console.error(`Failed to ${action}: ${message}`);
  process.exitCode = 1;
}

/** Warn on stderr about audit events the command could not write. */
export function warnAuditFailures(failures: readonly string[]): void {
  if (failures.length === 0) return;
  console.error(`⚠ Audit log not written (${failures.length} events):`);
  for (const failure of failures) {
    console.error(`  ${failure}`);
  }
}

/** Commander argument parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
