/**
 * Tree scaffolder — materializes a taxonomy as nested directories.
 *
 * Missing directories are created, existing ones are left untouched along
 * with their contents. Nothing is ever deleted, renamed or written to.
 * Safe to re-run: a second identical run creates nothing.
 */

import { access, mkdir, stat, constants } from "node:fs/promises";
import type { Stats } from "node:fs";
import { dirname, join } from "node:path";
import type { Category } from "../schemas/taxonomy.js";
import type { EventLogger } from "../events/logger.js";
import { hasLintErrors, lintTaxonomy } from "../taxonomy/lint.js";
import { TaxonomyError } from "../taxonomy/loader.js";
import { RootUnwritableError } from "./errors.js";
import { checkSegment, resolveRoot } from "./paths.js";
import { runPool } from "./pool.js";

export type CreationResult = "created" | "existing";

export type ConflictKind = "path-conflict" | "name-invalid" | "create-failed";

export interface ScaffoldEntry {
  path: string;
  relativePath: string;
  result: CreationResult;
}

export interface ScaffoldConflict {
  path: string;
  relativePath: string;
  kind: ConflictKind;
  reason: string;
}

export interface RunSummary {
  /** Resolved absolute root. */
  root: string;
  createdCount: number;
  existingCount: number;
  /**
   * Per-directory outcomes, parents before children, in processing order.
   * The root itself comes first, with relative path ".".
   */
  entries: ScaffoldEntry[];
  conflicts: ScaffoldConflict[];
  dryRun: boolean;
  /** True if the signal fired before every top-level subtree ran. */
  aborted: boolean;
  /** Audit events that could not be written. Never affects the outcome. */
  auditFailures: string[];
}

export interface ScaffoldOptions {
  /** Sibling processing order. Has no effect on the resulting tree. */
  order?: "declared" | "reverse";
  /** Top-level subtrees processed at once, a positive integer (default: 1). */
  concurrency?: number;
  /** Checked between top-level subtrees. */
  signal?: AbortSignal;
  /** Report what would be created without creating it. */
  dryRun?: boolean;
  logger?: EventLogger;
}

interface SubtreeReport {
  entries: ScaffoldEntry[];
  conflicts: ScaffoldConflict[];
}

type EnsureOutcome =
  | { status: CreationResult }
  | { status: "conflict"; kind: Exclude<ConflictKind, "name-invalid">; reason: string };

/**
 * Scaffold a taxonomy under a root directory.
 *
 * @throws RangeError if `concurrency` is not a positive integer
 * @throws TaxonomyError if the taxonomy declares colliding siblings
 * @throws RootUnwritableError if the root (or its parent) cannot be written
 */
export async function scaffold(
  root: string,
  taxonomy: readonly Category[],
  options: ScaffoldOptions = {},
): Promise<RunSummary> {
  const { order = "declared", concurrency = 1, signal, dryRun = false, logger } = options;
  const resolvedRoot = resolveRoot(root);

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const lint = lintTaxonomy(taxonomy);
  if (hasLintErrors(lint)) {
    throw new TaxonomyError(
      "Taxonomy declares colliding sibling categories",
      lint.filter((i) => i.severity === "error").map((i) => ({ path: i.path, message: i.message })),
    );
  }

  const rootResult = await ensureRoot(resolvedRoot, dryRun);
  const rootEntry: ScaffoldEntry = { path: resolvedRoot, relativePath: ".", result: rootResult };

  const failuresBefore = logger?.failures.length ?? 0;
  await logger?.tryLog("scaffold.started", "scaffolder", {
    payload: { root: resolvedRoot, topLevel: taxonomy.length, dryRun },
  });

  const arrange = (nodes: readonly Category[]): readonly Category[] =>
    order === "reverse" ? [...nodes].reverse() : nodes;

  const walk = async (node: Category, parentPath: string, ancestors: string[], report: SubtreeReport): Promise<void> => {
    const segments = [...ancestors, node.name];
    const path = join(parentPath, node.name);
    const relativePath = join(...segments);

    const check = checkSegment(node.name);
    if (!check.valid) {
      report.conflicts.push({ path, relativePath, kind: "name-invalid", reason: check.reason });
      return;
    }

    const outcome = await ensureDirectory(path, dryRun);
    if (outcome.status === "conflict") {
      report.conflicts.push({ path, relativePath, kind: outcome.kind, reason: outcome.reason });
      return;
    }

    report.entries.push({ path, relativePath, result: outcome.status });

    for (const child of arrange(node.children)) {
      await walk(child, path, segments, report);
    }
  };

  // Subtrees are independent: each worker builds its own report and the
  // reports are reduced once every worker has finished.
  const topLevel = arrange(taxonomy);
  const reports = await runPool(
    topLevel,
    concurrency,
    async (node) => {
      const report: SubtreeReport = { entries: [], conflicts: [] };
      await walk(node, resolvedRoot, [], report);
      return report;
    },
    () => signal?.aborted ?? false,
  );

  const summary = reduceReports(resolvedRoot, rootEntry, reports, dryRun);

  for (const conflict of summary.conflicts) {
    await logger?.tryLog("scaffold.conflict", "scaffolder", {
      payload: { path: conflict.path, kind: conflict.kind, reason: conflict.reason },
    });
  }
  await logger?.tryLog("scaffold.completed", "scaffolder", {
    payload: {
      root: resolvedRoot,
      created: summary.createdCount,
      existing: summary.existingCount,
      conflicts: summary.conflicts.length,
      dryRun,
      aborted: summary.aborted,
    },
  });

  summary.auditFailures = logger ? logger.failures.slice(failuresBefore) : [];
  return summary;
}

function reduceReports(
  root: string,
  rootEntry: ScaffoldEntry,
  reports: Array<SubtreeReport | undefined>,
  dryRun: boolean,
): RunSummary {
  const summary: RunSummary = {
    root,
    createdCount: 0,
    existingCount: 0,
    entries: [rootEntry],
    conflicts: [],
    dryRun,
    aborted: false,
    auditFailures: [],
  };

  for (const report of reports) {
    if (!report) {
      summary.aborted = true;
      continue;
    }
    summary.entries.push(...report.entries);
    summary.conflicts.push(...report.conflicts);
  }

  summary.createdCount = summary.entries.filter((e) => e.result === "created").length;
  summary.existingCount = summary.entries.filter((e) => e.result === "existing").length;
  return summary;
}

/**
 * Pre-flight: make sure the root exists (creating it when only the parent
 * does) and is a writable directory.
 */
async function ensureRoot(root: string, dryRun: boolean): Promise<CreationResult> {
  const rootStats = await statForRoot(root, root);
  if (rootStats) {
    if (!rootStats.isDirectory()) {
      throw new RootUnwritableError(root, "a file exists at the root path");
    }
    await assertWritable(root, root, "root directory denies write access");
    return "existing";
  }

  const parent = dirname(root);
  const parentStats = await statForRoot(root, parent);
  if (!parentStats) {
    throw new RootUnwritableError(root, `parent directory ${parent} does not exist`);
  }
  if (!parentStats.isDirectory()) {
    throw new RootUnwritableError(root, `parent ${parent} is not a directory`);
  }
  await assertWritable(root, parent, `parent directory ${parent} denies write access`);

  if (dryRun) return "created";

  try {
    await mkdir(root);
    return "created";
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
      throw new RootUnwritableError(root, `cannot create root: ${(error as Error).message}`);
    }
    return "existing";
  }
}

async function ensureDirectory(path: string, dryRun: boolean): Promise<EnsureOutcome> {
  try {
    const existing = await statIfExists(path);
    if (existing) {
      return classifyExisting(existing);
    }

    if (dryRun) {
      return { status: "created" };
    }

    try {
      await mkdir(path);
      return { status: "created" };
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") throw error;
      // Created by someone else between the stat and the mkdir.
      const raced = await stat(path);
      return classifyExisting(raced);
    }
  } catch (error) {
    return { status: "conflict", kind: "create-failed", reason: (error as Error).message };
  }
}

function classifyExisting(stats: Stats): EnsureOutcome {
  return stats.isDirectory()
    ? { status: "existing" }
    : { status: "conflict", kind: "path-conflict", reason: "a file occupies this path" };
}

/** stat() that maps "does not exist" to null. */
async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    throw error;
  }
}

async function statForRoot(root: string, path: string): Promise<Stats | null> {
  try {
    return await statIfExists(path);
  } catch (error) {
    throw new RootUnwritableError(root, `cannot inspect ${path}: ${(error as Error).message}`);
  }
}

async function assertWritable(root: string, path: string, reason: string): Promise<void> {
  try {
    await access(path, constants.W_OK);
  } catch {
    throw new RootUnwritableError(root, reason);
  }
}
