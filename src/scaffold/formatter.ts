/**
 * Scaffold summary formatter — CLI output.
 */

import type { ConflictKind, RunSummary, ScaffoldConflict, ScaffoldEntry } from "./scaffolder.js";

const CONFLICT_LABELS: Record<ConflictKind, string> = {
  "path-conflict": "conflict",
  "name-invalid": "invalid",
  "create-failed": "failed",
};

/** One line per category action. */
export function formatScaffoldEntry(entry: ScaffoldEntry, dryRun = false): string {
  if (entry.result === "created") {
    return `  + ${dryRun ? "would create" : "created"}  ${entry.relativePath}`;
  }
  return `  = exists   ${entry.relativePath}`;
}

export function formatScaffoldConflict(conflict: ScaffoldConflict): string {
  return `  ! ${CONFLICT_LABELS[conflict.kind]}  ${conflict.relativePath} (${conflict.reason})`;
}

/**
 * Full run report: header, per-category lines, totals, then every conflict
 * and any audit log failure.
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines: string[] = [];

  lines.push(`Scaffolding ${summary.root}${summary.dryRun ? " (dry run)" : ""}`);
  for (const entry of summary.entries) {
    lines.push(formatScaffoldEntry(entry, summary.dryRun));
  }
  lines.push("");
  const verb = summary.dryRun ? "Would create" : "Created";
  lines.push(`${verb} ${summary.createdCount}, already present ${summary.existingCount}`);

  if (summary.conflicts.length > 0) {
    lines.push(`Conflicts (${summary.conflicts.length}):`);
    for (const conflict of summary.conflicts) {
      lines.push(formatScaffoldConflict(conflict));
    }
  }

  if (summary.aborted) {
    lines.push("Cancelled before every category was processed; re-run to finish.");
  }

  if (summary.auditFailures.length > 0) {
    lines.push(`Audit log not written (${summary.auditFailures.length} events):`);
    for (const failure of summary.auditFailures) {
      lines.push(`  ${failure}`);
    }
  }

  return lines.join("\n");
}
