/**
 * Scaffold barrel export.
 */

export { scaffold } from "./scaffolder.js";
export type {
  CreationResult,
  ConflictKind,
  ScaffoldEntry,
  ScaffoldConflict,
  RunSummary,
  ScaffoldOptions,
} from "./scaffolder.js";

export { RootUnwritableError } from "./errors.js";
export { checkSegment, resolveRoot, flattenTaxonomy, countCategories } from "./paths.js";
export type { SegmentCheck, FlatCategory } from "./paths.js";
export { formatRunSummary, formatScaffoldEntry, formatScaffoldConflict } from "./formatter.js";
export { runPool } from "./pool.js";
