/**
 * Taxonomy loader — built-in taxonomies and user-supplied YAML files.
 *
 * Built-ins live in <package>/taxonomies/<name>.yaml. Any other reference is
 * treated as a path to a taxonomy file.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { TaxonomyDocument } from "../schemas/taxonomy.js";
import { hasLintErrors, lintTaxonomy } from "./lint.js";
import type { TaxonomyIssue } from "./lint.js";

/** Taxonomies shipped with the toolkit. */
export const BUILTIN_TAXONOMIES = ["roms", "emulators"] as const;
export type BuiltinTaxonomy = (typeof BUILTIN_TAXONOMIES)[number];

/** Same relative location from src/taxonomy and dist/taxonomy. */
const TAXONOMIES_DIR = fileURLToPath(new URL("../../taxonomies/", import.meta.url));

export class TaxonomyError extends Error {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
    this.name = "TaxonomyError";
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function isBuiltinTaxonomy(ref: string): ref is BuiltinTaxonomy {
  return BUILTIN_TAXONOMIES.some((name) => name === ref);
}

/** File a taxonomy reference points at. */
export function taxonomyPath(ref: string): string {
  return isBuiltinTaxonomy(ref) ? resolve(TAXONOMIES_DIR, `${ref}.yaml`) : resolve(ref);
}

/**
 * Schema-check raw taxonomy data without linting it.
 *
 * @throws TaxonomyError on schema errors
 */
export function validateTaxonomyDocument(raw: unknown, source = "taxonomy"): TaxonomyDocument {
  const result = TaxonomyDocument.safeParse(raw);
  if (!result.success) {
    throw new TaxonomyError(
      `Invalid taxonomy in ${source}`,
      result.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    );
  }
  return result.data;
}

/**
 * Validate raw taxonomy data (already parsed from YAML or built in code).
 *
 * @throws TaxonomyError on schema errors or duplicate siblings
 */
export function parseTaxonomy(raw: unknown, source = "taxonomy"): TaxonomyDocument {
  const doc = validateTaxonomyDocument(raw, source);

  const issues = lintTaxonomy(doc.categories);
  if (hasLintErrors(issues)) {
    throw new TaxonomyError(`Invalid taxonomy in ${source}`, errorsOnly(issues));
  }

  return doc;
}

/**
 * Read and schema-check a taxonomy by built-in name or file path. Lint
 * issues are left to the caller.
 *
 * @throws TaxonomyError if the file is missing, unreadable or malformed
 */
export async function readTaxonomyDocument(ref: string): Promise<TaxonomyDocument> {
  const path = taxonomyPath(ref);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      throw new TaxonomyError(`Taxonomy "${ref}" not found (looked for ${path})`);
    }
    throw new TaxonomyError(`Cannot read taxonomy ${path}: ${(error as Error).message}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content) as unknown;
  } catch (error) {
    throw new TaxonomyError(`Taxonomy file ${path} is not valid YAML: ${(error as Error).message}`);
  }

  return validateTaxonomyDocument(raw, path);
}

/**
 * Load a taxonomy by built-in name or file path.
 *
 * @throws TaxonomyError if the file cannot be read, is invalid, or declares
 * colliding siblings
 */
export async function loadTaxonomy(ref: string): Promise<TaxonomyDocument> {
  const doc = await readTaxonomyDocument(ref);

  const issues = lintTaxonomy(doc.categories);
  if (hasLintErrors(issues)) {
    throw new TaxonomyError(`Invalid taxonomy in ${taxonomyPath(ref)}`, errorsOnly(issues));
  }

  return doc;
}

function errorsOnly(issues: readonly TaxonomyIssue[]): Array<{ path: string; message: string }> {
  return issues
    .filter((issue) => issue.severity === "error")
    .map((issue) => ({ path: issue.path, message: issue.message }));
}
