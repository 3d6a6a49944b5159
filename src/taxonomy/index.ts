/**
 * Taxonomy barrel export.
 */

export {
  BUILTIN_TAXONOMIES,
  TaxonomyError,
  isBuiltinTaxonomy,
  taxonomyPath,
  validateTaxonomyDocument,
  parseTaxonomy,
  readTaxonomyDocument,
  loadTaxonomy,
} from "./loader.js";
export type { BuiltinTaxonomy } from "./loader.js";

export { lintTaxonomy, hasLintErrors } from "./lint.js";
export type { TaxonomyIssue, TaxonomyIssueSeverity } from "./lint.js";

export { renderTaxonomyTree } from "./render.js";
