/**
 * Taxonomy schema — the declared hierarchy of categories materialized as
 * directories by the scaffolder.
 *
 * A taxonomy is authored once as YAML and versioned with the tool; it is
 * never derived from what already exists on disk.
 */

import { z } from "zod";

/** One node of a taxonomy: a directory name plus its ordered children. */
export interface Category {
  name: string;
  children: Category[];
}

/** Input form of a category; `children` may be omitted for leaves. */
export interface CategoryInput {
  name: string;
  children?: CategoryInput[];
}

/**
 * Category schema.
 *
 * `name` is only required to be a string here. Whether it is usable as a
 * path segment is decided per entry at scaffold time (NameInvalid), so a
 * single bad name does not make the whole taxonomy unusable.
 */
export const Category: z.ZodType<Category, z.ZodTypeDef, CategoryInput> = z.lazy(() =>
  z.object({
    name: z.string(),
    children: z.array(Category).default([]),
  }),
);

/** On-disk taxonomy document (taxonomies/*.yaml). */
export const TaxonomyDocument = z.object({
  /** Short identifier, e.g. "roms". */
  name: z.string().min(1),
  description: z.string().optional(),
  categories: z.array(Category).default([]),
});
export type TaxonomyDocument = z.infer<typeof TaxonomyDocument>;
