import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { countCategories } from "../../scaffold/paths.js";
import {
  TaxonomyError,
  isBuiltinTaxonomy,
  loadTaxonomy,
  parseTaxonomy,
  readTaxonomyDocument,
  taxonomyPath,
} from "../loader.js";

describe("taxonomy loader", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "cabinet-taxonomy-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("built-in taxonomies", () => {
    it("loads the roms taxonomy", async () => {
      const doc = await loadTaxonomy("roms");

      expect(doc.name).toBe("roms");
      expect(doc.categories.map((c) => c.name)).toEqual([
        "1-PLACAS ARCADE",
        "2-CONSOLAS",
        "3-PORTATILES",
        "4-ORDENADORES",
        "LIGHTGUN GAMES",
        "PC GAMES",
      ]);
      expect(countCategories(doc.categories)).toBe(83);
    });

    it("loads the emulators taxonomy", async () => {
      const doc = await loadTaxonomy("emulators");

      expect(doc.name).toBe("emulators");
      expect(doc.categories.map((c) => c.name)).toEqual([
        "1-PLACAS ARCADE",
        "2-CONSOLAS",
        "3-PORTATILES",
        "4-ORDENADORES",
      ]);
      expect(countCategories(doc.categories)).toBe(71);
    });

    it("recognises built-in names only", () => {
      expect(isBuiltinTaxonomy("roms")).toBe(true);
      expect(isBuiltinTaxonomy("emulators")).toBe(true);
      expect(isBuiltinTaxonomy("roms.yaml")).toBe(false);
      expect(taxonomyPath("roms").endsWith(join("taxonomies", "roms.yaml"))).toBe(true);
    });
  });

  describe("custom files", () => {
    it("loads a taxonomy file and defaults missing children", async () => {
      const file = join(testDir, "mini.yaml");
      await writeFile(
        file,
        ["name: mini", "categories:", "  - name: Arcade", "    children:", "      - name: MAME", "  - name: PC"].join("\n"),
      );

      const doc = await loadTaxonomy(file);

      expect(doc).toEqual({
        name: "mini",
        categories: [
          { name: "Arcade", children: [{ name: "MAME", children: [] }] },
          { name: "PC", children: [] },
        ],
      });
    });

    it("reports a missing file", async () => {
      const file = join(testDir, "nope.yaml");

      await expect(loadTaxonomy(file)).rejects.toThrow(`Taxonomy "${file}" not found (looked for ${file})`);
    });

    it("reports YAML syntax errors", async () => {
      const file = join(testDir, "broken.yaml");
      await writeFile(file, "name: [unclosed");

      await expect(loadTaxonomy(file)).rejects.toThrow(`Taxonomy file ${file} is not valid YAML`);
    });

    it("reports colliding siblings with their location", async () => {
      const file = join(testDir, "dupes.yaml");
      await writeFile(
        file,
        ["name: dupes", "categories:", "  - name: Sega", "    children:", "      - name: Saturn", "      - name: SATURN"].join(
          "\n",
        ),
      );

      const error = await loadTaxonomy(file).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TaxonomyError);
      expect(error).toMatchObject({
        message: `Invalid taxonomy in ${file}`,
        issues: [{ path: "Sega/SATURN", message: '"SATURN" collides with sibling "Saturn"' }],
      });
    });
  });

  describe("readTaxonomyDocument", () => {
    it("returns colliding siblings unlinted", async () => {
      const file = join(testDir, "dupes.yaml");
      await writeFile(file, "name: dupes\ncategories:\n  - name: Arcade\n  - name: ARCADE\n");

      const doc = await readTaxonomyDocument(file);

      expect(doc.categories.map((c) => c.name)).toEqual(["Arcade", "ARCADE"]);
    });

    it("reports a missing file the same way as loadTaxonomy", async () => {
      const file = join(testDir, "nope.yaml");

      await expect(readTaxonomyDocument(file)).rejects.toThrow(`Taxonomy "${file}" not found (looked for ${file})`);
    });

    it("still rejects schema violations", async () => {
      const file = join(testDir, "nameless.yaml");
      await writeFile(file, "categories: []\n");

      await expect(readTaxonomyDocument(file)).rejects.toThrow(`Invalid taxonomy in ${file}`);
    });
  });

  describe("parseTaxonomy", () => {
    it("reports schema violations by path", () => {
      const error = (() => {
        try {
          parseTaxonomy({ name: "x", categories: [{ children: [] }] }, "inline");
          return undefined;
        } catch (e) {
          return e;
        }
      })();

      expect(error).toBeInstanceOf(TaxonomyError);
      expect(error).toMatchObject({ message: "Invalid taxonomy in inline" });
      expect(error instanceof TaxonomyError ? error.issues[0]?.path : undefined).toBe("categories.0.name");
    });

    it("formats issues one per line", () => {
      const error = new TaxonomyError("Invalid taxonomy in inline", [
        { path: "A/a", message: '"a" collides with sibling "A"' },
        { path: "", message: "Required" },
      ]);

      expect(error.format()).toBe(
        ['Invalid taxonomy in inline', '  - A/a: "a" collides with sibling "A"', "  - (root): Required"].join("\n"),
      );
    });

    it("defaults categories to an empty list", () => {
      expect(parseTaxonomy({ name: "empty" })).toEqual({ name: "empty", categories: [] });
    });
  });
});
