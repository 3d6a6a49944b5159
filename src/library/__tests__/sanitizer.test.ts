/**
 * Tests for the filename sanitizer.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseCabinetConfig } from "../../config/loader.js";
import { sanitizeName, sanitizeTree } from "../sanitizer.js";

const replacements = parseCabinetConfig({}).sanitize.replacements;

describe("sanitizeName", () => {
  it("applies the default replacements", () => {
    expect(sanitizeName("Rock & Roll!", replacements)).toBe("Rock and Roll");
    expect(sanitizeName("Cat's 100%^", replacements)).toBe("Cats 100");
    expect(sanitizeName("Already clean", replacements)).toBe("Already clean");
  });

  it("repeats until the name stops changing", () => {
    expect(sanitizeName("a", { a: "b", b: "c" })).toBe("c");
  });
});

describe("sanitizeTree", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "cabinet-sanitize-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("renames contents before their folder and keeps file contents", async () => {
    const folder = join(root, "Tom & Jerry!");
    await mkdir(folder);
    await writeFile(join(folder, "Cat's Game%.bat"), "start game.exe");

    const result = await sanitizeTree(root, { replacements });

    expect(result.renames).toEqual([
      { from: join(folder, "Cat's Game%.bat"), to: join(folder, "Cats Game.bat") },
      { from: folder, to: join(root, "Tom and Jerry") },
    ]);
    expect(result.conflicts).toEqual([]);
    expect(await readFile(join(root, "Tom and Jerry", "Cats Game.bat"), "utf-8")).toBe("start game.exe");
  });

  it("does nothing on a second run", async () => {
    await mkdir(join(root, "Q&A"));
    await sanitizeTree(root, { replacements });

    const second = await sanitizeTree(root, { replacements });

    expect(second.renames).toEqual([]);
    expect(second.conflicts).toEqual([]);
    expect(await readdir(root)).toEqual(["QandA"]);
  });

  it("skips a rename whose target already exists", async () => {
    await writeFile(join(root, "Q&A.txt"), "one");
    await writeFile(join(root, "QandA.txt"), "two");

    const result = await sanitizeTree(root, { replacements });

    expect(result.renames).toEqual([]);
    expect(result.conflicts).toEqual([{ path: join(root, "Q&A.txt"), reason: "QandA.txt already exists" }]);
    expect(await readFile(join(root, "Q&A.txt"), "utf-8")).toBe("one");
    expect(await readFile(join(root, "QandA.txt"), "utf-8")).toBe("two");
  });

  it("refuses to produce an empty name", async () => {
    await writeFile(join(root, "!!!"), "");

    const result = await sanitizeTree(root, { replacements });

    expect(result.conflicts).toEqual([{ path: join(root, "!!!"), reason: "sanitized name would be empty" }]);
  });

  it("reports without renaming in a dry run", async () => {
    await writeFile(join(root, "Pac-Man!.bat"), "");

    const result = await sanitizeTree(root, { replacements, dryRun: true });

    expect(result.dryRun).toBe(true);
    expect(result.renames).toEqual([{ from: join(root, "Pac-Man!.bat"), to: join(root, "Pac-Man.bat") }]);
    expect(await readdir(root)).toEqual(["Pac-Man!.bat"]);
  });

  it("rejects a root that is not a directory", async () => {
    const file = join(root, "file.txt");
    await writeFile(file, "");

    await expect(sanitizeTree(file, { replacements })).rejects.toThrow(`${file} is not a directory`);
  });
});
