import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { generatePlaceholders } from "../placeholders.js";

describe("generatePlaceholders", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cabinet-placeholders-"));
    await mkdir(join(dir, "Cuphead", "DLC"), { recursive: true });
    await mkdir(join(dir, "Brawlout"));
    await writeFile(join(dir, "notes.txt"), "");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one placeholder per immediate subfolder", async () => {
    const result = await generatePlaceholders(dir, { outputDir: "dummy", extension: ".bat", content: "" });

    expect(result.outputPath).toBe(join(dir, "dummy"));
    expect(result.created).toEqual(["Brawlout.bat", "Cuphead.bat"]);
    expect(result.skipped).toEqual([]);
    expect((await readdir(join(dir, "dummy"))).sort()).toEqual(["Brawlout.bat", "Cuphead.bat"]);
  });

  it("skips the output folder and existing placeholders", async () => {
    await mkdir(join(dir, "dummy"));
    await writeFile(join(dir, "dummy", "Brawlout.bat"), "keep me");

    const result = await generatePlaceholders(dir, { outputDir: "dummy", extension: ".bat", content: "@echo off" });

    expect(result.created).toEqual(["Cuphead.bat"]);
    expect(result.skipped).toEqual(["Brawlout.bat"]);
    expect(await readFile(join(dir, "dummy", "Brawlout.bat"), "utf-8")).toBe("keep me");
    expect(await readFile(join(dir, "dummy", "Cuphead.bat"), "utf-8")).toBe("@echo off");
  });
});
