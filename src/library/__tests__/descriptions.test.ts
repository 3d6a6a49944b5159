import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { renderDescription, writeDescriptions } from "../descriptions.js";

describe("renderDescription", () => {
  it("substitutes every {name}", () => {
    expect(renderDescription("Game: {name} ({name})", "Cuphead")).toBe("Game: Cuphead (Cuphead)");
  });
});

describe("writeDescriptions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cabinet-descriptions-"));
    await mkdir(join(dir, "Cuphead"));
    await mkdir(join(dir, "Brawlout"));
    await writeFile(join(dir, "Brawlout", "description.txt"), "custom");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("keeps existing descriptions", async () => {
    const result = await writeDescriptions(dir, { fileName: "description.txt", template: "{name}\n" });

    expect(result).toEqual({ written: ["Cuphead"], skipped: ["Brawlout"] });
    expect(await readFile(join(dir, "Cuphead", "description.txt"), "utf-8")).toBe("Cuphead\n");
    expect(await readFile(join(dir, "Brawlout", "description.txt"), "utf-8")).toBe("custom");
  });

  it("overwrites with force", async () => {
    const result = await writeDescriptions(dir, { fileName: "description.txt", template: "{name}\n", force: true });

    expect(result).toEqual({ written: ["Brawlout", "Cuphead"], skipped: [] });
    expect(await readFile(join(dir, "Brawlout", "description.txt"), "utf-8")).toBe("Brawlout\n");
  });
});
