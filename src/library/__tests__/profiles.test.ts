import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseProfile, renderProfileLauncher, writeProfileLaunchers } from "../profiles.js";

const profile = (name: string | null, gamePath = "D:\\TP\\game.exe"): string =>
  [
    '<?xml version="1.0" encoding="utf-8"?>',
    "<GameProfile>",
    ...(name === null ? [] : [`  <GameNameInternal>${name}</GameNameInternal>`]),
    `  <GamePath>${gamePath}</GamePath>`,
    "</GameProfile>",
  ].join("\r\n");

describe("parseProfile", () => {
  it("reads the internal name and game path", () => {
    expect(parseProfile(profile("Initial D 8"), "/tp/ID8.xml")).toEqual({
      path: "/tp/ID8.xml",
      name: "Initial D 8",
      gamePath: "D:\\TP\\game.exe",
    });
  });

  it("decodes entities and matches prefixed tags", () => {
    const xml = '<GameProfile xmlns:tp="urn:tp"><tp:GameNameInternal>Rock &amp; Roll</tp:GameNameInternal></GameProfile>';

    expect(parseProfile(xml, "/tp/rr.xml")).toEqual({ path: "/tp/rr.xml", name: "Rock & Roll", gamePath: undefined });
  });

  it("falls back to the file stem", () => {
    expect(parseProfile(profile(null), "/tp/Tekken7.xml").name).toBe("Tekken7");
  });
});

describe("renderProfileLauncher", () => {
  const id8 = { path: "D:\\TP\\UserProfiles\\ID8.xml", name: "Initial D 8" };

  it("starts a bare executable with the profile", () => {
    expect(renderProfileLauncher(id8, { executable: "TeknoParrotUi.exe", startMinimized: false, extraArgs: "" })).toBe(
      [
        "@echo off",
        "REM TeknoParrot launcher for profile: Initial D 8",
        'start "" "TeknoParrotUi.exe" --profile="D:\\TP\\UserProfiles\\ID8.xml"',
        "exit",
        "",
      ].join("\r\n"),
    );
  });

  it("changes into the folder of an absolute executable", () => {
    const text = renderProfileLauncher(id8, {
      executable: "C:\\TeknoParrot\\TeknoParrotUi.exe",
      startMinimized: true,
      extraArgs: " --fullscreen ",
    });

    expect(text.split("\r\n")).toEqual([
      "@echo off",
      "REM TeknoParrot launcher for profile: Initial D 8",
      'cd /d "C:\\TeknoParrot"',
      'start "" "TeknoParrotUi.exe" --startMinimized --profile="D:\\TP\\UserProfiles\\ID8.xml" --fullscreen',
      "exit",
      "",
    ]);
  });
});

describe("writeProfileLaunchers", () => {
  let dir: string;
  let out: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cabinet-tp-"));
    out = join(dir, "launchers");
    await writeFile(join(dir, "ID8.xml"), profile("Initial D 8"));
    await writeFile(join(dir, "sw.xml"), profile("Star Wars: Battle Pod"));
    await writeFile(join(dir, "Blank.xml"), profile(null));
    await writeFile(join(dir, "zz-dupe.xml"), profile("initial d 8"));
    await writeFile(join(dir, "readme.txt"), "");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one launcher per profile with a safe, unique name", async () => {
    const result = await writeProfileLaunchers(dir, {
      outputDir: out,
      executable: "TeknoParrotUi.exe",
      startMinimized: false,
      extraArgs: "",
    });

    expect(result.outputDir).toBe(out);
    expect(result.written).toEqual(["Blank.bat", "Initial D 8.bat", "Star Wars_ Battle Pod.bat"]);
    expect(result.skipped).toEqual([
      { profile: join(dir, "zz-dupe.xml"), reason: 'launcher name "initial d 8.bat" is already used' },
    ]);
    expect((await readdir(out)).sort()).toEqual(["Blank.bat", "Initial D 8.bat", "Star Wars_ Battle Pod.bat"]);
    expect(await readFile(join(out, "Blank.bat"), "utf-8")).toBe(
      [
        "@echo off",
        "REM TeknoParrot launcher for profile: Blank",
        `start "" "TeknoParrotUi.exe" --profile="${join(dir, "Blank.xml")}"`,
        "exit",
        "",
      ].join("\r\n"),
    );
  });
});
