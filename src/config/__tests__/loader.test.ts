/**
 * Tests for cabinet.yaml loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import {
  CabinetConfigError,
  defaultRoot,
  expandHome,
  loadCabinetConfig,
  parseCabinetConfig,
  resolveEventsDir,
} from "../loader.js";

function configError(raw: unknown): CabinetConfigError | undefined {
  try {
    parseCabinetConfig(raw);
    return undefined;
  } catch (error) {
    return error instanceof CabinetConfigError ? error : undefined;
  }
}

describe("cabinet config", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "cabinet-config-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("parseCabinetConfig", () => {
    it("fills in every default", () => {
      expect(parseCabinetConfig({})).toEqual({
        schemaVersion: 1,
        scaffold: { taxonomies: { roms: "2-ROMS", emulators: "3-EMULADORES" }, concurrency: 1 },
        sanitize: { replacements: { "&": "and", "!": "", "%": "", "^": "", "'": "" } },
        launchers: { exitMethod: "WinClose", extensions: [".bat", ".exe", ".lnk"] },
        teknoparrot: { executable: "TeknoParrotUi.exe", startMinimized: false, extraArgs: "" },
        placeholders: { outputDir: "dummy", extension: ".bat", content: "" },
        listing: { fileName: "listado.txt" },
        descriptions: { fileName: "description.txt", template: "{name}\n" },
        transcode: { presets: {} },
        events: { enabled: true, dir: "~/.arcade-cabinet/events" },
      });
    });

    it("treats an empty document as defaults", () => {
      expect(parseCabinetConfig(null).listing.fileName).toBe("listado.txt");
    });

    it("rejects a replacement that reintroduces a disallowed substring", () => {
      const error = configError({ sanitize: { replacements: { "&": "&&" } } });

      expect(error?.issues).toEqual([
        { path: "sanitize.replacements.&", message: 'Replacement "&&" reintroduces disallowed "&"' },
      ]);
    });

    it("rejects a replacement containing a path separator", () => {
      const error = configError({ sanitize: { replacements: { "!": "a/b" } } });

      expect(error?.issues).toEqual([
        { path: "sanitize.replacements.!", message: "Replacement cannot contain a path separator" },
      ]);
    });

    it("rejects malformed launcher extensions", () => {
      const error = configError({ launchers: { extensions: ["bat"] } });

      expect(error?.issues).toEqual([{ path: "launchers.extensions.0", message: "Extension must look like .bat" }]);
    });

    it("rejects an unknown schema version", () => {
      expect(configError({ schemaVersion: 2 })?.issues[0]?.path).toBe("schemaVersion");
    });
  });

  describe("loadCabinetConfig", () => {
    it("uses defaults when the root has no cabinet.yaml", async () => {
      const config = await loadCabinetConfig(testDir);

      expect(config.launchers.exitMethod).toBe("WinClose");
    });

    it("uses defaults when the root path is a file", async () => {
      const file = join(testDir, "not-a-folder");
      await writeFile(file, "");

      const config = await loadCabinetConfig(file);

      expect(config.listing.fileName).toBe(parseCabinetConfig({}).listing.fileName);
    });

    it("reads cabinet.yaml from the root", async () => {
      await writeFile(join(testDir, "cabinet.yaml"), "launchers:\n  exitMethod: ProcessClose\n");

      const config = await loadCabinetConfig(testDir);

      expect(config.launchers).toEqual({ exitMethod: "ProcessClose", extensions: [".bat", ".exe", ".lnk"] });
    });

    it("prefers an explicit config path", async () => {
      const explicit = join(testDir, "other.yaml");
      await writeFile(join(testDir, "cabinet.yaml"), "listing:\n  fileName: root.txt\n");
      await writeFile(explicit, "listing:\n  fileName: explicit.txt\n");

      const config = await loadCabinetConfig(testDir, explicit);

      expect(config.listing.fileName).toBe("explicit.txt");
    });

    it("fails when an explicit config path is missing", async () => {
      const missing = join(testDir, "missing.yaml");

      await expect(loadCabinetConfig(testDir, missing)).rejects.toThrow(`Cannot read config ${missing}`);
    });

    it("fails on invalid YAML", async () => {
      await writeFile(join(testDir, "cabinet.yaml"), "listing: [oops");

      await expect(loadCabinetConfig(testDir)).rejects.toThrow(
        `Config ${join(testDir, "cabinet.yaml")} is not valid YAML`,
      );
    });
  });

  describe("environment helpers", () => {
    it("expands a leading tilde", () => {
      expect(expandHome("~/events")).toBe(join(homedir(), "events"));
      expect(expandHome("~")).toBe(homedir());
      expect(expandHome("/var/events")).toBe("/var/events");
    });

    it("takes the default root from CABINET_ROOT", () => {
      expect(defaultRoot({ CABINET_ROOT: "/games" })).toBe("/games");
      expect(defaultRoot({})).toBe(process.cwd());
    });

    it("lets CABINET_EVENTS_DIR override the configured events dir", () => {
      const config = parseCabinetConfig({});

      expect(resolveEventsDir(config, { CABINET_EVENTS_DIR: "/var/cabinet-events" })).toBe("/var/cabinet-events");
      expect(resolveEventsDir(config, {})).toBe(join(homedir(), ".arcade-cabinet", "events"));
    });
  });
});
