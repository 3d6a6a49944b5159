/**
 * Cabinet configuration schema.
 *
 * Stored as `cabinet.yaml` at the cabinet root (or passed with --config).
 * Every key is optional; defaults reproduce the stock cabinet layout.
 */

import { z } from "zod";

/** Scaffold defaults: which built-in taxonomies land in which root subfolder. */
export const ScaffoldConfig = z.object({
  /** Built-in taxonomy name → folder under the root it is scaffolded into. */
  taxonomies: z
    .record(z.string(), z.string().min(1))
    .default({ roms: "2-ROMS", emulators: "3-EMULADORES" }),
  /** Top-level subtrees processed at once. */
  concurrency: z.number().int().positive().default(1),
});
export type ScaffoldConfig = z.infer<typeof ScaffoldConfig>;

/**
 * Filename sanitizer rules.
 *
 * A replacement may not contain any disallowed substring, otherwise a
 * second pass would rename the same entry again.
 */
export const SanitizeConfig = z
  .object({
    replacements: z
      .record(z.string().min(1), z.string())
      .default({ "&": "and", "!": "", "%": "", "^": "", "'": "" }),
  })
  .superRefine((value, ctx) => {
    const keys = Object.keys(value.replacements);
    for (const [from, to] of Object.entries(value.replacements)) {
      if (/[/\\]/.test(to)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["replacements", from],
          message: "Replacement cannot contain a path separator",
        });
      }
      const reintroduced = keys.find((key) => to.includes(key));
      if (reintroduced !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["replacements", from],
          message: `Replacement "${to}" reintroduces disallowed "${reintroduced}"`,
        });
      }
    }
  });
export type SanitizeConfig = z.infer<typeof SanitizeConfig>;

/** RocketLauncher PCLauncher INI generation. */
export const LaunchersConfig = z.object({
  /** ExitMethod directive written for every record. */
  exitMethod: z.string().min(1).default("WinClose"),
  /** Launch script extensions, in priority order. */
  extensions: z.array(z.string().regex(/^\.[^.]+$/, "Extension must look like .bat")).min(1).default([".bat", ".exe", ".lnk"]),
});
export type LaunchersConfig = z.infer<typeof LaunchersConfig>;

/** TeknoParrot `.bat` launchers, one per profile. */
export const TeknoParrotConfig = z.object({
  /** Bare name (resolved by the launcher's PATH) or absolute Windows path. */
  executable: z.string().min(1).default("TeknoParrotUi.exe"),
  startMinimized: z.boolean().default(false),
  extraArgs: z.string().default(""),
});
export type TeknoParrotConfig = z.infer<typeof TeknoParrotConfig>;

export const PlaceholdersConfig = z.object({
  /** Subfolder (of the working directory) that receives the placeholders. */
  outputDir: z.string().min(1).default("dummy"),
  extension: z.string().default(".bat"),
  content: z.string().default(""),
});
export type PlaceholdersConfig = z.infer<typeof PlaceholdersConfig>;

export const ListingConfig = z.object({
  fileName: z.string().min(1).default("listado.txt"),
});
export type ListingConfig = z.infer<typeof ListingConfig>;

export const DescriptionsConfig = z.object({
  fileName: z.string().min(1).default("description.txt"),
  /** `{name}` is replaced with the folder name. */
  template: z.string().default("{name}\n"),
});
export type DescriptionsConfig = z.infer<typeof DescriptionsConfig>;

/** External converter invocation: executable plus a fixed argument template. */
export const TranscodePreset = z.object({
  executable: z.string().min(1),
  /** Arguments; `{input}` and `{output}` are substituted. */
  args: z.array(z.string()).min(1),
  /** Appended to the output base name, e.g. ".mp4". */
  extension: z.string().min(1),
  /** Source extensions picked up when converting a whole folder. */
  inputs: z.array(z.string().regex(/^\.[^.]+$/, "Extension must look like .iso")).default([]),
});
export type TranscodePreset = z.infer<typeof TranscodePreset>;

export const TranscodeConfig = z.object({
  /** Overrides or additions to the built-in presets, by name. */
  presets: z.record(z.string(), TranscodePreset).default({}),
});
export type TranscodeConfig = z.infer<typeof TranscodeConfig>;

export const EventsConfig = z.object({
  enabled: z.boolean().default(true),
  /** Directory for the date-rotated JSONL event log. `~` is expanded. */
  dir: z.string().min(1).default("~/.arcade-cabinet/events"),
});
export type EventsConfig = z.infer<typeof EventsConfig>;

/** Top-level cabinet configuration. */
export const CabinetConfig = z.object({
  schemaVersion: z.literal(1).default(1),
  scaffold: ScaffoldConfig.default({}),
  sanitize: SanitizeConfig.default({}),
  launchers: LaunchersConfig.default({}),
  teknoparrot: TeknoParrotConfig.default({}),
  placeholders: PlaceholdersConfig.default({}),
  listing: ListingConfig.default({}),
  descriptions: DescriptionsConfig.default({}),
  transcode: TranscodeConfig.default({}),
  events: EventsConfig.default({}),
});
export type CabinetConfig = z.infer<typeof CabinetConfig>;
