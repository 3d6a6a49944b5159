/**
 * Library maintenance tools barrel export.
 */

export { EOL, compareNames, sameName, parseNameList } from "./names.js";

export { sanitizeName, sanitizeTree } from "./sanitizer.js";
export type { SanitizeOptions, SanitizeRename, SanitizeConflict, SanitizeResult } from "./sanitizer.js";

export { collectLaunchScripts, renderLauncherRecords, writeLauncherConfig } from "./launchers.js";
export type { LauncherRecord, LauncherOptions, LauncherWriteResult } from "./launchers.js";

export {
  relocatePath,
  relocateIniText,
  relocateApplications,
  parseDriveLetter,
  relocateGamePathText,
  relocateGamePaths,
} from "./relocate.js";
export type { RelocateChange, RelocateResult, GamePathChange, GamePathRelocateResult } from "./relocate.js";

export {
  listProfileFiles,
  parseProfile,
  readProfiles,
  profileLauncherName,
  renderProfileLauncher,
  writeProfileLaunchers,
} from "./profiles.js";
export type {
  TeknoParrotProfile,
  ProfileLauncherOptions,
  ProfileLaunchersOptions,
  ProfileLauncherSkip,
  ProfileLaunchersResult,
} from "./profiles.js";

export { generatePlaceholders } from "./placeholders.js";
export type { PlaceholderOptions, PlaceholderResult } from "./placeholders.js";

export { listDirectory } from "./lister.js";
export type { ListingOptions, ListingResult } from "./lister.js";

export { renderDescription, writeDescriptions } from "./descriptions.js";
export type { DescriptionOptions, DescriptionResult } from "./descriptions.js";
