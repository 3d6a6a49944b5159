/**
 * Cabinet CLI program definition.
 */

import { Command } from "commander";
import { defaultRoot } from "../config/loader.js";
import { registerLibraryCommands } from "./commands/library.js";
import { registerProfileCommands } from "./commands/profiles.js";
import { registerScaffoldCommands } from "./commands/scaffold.js";
import { registerTaxonomyCommands } from "./commands/taxonomy.js";
import { registerTranscodeCommands } from "./commands/transcode.js";

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command()
    .name("cabinet")
    .description("Arcade cabinet toolkit: folder scaffolding and library maintenance")
    .version(VERSION)
    .option("--root <dir>", "Cabinet root directory (default: $CABINET_ROOT or cwd)", defaultRoot())
    .option("--config <file>", "Config file (default: <root>/cabinet.yaml when present)");

  registerScaffoldCommands(program);
  registerTaxonomyCommands(program);
  registerLibraryCommands(program);
  registerProfileCommands(program);
  registerTranscodeCommands(program);

  return program;
}
