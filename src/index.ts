/**
 * arcade-cabinet-tools: folder scaffolding and library maintenance for
 * arcade front-end cabinets.
 */

// Schemas
export * from "./schemas/index.js";

// Tree scaffolder
export * from "./scaffold/index.js";

// Taxonomies
export * from "./taxonomy/index.js";

// Configuration
export * from "./config/index.js";

// Events
export * from "./events/index.js";

// Library maintenance
export * from "./library/index.js";

// Transcoding
export * from "./transcode/index.js";

// CLI
export { createProgram, VERSION } from "./cli/program.js";
