export { Category, TaxonomyDocument } from "./taxonomy.js";
export type { CategoryInput } from "./taxonomy.js";
export {
  CabinetConfig,
  ScaffoldConfig,
  SanitizeConfig,
  LaunchersConfig,
  TeknoParrotConfig,
  PlaceholdersConfig,
  ListingConfig,
  DescriptionsConfig,
  TranscodePreset,
  TranscodeConfig,
  EventsConfig,
} from "./config.js";
export { CabinetEvent, EventType } from "./event.js";
