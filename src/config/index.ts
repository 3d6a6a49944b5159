export {
  CONFIG_FILE_NAME,
  CabinetConfigError,
  parseCabinetConfig,
  loadCabinetConfig,
  expandHome,
  defaultRoot,
  resolveEventsDir,
} from "./loader.js";
