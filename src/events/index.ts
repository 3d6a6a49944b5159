export { EventLogger } from "./logger.js";
export type { EventCallback, EventLoggerOptions } from "./logger.js";
