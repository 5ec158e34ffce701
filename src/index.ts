/**
 * org-roster: public API.
 */

export * from "./schemas/index.js";
export * from "./data/index.js";
export * from "./directory/index.js";
export * from "./validate/index.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export type { Logger } from "./adapters/console-logger.js";
