export * from "./options.js";
export * from "./errors.js";
export { loadConfig, parseConfig } from "./load.js";
