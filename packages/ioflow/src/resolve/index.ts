/**
 * Memoized resolution of primary-input dependencies
 */

export * from "./resolver.js";
export * from "./errors.js";
export { pass } from "./pass.js";
