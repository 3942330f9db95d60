/**
 * Analysis pass system and drivers
 */

export * from "./pass.js";
export * from "./analyze.js";
export { AnalyzerError, ErrorCode as AnalyzerErrorCode } from "./errors.js";
