/**
 * CLI module exports
 */

export { AnalyzeCli, handleAnalyzeCommand } from "./analyze.js";
export { CliBase } from "./cli-base.js";
export type { CliConfig, ExtendedOptionConfig } from "./cli-base.js";
export { formatJson, formatReports } from "./formatters.js";
export {
  commonOptions,
  analysisOptions,
  parseOutputFormat,
  parseInputFormat,
  parsePrimitives,
} from "./options.js";
export type { OutputFormat } from "./options.js";
export {
  displayErrors,
  displayWarnings,
  displayInfos,
  displayMessages,
  writeOutput,
} from "./output.js";
export { formatError, formatWarning } from "./error-formatter.js";
