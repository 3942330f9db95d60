export * from "./report.js";
export { Formatter, formatText } from "./formatter.js";
