/**
 * Sequential/combinational module classification
 */

export * from "./classifier.js";
export { pass } from "./pass.js";
export {
  ClassifyError,
  ErrorCode as ClassifyErrorCode,
} from "./errors.js";
