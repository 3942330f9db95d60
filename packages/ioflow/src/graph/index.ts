/**
 * Fan-in graph construction for netlist modules
 */

export * from "./primitives.js";
export { buildFanIn, type FanIn, type GraphOptions } from "./fanin.js";
export {
  Error as GraphError,
  ErrorCode as GraphErrorCode,
} from "./errors.js";
export { pass } from "./pass.js";
