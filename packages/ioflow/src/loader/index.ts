/**
 * Netlist loaders for native and Yosys JSON documents
 */

export * from "./load.js";
export { loadNative } from "./native.js";
export { loadYosys, type YosysBit } from "./yosys.js";
export {
  Error as LoaderError,
  ErrorCode as LoaderErrorCode,
} from "./errors.js";
export { pass } from "./pass.js";
