export const VERSION = "0.1.0";

export * as Netlist from "./netlist/index.js";
export { SigBit, Wire, Module, Design, ModuleBuilder } from "./netlist/index.js";
export type { Cell, SigSpec } from "./netlist/index.js";

// Netlist loaders
export {
  loadNetlist,
  loadDocument,
  detectFormat,
  LoaderError,
  LoaderErrorCode,
  type NetlistFormat,
  type FormatOption,
} from "./loader/index.js";

// Analysis phases
export { classifyModule, type Classification } from "./classify/index.js";
export {
  buildFanIn,
  GraphError,
  GraphErrorCode,
  Primitives,
  type FanIn,
  type Primitive,
} from "./graph/index.js";
export {
  DependencyResolver,
  resolveOutputs,
  ResolveError,
  type Dependencies,
  type OutputDependency,
} from "./resolve/index.js";
export * from "./report/index.js";

// Drivers and configuration
export * from "./analyzer/index.js";
export * from "./config/index.js";

// Re-export error handling utilities
export * from "./errors.js";

// Re-export result type
export * from "./result.js";

// CLI utilities are not exported; import them from ./cli
