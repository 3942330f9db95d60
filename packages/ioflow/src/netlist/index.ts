/**
 * Netlist model: wires, bits, cells and modules
 */

export * from "./spec/index.js";
export { parseSigSpec, type WireLookup } from "./sigspec.js";
export { ModuleBuilder, type SignalInput } from "./builder.js";
export { Error as NetlistError, ErrorCode as NetlistErrorCode } from "./errors.js";
