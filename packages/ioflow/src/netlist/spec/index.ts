export { SigBit, type SigSpec } from "./bit.js";
export type { Cell } from "./cell.js";
export { Wire } from "./wire.js";
export { Module } from "./module.js";
export { Design } from "./design.js";
