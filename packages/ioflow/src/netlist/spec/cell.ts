import type { SigSpec } from "./bit.js";

/**
 * An instance of a (primitive or annotation) cell
 */
export interface Cell {
  name: string;
  /** Cell type identifier, e.g. `$_AND_` */
  type: string;
  /** Signals attached to each port role of the cell, e.g. `A`, `Y` */
  connections: Map<string, SigSpec>;
}
