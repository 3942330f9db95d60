import type { SigSpec } from "./bit.js";
import type { Cell } from "./cell.js";
import { Wire } from "./wire.js";

/**
 * A flattened netlist module
 */
export interface Module {
  name: string;
  /** Port wire names in declaration order */
  ports: string[];
  /** All declared wires, ports included */
  wires: Map<string, Wire>;
  /** Direct bit aliasing, `dest = src` */
  connections: Module.Connection[];
  cells: Cell[];
}

export namespace Module {
  export interface Connection {
    dest: SigSpec;
    src: SigSpec;
  }

  /**
   * Port wires of one direction, in declaration order. Inout ports count
   * as both inputs and outputs.
   */
  export function portWires(
    module: Module,
    direction: "input" | "output",
  ): Wire[] {
    const wires: Wire[] = [];
    for (const name of module.ports) {
      const wire = module.wires.get(name);
      if (wire && wire[direction]) {
        wires.push(wire);
      }
    }
    return wires;
  }
}
