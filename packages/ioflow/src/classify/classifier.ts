import type { Module } from "../netlist/index.js";

export interface Classification {
  sequential: boolean;
  /** First cell whose type matched a sequential marker */
  cell?: {
    name: string;
    type: string;
    marker: string;
  };
}

/**
 * Name-based test for state-holding cells: a module is sequential when any
 * cell type contains one of the markers
 */
export function classifyModule(
  module: Module,
  markers: readonly string[],
): Classification {
  for (const cell of module.cells) {
    const marker = markers.find(
      (marker) => marker.length > 0 && cell.type.includes(marker),
    );
    if (marker !== undefined) {
      return {
        sequential: true,
        cell: { name: cell.name, type: cell.type, marker },
      };
    }
  }
  return { sequential: false };
}
