/**
 * Per-module analysis reports
 */

import { Module, SigBit, Wire } from "../netlist/index.js";
import type { Classification } from "../classify/index.js";
import type { OutputDependency } from "../resolve/index.js";

export interface BitDescriptor {
  name: string;
  offset: number;
  width: number;
}

export interface ModuleReport {
  module: string;
  isSequential: boolean;
  inputs: BitDescriptor[];
  outputs: BitDescriptor[];
  /**
   * Input bits each output bit depends on, keyed by `name[offset]`.
   * Absent when the module was skipped as sequential.
   */
  dependencies?: Record<string, BitDescriptor[]>;
}

/**
 * Serialized form of a report
 */
export interface ModuleRecord {
  module: string;
  is_sequential: boolean;
  inputs: BitDescriptor[];
  outputs: BitDescriptor[];
  dependencies?: Record<string, BitDescriptor[]>;
}

export function describeBit(bit: SigBit.OfWire): BitDescriptor {
  return { name: bit.wire.name, offset: bit.offset, width: bit.wire.width };
}

function describePorts(wires: Wire[]): BitDescriptor[] {
  return wires.flatMap(Wire.bits).map(describeBit);
}

/**
 * Assemble the report of a module. `dependencies` is only read for
 * combinational modules.
 */
export function assembleReport(
  module: Module,
  classification: Classification,
  dependencies: readonly OutputDependency[] = [],
): ModuleReport {
  const report: ModuleReport = {
    module: module.name,
    isSequential: classification.sequential,
    inputs: describePorts(Module.portWires(module, "input")),
    outputs: describePorts(Module.portWires(module, "output")),
  };

  if (classification.sequential) {
    return report;
  }

  report.dependencies = {};
  for (const { bit, dependencies: inputs } of dependencies) {
    report.dependencies[SigBit.label(bit)] = inputs.map(describeBit);
  }
  return report;
}

export function toRecord(report: ModuleReport): ModuleRecord {
  const record: ModuleRecord = {
    module: report.module,
    is_sequential: report.isSequential,
    inputs: report.inputs,
    outputs: report.outputs,
  };
  if (report.dependencies) {
    record.dependencies = report.dependencies;
  }
  return record;
}
