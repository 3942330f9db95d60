/**
 * Fan-in graph construction
 *
 * Maps every bit of a module to the bits that directly drive it, from two
 * sources: direct connections (bit aliasing) and primitive gate cells
 * (each input bit drives the output bit).
 */

import { SigBit, type Cell, type Module } from "../netlist/index.js";
import { Result, Severity } from "../result.js";
import type { AnalysisOptions } from "../config/options.js";
import { primitiveOf, RoleContracts } from "./primitives.js";
import { Error, ErrorCode } from "./errors.js";

/**
 * Read-only fan-in map of one module
 */
export interface FanIn {
  /** Direct drivers of a bit; empty when none are recorded */
  drivers(bit: SigBit): readonly SigBit[];
  has(bit: SigBit): boolean;
  /** Number of bits with at least one driver */
  readonly size: number;
  entries(): IterableIterator<[SigBit, readonly SigBit[]]>;
}

export type GraphOptions = Pick<AnalysisOptions, "primitives" | "annotations">;

class FanInMap implements FanIn {
  private readonly edges = new Map<
    string,
    { bit: SigBit; drivers: Map<string, SigBit> }
  >();

  add(src: SigBit, dest: SigBit): void {
    const key = SigBit.key(dest);
    let entry = this.edges.get(key);
    if (!entry) {
      entry = { bit: dest, drivers: new Map() };
      this.edges.set(key, entry);
    }
    entry.drivers.set(SigBit.key(src), src);
  }

  drivers(bit: SigBit): readonly SigBit[] {
    const entry = this.edges.get(SigBit.key(bit));
    return entry ? [...entry.drivers.values()] : [];
  }

  has(bit: SigBit): boolean {
    return this.edges.has(SigBit.key(bit));
  }

  get size(): number {
    return this.edges.size;
  }

  *entries(): IterableIterator<[SigBit, readonly SigBit[]]> {
    for (const { bit, drivers } of this.edges.values()) {
      yield [bit, [...drivers.values()]];
    }
  }
}

/**
 * Build the fan-in map of a module.
 *
 * Fails on the first connection whose sides differ in width and on the
 * first cell that is not a recognized primitive (annotation cells are
 * skipped). Bits driven by more than one connection or cell keep the union
 * of their drivers and are reported as warnings.
 */
export function buildFanIn(
  module: Module,
  options: GraphOptions,
): Result<FanIn, Error> {
  const fanIn = new FanInMap();
  const origins = new Map<string, string>();
  const warnings: Error[] = [];

  const drive = (src: SigBit, dest: SigBit, origin: string): void => {
    const key = SigBit.key(dest);
    const previous = origins.get(key);
    if (previous === undefined) {
      origins.set(key, origin);
    } else if (previous !== origin && previous !== "") {
      warnings.push(
        new Error(
          ErrorCode.MULTIPLE_DRIVERS,
          `${SigBit.label(dest)} is driven by ${previous} and ${origin}`,
          { module: module.name },
          Severity.Warning,
        ),
      );
      // Report each bit once
      origins.set(key, "");
    }
    fanIn.add(src, dest);
  };

  for (const [index, { dest, src }] of module.connections.entries()) {
    if (dest.length !== src.length) {
      return Result.err(
        new Error(
          ErrorCode.WIDTH_MISMATCH,
          `connection #${index} assigns ${src.length} bits to ${dest.length}`,
          { module: module.name },
        ),
      );
    }
    for (let i = 0; i < dest.length; i++) {
      const origin = `connection #${index} (${SigBit.label(src[i])})`;
      drive(src[i], dest[i], origin);
    }
  }

  for (const cell of module.cells) {
    if (options.annotations.includes(cell.type)) {
      continue;
    }

    const ports = cellPorts(module, cell, options);
    if (!ports.success) {
      return ports;
    }

    const { inputs, output } = ports.value;
    for (const input of inputs) {
      drive(input, output, `cell ${cell.name}`);
    }
  }

  return Result.okWith<FanIn>(fanIn, { [Severity.Warning]: warnings });
}

/**
 * Split a cell's connections into its input bits and its output bit,
 * checking them against the role contract of its primitive kind
 */
function cellPorts(
  module: Module,
  cell: Cell,
  options: GraphOptions,
): Result<{ inputs: SigBit[]; output: SigBit }, Error> {
  const locus = { module: module.name, cell: cell.name };
  const primitive = primitiveOf(cell.type);

  if (primitive === undefined || !options.primitives.includes(primitive)) {
    return Result.err(
      new Error(
        ErrorCode.UNSUPPORTED_CELL,
        `cell ${cell.name} has type ${cell.type}`,
        locus,
      ),
    );
  }

  const contract = RoleContracts[primitive];
  const malformed = (reason: string) =>
    Result.err(
      new Error(
        ErrorCode.MALFORMED_CELL,
        `${primitive} cell ${cell.name} ${reason}`,
        locus,
      ),
    );

  for (const role of cell.connections.keys()) {
    if (role !== contract.output && !contract.inputs.includes(role)) {
      return malformed(`has unexpected port ${role}`);
    }
  }

  const bitOf = (role: string): SigBit | string => {
    const spec = cell.connections.get(role);
    if (!spec) {
      return `is missing port ${role}`;
    }
    if (spec.length !== 1) {
      return `port ${role} must be 1 bit wide, got ${spec.length}`;
    }
    return spec[0];
  };

  const output = bitOf(contract.output);
  if (typeof output === "string") {
    return malformed(output);
  }

  const inputs: SigBit[] = [];
  for (const role of contract.inputs) {
    const input = bitOf(role);
    if (typeof input === "string") {
      return malformed(input);
    }
    inputs.push(input);
  }

  return Result.ok({ inputs, output });
}
