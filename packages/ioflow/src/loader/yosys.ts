/**
 * Yosys JSON netlists (`write_json`)
 *
 * Yosys identifies every net by a number and lets several names share it.
 * Each net number is mapped to one canonical bit: an input-port bit when
 * the net has one, otherwise an internal wire bit, otherwise an output-port
 * bit. Every other named bit on the net becomes an alias of the canonical
 * bit, and cell connections refer to canonical bits. Nets without any name
 * get a one-bit wire `$net<N>`.
 */

import {
  ModuleBuilder,
  SigBit,
  type Design,
  type Module,
  type SigSpec,
  type Wire,
} from "../netlist/index.js";
import { Result } from "../result.js";
import { Error, ErrorCode } from "./errors.js";

/**
 * A bit in Yosys JSON: a net number or a constant
 */
export type YosysBit = number | SigBit.State;

/** Canonical-bit preference: lower ranks win */
enum Rank {
  Input = 0,
  Internal = 1,
  Output = 2,
}

interface NamedBit {
  bit: SigBit.OfWire;
  rank: Rank;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isBit(value: unknown): value is YosysBit {
  return (
    (typeof value === "number" && Number.isInteger(value) && value >= 0) ||
    (typeof value === "string" && SigBit.isState(value))
  );
}

function isDirection(value: unknown): value is Wire.Direction {
  return value === "input" || value === "output" || value === "inout";
}

function bitsOf(value: unknown, where: string): YosysBit[] {
  if (!Array.isArray(value) || !value.every(isBit)) {
    throw invalid(`${where}: 'bits' must be a list of net numbers or constants`);
  }
  return value;
}

function invalid(message: string): Error {
  return new Error(ErrorCode.INVALID_NETLIST, message);
}

function entriesOf(
  value: unknown,
  field: string,
  where: string,
): [string, unknown][] {
  if (value === undefined) {
    return [];
  }
  if (!isRecord(value)) {
    throw invalid(`${where}: '${field}' must be a mapping`);
  }
  return Object.entries(value);
}

class ModuleImporter {
  private readonly builder: ModuleBuilder;
  private readonly named = new Map<number, NamedBit[]>();
  private readonly constants: { bit: SigBit.OfWire; value: SigBit.State }[] =
    [];
  private readonly declared = new Set<string>();

  constructor(
    private readonly name: string,
    private readonly source: Record<string, unknown>,
  ) {
    this.builder = new ModuleBuilder(name);
  }

  import(): Module {
    for (const [portName, port] of entriesOf(
      this.source.ports,
      "ports",
      this.name,
    )) {
      const where = `${this.name} port ${portName}`;
      if (!isRecord(port)) {
        throw invalid(`${where} must be a mapping`);
      }
      const direction = port.direction;
      if (!isDirection(direction)) {
        throw invalid(`${where}: unknown direction ${String(direction)}`);
      }
      const bits = bitsOf(port.bits, where);
      this.declared.add(portName);
      // Parameterized modules can leave a port with no bits
      if (bits.length === 0) {
        continue;
      }
      this.builder.port(portName, direction, bits.length);
      this.record(
        portName,
        bits,
        direction === "output" ? Rank.Output : Rank.Input,
      );
    }

    for (const [netName, net] of entriesOf(
      this.source.netnames,
      "netnames",
      this.name,
    )) {
      // Port names reappear among the net names
      if (this.declared.has(netName)) {
        continue;
      }
      const where = `${this.name} net ${netName}`;
      if (!isRecord(net)) {
        throw invalid(`${where} must be a mapping`);
      }
      const bits = bitsOf(net.bits, where);
      this.declared.add(netName);
      if (bits.length === 0) {
        continue;
      }
      this.builder.wire(netName, bits.length);
      this.record(netName, bits, Rank.Internal);
    }

    const canonical = this.aliasNets();

    for (const { bit, value } of this.constants) {
      this.builder.connect([bit], [SigBit.constant(value)]);
    }

    for (const [cellName, cell] of entriesOf(
      this.source.cells,
      "cells",
      this.name,
    )) {
      const where = `${this.name} cell ${cellName}`;
      if (!isRecord(cell) || typeof cell.type !== "string") {
        throw invalid(`${where} must be a mapping with a 'type'`);
      }

      const connections: Record<string, SigSpec> = {};
      for (const [role, bits] of entriesOf(
        cell.connections,
        "connections",
        where,
      )) {
        connections[role] = bitsOf(bits, `${where} port ${role}`).map((bit) =>
          typeof bit === "number"
            ? this.canonicalBit(canonical, bit)
            : SigBit.constant(bit),
        );
      }
      this.builder.cell(cellName, cell.type, connections);
    }

    return this.builder.build();
  }

  private record(wireName: string, bits: YosysBit[], rank: Rank): void {
    bits.forEach((net, offset) => {
      const bit = this.builder.wireBit(wireName, offset);
      if (typeof net !== "number") {
        this.constants.push({ bit, value: net });
        return;
      }
      const names = this.named.get(net) ?? [];
      names.push({ bit, rank });
      this.named.set(net, names);
    });
  }

  /**
   * Choose the canonical bit of every named net and alias the other names
   * to it
   */
  private aliasNets(): Map<number, SigBit.OfWire> {
    const canonical = new Map<number, SigBit.OfWire>();

    for (const [net, names] of this.named) {
      const chosen = names.reduce((best, candidate) =>
        candidate.rank < best.rank ? candidate : best,
      );
      canonical.set(net, chosen.bit);

      for (const { bit } of names) {
        if (bit !== chosen.bit) {
          this.builder.connect([bit], [chosen.bit]);
        }
      }
    }

    return canonical;
  }

  private canonicalBit(
    canonical: Map<number, SigBit.OfWire>,
    net: number,
  ): SigBit.OfWire {
    const known = canonical.get(net);
    if (known) {
      return known;
    }

    let wireName = `$net${net}`;
    while (this.declared.has(wireName)) {
      wireName = `$${wireName}`;
    }
    this.builder.wire(wireName);
    this.declared.add(wireName);

    const bit = this.builder.wireBit(wireName, 0);
    canonical.set(net, bit);
    return bit;
  }
}

/**
 * Build a design from a parsed Yosys JSON document
 */
export function loadYosys(document: unknown): Result<Design, Error> {
  if (!isRecord(document) || !isRecord(document.modules)) {
    return Result.err(
      invalid("Yosys netlist must have a 'modules' mapping"),
    );
  }

  const modules: Module[] = [];
  const errors: Error[] = [];

  for (const [name, source] of Object.entries(document.modules)) {
    try {
      if (!isRecord(source)) {
        throw invalid(`module ${name} must be a mapping`);
      }
      modules.push(new ModuleImporter(name, source).import());
    } catch (error) {
      errors.push(Error.from(error, { module: name }));
    }
  }

  return errors.length > 0 ? Result.err(errors) : Result.ok({ modules });
}
