/**
 * Fluent construction of netlist modules
 */

import {
  SigBit,
  type Cell,
  type Module,
  type SigSpec,
  type Wire,
} from "./spec/index.js";
import { parseSigSpec } from "./sigspec.js";
import { Error, ErrorCode } from "./errors.js";

export type SignalInput = string | SigSpec;

export class ModuleBuilder {
  private readonly wires = new Map<string, Wire>();
  private readonly ports: string[] = [];
  private readonly connections: Module.Connection[] = [];
  private readonly cells: Cell[] = [];
  private readonly cellNames = new Set<string>();

  constructor(private readonly name: string) {}

  input(name: string, width = 1): this {
    return this.port(name, "input", width);
  }

  output(name: string, width = 1): this {
    return this.port(name, "output", width);
  }

  inout(name: string, width = 1): this {
    return this.port(name, "inout", width);
  }

  port(name: string, direction: Wire.Direction, width = 1): this {
    this.declare({
      name,
      width,
      input: direction === "input" || direction === "inout",
      output: direction === "output" || direction === "inout",
    });
    this.ports.push(name);
    return this;
  }

  wire(name: string, width = 1): this {
    this.declare({ name, width, input: false, output: false });
    return this;
  }

  /**
   * Alias `dest = src`; both sides resolve against wires declared so far
   */
  connect(dest: SignalInput, src: SignalInput): this {
    this.connections.push({ dest: this.sig(dest), src: this.sig(src) });
    return this;
  }

  cell(
    name: string,
    type: string,
    connections: Record<string, SignalInput>,
  ): this {
    if (this.cellNames.has(name)) {
      throw new Error(ErrorCode.INVALID_NETLIST, `duplicate cell ${name}`, {
        module: this.name,
        cell: name,
      });
    }
    this.cellNames.add(name);

    this.cells.push({
      name,
      type,
      connections: new Map(
        Object.entries(connections).map(([role, signal]) => [
          role,
          this.sig(signal),
        ]),
      ),
    });
    return this;
  }

  sig(signal: SignalInput): SigSpec {
    if (typeof signal !== "string") {
      return signal;
    }
    return parseSigSpec(signal, (name) => this.wires.get(name));
  }

  /**
   * Bit of a declared wire, looked up by name without parsing it
   */
  wireBit(name: string, offset: number): SigBit.OfWire {
    const wire = this.wires.get(name);
    if (!wire) {
      throw new Error(ErrorCode.UNKNOWN_WIRE, name, {
        module: this.name,
        wire: name,
      });
    }
    return SigBit.of(wire, offset);
  }

  bit(signal: SignalInput): SigBit {
    const spec = this.sig(signal);
    if (spec.length !== 1) {
      throw new Error(
        ErrorCode.INVALID_NETLIST,
        `expected a single bit, got ${spec.length}`,
        { module: this.name },
      );
    }
    return spec[0];
  }

  build(): Module {
    return {
      name: this.name,
      ports: [...this.ports],
      wires: new Map(this.wires),
      connections: [...this.connections],
      cells: [...this.cells],
    };
  }

  private declare(wire: Wire): void {
    if (this.wires.has(wire.name)) {
      throw new Error(
        ErrorCode.INVALID_NETLIST,
        `duplicate wire ${wire.name}`,
        { module: this.name, wire: wire.name },
      );
    }
    if (!Number.isInteger(wire.width) || wire.width < 1) {
      throw new Error(
        ErrorCode.INVALID_NETLIST,
        `wire ${wire.name} has invalid width ${wire.width}`,
        { module: this.name, wire: wire.name },
      );
    }
    this.wires.set(wire.name, wire);
  }
}
