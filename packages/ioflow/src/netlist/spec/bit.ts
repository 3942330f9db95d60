import type { Wire } from "./wire.js";

/**
 * One bit of a module: either a bit of a declared wire or a constant
 * (also used for bits with no driving wire)
 */
export type SigBit = SigBit.OfWire | SigBit.Const;

/**
 * A multi-bit signal expression, LSB first
 */
export type SigSpec = SigBit[];

export namespace SigBit {
  export interface OfWire {
    kind: "wire";
    wire: Wire;
    offset: number;
  }

  export interface Const {
    kind: "const";
    value: State;
  }

  export const States = ["0", "1", "x", "z"] as const;
  export type State = (typeof States)[number];

  export function of(wire: Wire, offset: number): OfWire {
    if (!Number.isInteger(offset) || offset < 0 || offset >= wire.width) {
      throw new RangeError(
        `Bit ${offset} out of range for wire ${wire.name} of width ${wire.width}`,
      );
    }
    return { kind: "wire", wire, offset };
  }

  export function constant(value: State): Const {
    return { kind: "const", value };
  }

  export function isWire(bit: SigBit): bit is OfWire {
    return bit.kind === "wire";
  }

  export function isState(value: string): value is State {
    return States.some((state) => state === value);
  }

  /**
   * Map key; two wire bits share a key iff they name the same wire and offset
   */
  export function key(bit: SigBit): string {
    return bit.kind === "wire"
      ? `${bit.offset}:${bit.wire.name}`
      : `'${bit.value}`;
  }

  /**
   * Human-readable form, `name[offset]` for wire bits
   */
  export function label(bit: SigBit): string {
    return bit.kind === "wire"
      ? `${bit.wire.name}[${bit.offset}]`
      : `1'b${bit.value}`;
  }

  export function equals(a: SigBit, b: SigBit): boolean {
    return key(a) === key(b);
  }

  /**
   * Total order: constants first (by value), then wire bits by wire name
   * and offset
   */
  export function compare(a: SigBit, b: SigBit): number {
    if (a.kind === "const" || b.kind === "const") {
      if (a.kind === "const" && b.kind === "const") {
        return States.indexOf(a.value) - States.indexOf(b.value);
      }
      return a.kind === "const" ? -1 : 1;
    }
    if (a.wire.name !== b.wire.name) {
      return a.wire.name < b.wire.name ? -1 : 1;
    }
    return a.offset - b.offset;
  }
}
