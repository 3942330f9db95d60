import { describe, it, expect } from "vitest";
import YAML from "yaml";
import { SigBit } from "../netlist/index.js";
import { Result } from "../result.js";
import { loadNative } from "./native.js";
import { ErrorCode } from "./errors.js";
import "../../test/matchers.js";

const halfAdder = YAML.parse(`
modules:
  - name: half_adder
    ports:
      - { name: A, direction: input }
      - { name: B, direction: input }
      - { name: S, direction: output }
      - { name: C, direction: output }
    cells:
      - { name: x1, type: $_XOR_, connections: { A: A, B: B, Y: S } }
      - { type: $_AND_, connections: { A: A, B: B, Y: C } }
  - name: pass
    ports:
      - { name: D, direction: input, width: 4 }
      - { name: Q, direction: output, width: 4 }
      - { name: T, direction: inout }
    wires:
      - { name: n, width: 4 }
    connections:
      - { dest: n, src: D }
      - { dest: Q, src: "{n[3:1], 1'b0}" }
`);

describe("loadNative", () => {
  it("builds every module", () => {
    const result = loadNative(halfAdder);
    expect(result.success).toBe(true);
    if (!result.success) throw new Error("load failed");

    const [adder, pass] = result.value.modules;
    expect(adder.name).toBe("half_adder");
    expect(adder.ports).toEqual(["A", "B", "S", "C"]);
    expect(adder.cells.map(({ name, type }) => [name, type])).toEqual([
      ["x1", "$_XOR_"],
      ["$cell1", "$_AND_"],
    ]);

    expect(pass.wires.get("D")).toEqual({
      name: "D",
      width: 4,
      input: true,
      output: false,
    });
    expect(pass.wires.get("T")).toEqual({
      name: "T",
      width: 1,
      input: true,
      output: true,
    });
    expect(pass.connections[1].src.map(SigBit.label)).toEqual([
      "1'b0",
      "n[1]",
      "n[2]",
      "n[3]",
    ]);
  });

  it("requires a modules list", () => {
    expect(loadNative({ modules: {} })).toHaveMessage({
      code: ErrorCode.INVALID_NETLIST,
      message: "Native netlist must have a 'modules' list",
    });
  });

  it("reports the errors of every broken module", () => {
    const result = loadNative({
      modules: [
        { name: "a", ports: [{ name: "x", direction: "sideways" }] },
        { name: "b", ports: [{ name: "x", direction: "input", width: 0 }] },
        { name: "c", connections: [{ dest: "y", src: "x" }] },
        { name: "ok" },
      ],
    });

    expect(result.success).toBe(false);
    const errors = Result.errors(result);
    expect(errors.map(({ code }) => code)).toEqual([
      ErrorCode.INVALID_NETLIST,
      ErrorCode.INVALID_NETLIST,
      ErrorCode.INVALID_NETLIST,
    ]);
    expect(errors.map(({ locus }) => locus?.module)).toEqual(["a", "b", "c"]);
    expect(errors[0]?.message).toBe(
      "Invalid netlist: a port #0: 'direction' must be one of input, output, inout",
    );
    expect(errors[1]?.message).toBe(
      "Invalid netlist: b port #0: 'width' must be a positive integer",
    );
    expect(errors[2]?.message).toBe(
      "Invalid netlist: Reference to undeclared wire: y",
    );
  });

  it("rejects misspelled module keys", () => {
    const result = loadNative({
      modules: [
        {
          name: "alias",
          ports: [
            { name: "A", direction: "input" },
            { name: "Y", direction: "output" },
          ],
          conections: [{ dest: "Y", src: "A" }],
        },
      ],
    });

    expect(result.success).toBe(false);
    expect(Result.errors(result).map(({ message }) => message)).toEqual([
      "Invalid netlist: alias: unknown key 'conections'",
    ]);
  });

  it("rejects unknown keys in ports, wires, connections and cells", () => {
    const result = loadNative({
      modules: [
        { name: "p", ports: [{ name: "A", direction: "input", size: 2 }] },
        { name: "w", wires: [{ name: "n", widht: 2, signed: true }] },
        {
          name: "c",
          ports: [{ name: "A", direction: "input" }],
          wires: [{ name: "n" }],
          connections: [{ dest: "n", source: "A" }],
        },
        {
          name: "g",
          cells: [{ name: "g1", type: "$_NOT_", conn: {}, connections: {} }],
        },
      ],
    });

    const errors = Result.errors(result);
    expect(errors.map(({ message, locus }) => [locus?.module, message])).toEqual([
      ["p", "Invalid netlist: p port #0: unknown key 'size'"],
      ["w", "Invalid netlist: w wire #0: unknown keys 'widht', 'signed'"],
      ["c", "Invalid netlist: c connection #0: unknown key 'source'"],
      ["g", "Invalid netlist: g cell #0: unknown key 'conn'"],
    ]);
  });

  it("rejects duplicate module names", () => {
    const result = loadNative({ modules: [{ name: "m" }, { name: "m" }] });
    expect(result).toHaveMessage({
      code: ErrorCode.INVALID_NETLIST,
      message: "duplicate module m",
    });
  });

  it("rejects modules without a name", () => {
    expect(loadNative({ modules: [{ ports: [] }] })).toHaveMessage({
      message: "module #0: 'name' must be a non-empty string",
    });
  });
});
