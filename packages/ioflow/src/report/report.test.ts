import { describe, it, expect } from "vitest";
import { ModuleBuilder, SigBit, type Wire } from "../netlist/index.js";
import { assembleReport, describeBit, toRecord } from "./report.js";

const a: Wire = { name: "a", width: 2, input: true, output: false };
const io: Wire = { name: "io", width: 1, input: true, output: true };

const module = new ModuleBuilder("m")
  .input("a", 2)
  .inout("io")
  .output("y")
  .wire("n")
  .build();

describe("assembleReport", () => {
  it("lists port bits in port order, LSB first", () => {
    const report = assembleReport(module, { sequential: false });

    expect(report.inputs).toEqual([
      { name: "a", offset: 0, width: 2 },
      { name: "a", offset: 1, width: 2 },
      { name: "io", offset: 0, width: 1 },
    ]);
    expect(report.outputs).toEqual([
      { name: "io", offset: 0, width: 1 },
      { name: "y", offset: 0, width: 1 },
    ]);
  });

  it("keys dependencies by output bit label", () => {
    const y = module.wires.get("y");
    if (!y) throw new Error("missing output");

    const report = assembleReport(module, { sequential: false }, [
      {
        bit: SigBit.of(y, 0),
        dependencies: [SigBit.of(a, 1), SigBit.of(io, 0)],
      },
    ]);

    expect(report.isSequential).toBe(false);
    expect(report.dependencies).toEqual({
      "y[0]": [
        { name: "a", offset: 1, width: 2 },
        { name: "io", offset: 0, width: 1 },
      ],
    });
  });

  it("gives combinational modules a dependency map even when empty", () => {
    expect(assembleReport(module, { sequential: false }).dependencies).toEqual(
      {},
    );
  });

  it("leaves dependencies out for sequential modules", () => {
    const report = assembleReport(
      module,
      { sequential: true, cell: { name: "r", type: "$_DFF_P_", marker: "FF" } },
      [{ bit: SigBit.of(io, 0), dependencies: [] }],
    );

    expect(report.isSequential).toBe(true);
    expect("dependencies" in report).toBe(false);
  });
});

describe("toRecord", () => {
  it("uses the serialized field names", () => {
    const record = toRecord(
      assembleReport(module, { sequential: false }, [
        { bit: SigBit.of(io, 0), dependencies: [SigBit.of(io, 0)] },
      ]),
    );

    expect(Object.keys(record)).toEqual([
      "module",
      "is_sequential",
      "inputs",
      "outputs",
      "dependencies",
    ]);
    expect(record.module).toBe("m");
    expect(record.is_sequential).toBe(false);
    expect(record.dependencies).toEqual({
      "io[0]": [{ name: "io", offset: 0, width: 1 }],
    });
  });

  it("omits the dependencies key for sequential modules", () => {
    const record = toRecord(assembleReport(module, { sequential: true }));
    expect(Object.keys(record)).toEqual([
      "module",
      "is_sequential",
      "inputs",
      "outputs",
    ]);
  });
});

describe("describeBit", () => {
  it("carries the wire width", () => {
    expect(describeBit(SigBit.of(a, 1))).toEqual({
      name: "a",
      offset: 1,
      width: 2,
    });
  });
});
