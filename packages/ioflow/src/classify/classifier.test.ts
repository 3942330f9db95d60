import { describe, it, expect } from "vitest";
import { ModuleBuilder } from "../netlist/index.js";
import { defaultSequentialMarkers } from "../config/options.js";
import { Severity } from "../result.js";
import { classifyModule } from "./classifier.js";
import { pass } from "./pass.js";
import { ErrorCode } from "./errors.js";
import "../../test/matchers.js";

function withCells(...types: string[]) {
  const builder = new ModuleBuilder("m").input("a").output("y");
  types.forEach((type, index) => builder.cell(`c${index}`, type, {}));
  return builder.build();
}

describe("classifyModule", () => {
  it("treats a module of plain gates as combinational", () => {
    const module = withCells("$_AND_", "$_NOT_", "$scopeinfo");
    expect(classifyModule(module, defaultSequentialMarkers)).toEqual({
      sequential: false,
    });
  });

  it("names the first cell that matches a marker", () => {
    const module = withCells("$_AND_", "$_DFF_P_", "$_DLATCH_N_");
    expect(classifyModule(module, defaultSequentialMarkers)).toEqual({
      sequential: true,
      cell: { name: "c1", type: "$_DFF_P_", marker: "FF" },
    });
  });

  it("matches markers anywhere in the type", () => {
    for (const type of ["$dffe", "$_SR_PP_", "$mem_v2", "$_DLATCHSR_PPP_"]) {
      const { sequential } = classifyModule(withCells(type), [
        "dff",
        ...defaultSequentialMarkers,
      ]);
      expect(sequential).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(classifyModule(withCells("$dff"), ["FF"]).sequential).toBe(false);
  });

  it("ignores empty markers", () => {
    expect(classifyModule(withCells("$_AND_"), [""]).sequential).toBe(false);
  });

  it("classifies everything as combinational without markers", () => {
    expect(classifyModule(withCells("$_DFF_P_"), []).sequential).toBe(false);
  });
});

describe("classification pass", () => {
  it("reports the sequential cell it found", async () => {
    const result = await pass.run({
      module: withCells("$_DFF_P_"),
      options: { sequentialMarkers: defaultSequentialMarkers },
    });

    expect(result.success).toBe(true);
    expect(result).toHaveMessage({
      severity: Severity.Info,
      code: ErrorCode.SEQUENTIAL_CELL_FOUND,
      message: "Sequential cell found: $_DFF_P_",
    });
  });

  it("adds no messages for combinational modules", async () => {
    const result = await pass.run({
      module: withCells("$_OR_"),
      options: { sequentialMarkers: defaultSequentialMarkers },
    });

    expect(result).toEqual({
      success: true,
      value: { classification: { sequential: false } },
      messages: {},
    });
  });
});
