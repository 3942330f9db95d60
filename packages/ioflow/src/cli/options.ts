import type { ExtendedOptionConfig } from "./cli-base.js";
import { isPrimitive, type Primitive } from "../graph/primitives.js";
import type { FormatOption } from "../loader/load.js";

export type OutputFormat = "json" | "text";

export const commonOptions: Record<string, ExtendedOptionConfig> = {
  format: {
    type: "string",
    short: "f",
    default: "json",
    argument: "<json|text>",
    description: "Report format",
  },
  "input-format": {
    type: "string",
    default: "auto",
    argument: "<auto|native|yosys>",
    description: "Netlist format",
  },
  module: {
    type: "string",
    short: "m",
    multiple: true,
    argument: "<name>",
    description: "Analyze only this module (repeatable)",
  },
  output: {
    type: "string",
    short: "o",
    argument: "<file>",
    description: "Write the report to a file instead of stdout",
  },
  verbose: {
    type: "boolean",
    short: "v",
    description: "Show progress messages",
  },
};

export const analysisOptions: Record<string, ExtendedOptionConfig> = {
  config: {
    type: "string",
    short: "c",
    argument: "<file>",
    description: "YAML configuration file",
  },
  "seq-marker": {
    type: "string",
    multiple: true,
    argument: "<text>",
    description: "Cell type substring marking state (repeatable)",
  },
  primitive: {
    type: "string",
    multiple: true,
    argument: "<kind>",
    description: "Recognized gate kind, e.g. NAND (repeatable)",
  },
};

export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === "json" || value === "text") {
    return value ?? "json";
  }
  throw new Error(`Unknown report format '${value}' (expected json or text)`);
}

export function parseInputFormat(value: string | undefined): FormatOption {
  if (
    value === undefined ||
    value === "auto" ||
    value === "native" ||
    value === "yosys"
  ) {
    return value ?? "auto";
  }
  throw new Error(
    `Unknown netlist format '${value}' (expected auto, native or yosys)`,
  );
}

export function parsePrimitives(values: string[]): Primitive[] {
  return values.map((value) => {
    const name = value.toUpperCase();
    if (!isPrimitive(name)) {
      throw new Error(`Unknown primitive '${value}'`);
    }
    return name;
  });
}
