/**
 * Netlist loading entry points
 */

import YAML from "yaml";

import type { Design } from "../netlist/index.js";
import { Result } from "../result.js";
import { Error, ErrorCode } from "./errors.js";
import { loadNative } from "./native.js";
import { loadYosys } from "./yosys.js";

export type NetlistFormat = "native" | "yosys";
export type FormatOption = NetlistFormat | "auto";

/**
 * Parse YAML or JSON text into a plain document
 */
export function parseDocument(source: string): Result<unknown, Error> {
  try {
    return Result.ok(YAML.parse(source));
  } catch (error) {
    return Result.err(
      new Error(
        ErrorCode.PARSE_ERROR,
        error instanceof globalThis.Error ? error.message : String(error),
      ),
    );
  }
}

/**
 * Tell the two formats apart by the shape of `modules`: a list in native
 * documents, a mapping keyed by module name in Yosys output
 */
export function detectFormat(document: unknown): NetlistFormat | undefined {
  if (typeof document !== "object" || document === null) {
    return undefined;
  }
  const modules: unknown = Reflect.get(document, "modules");
  if (Array.isArray(modules)) {
    return "native";
  }
  if (typeof modules === "object" && modules !== null) {
    return "yosys";
  }
  return undefined;
}

export function loadDocument(
  document: unknown,
  format: FormatOption = "auto",
): Result<Design, Error> {
  const resolved = format === "auto" ? detectFormat(document) : format;

  switch (resolved) {
    case "native":
      return loadNative(document);
    case "yosys":
      return loadYosys(document);
    case undefined:
      return Result.err(
        new Error(
          ErrorCode.UNKNOWN_FORMAT,
          "expected a 'modules' list or mapping",
        ),
      );
  }
}

export function loadNetlist(
  source: string,
  format: FormatOption = "auto",
): Result<Design, Error> {
  const document = parseDocument(source);
  if (!document.success) {
    return document;
  }
  return loadDocument(document.value, format);
}
