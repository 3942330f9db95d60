/**
 * Native netlist documents (YAML or JSON)
 *
 *   modules:
 *     - name: half_adder
 *       ports:
 *         - { name: A, direction: input }
 *         - { name: S, direction: output, width: 2 }
 *       wires:
 *         - { name: n1 }
 *       connections:
 *         - { dest: "S[1]", src: n1 }
 *       cells:
 *         - { name: g1, type: $_AND_, connections: { A: A, B: B, Y: n1 } }
 *
 * Signals are written as signal expressions (see netlist/sigspec.ts).
 */

import { ModuleBuilder, type Design, type Module } from "../netlist/index.js";
import { Result } from "../result.js";
import { Error, ErrorCode } from "./errors.js";

const DIRECTIONS = ["input", "output", "inout"] as const;

const MODULE_KEYS = ["name", "ports", "wires", "connections", "cells"];
const PORT_KEYS = ["name", "direction", "width"];
const WIRE_KEYS = ["name", "width"];
const CONNECTION_KEYS = ["dest", "src"];
const CELL_KEYS = ["name", "type", "connections"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function listOf(value: unknown, field: string, where: string): unknown[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw invalid(`${where}: '${field}' must be a list`);
  }
  return value;
}

function stringOf(value: unknown, field: string, where: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw invalid(`${where}: '${field}' must be a non-empty string`);
  }
  return value;
}

function widthOf(value: unknown, where: string): number {
  if (value === undefined) {
    return 1;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw invalid(`${where}: 'width' must be a positive integer`);
  }
  return value;
}

function directionOf(
  value: unknown,
  where: string,
): (typeof DIRECTIONS)[number] {
  const direction = DIRECTIONS.find((direction) => direction === value);
  if (!direction) {
    throw invalid(`${where}: 'direction' must be one of ${DIRECTIONS.join(", ")}`);
  }
  return direction;
}

function checkKeys(
  record: Record<string, unknown>,
  known: readonly string[],
  where: string,
): void {
  const unknown = Object.keys(record).filter((key) => !known.includes(key));
  if (unknown.length > 0) {
    throw invalid(
      `${where}: unknown ${unknown.length === 1 ? "key" : "keys"} ${unknown
        .map((key) => `'${key}'`)
        .join(", ")}`,
    );
  }
}

function invalid(message: string): Error {
  return new Error(ErrorCode.INVALID_NETLIST, message);
}

function loadModule(entry: unknown, index: number): Module {
  if (!isRecord(entry)) {
    throw invalid(`module #${index} must be a mapping`);
  }

  const name = stringOf(entry.name, "name", `module #${index}`);
  checkKeys(entry, MODULE_KEYS, name);
  const builder = new ModuleBuilder(name);

  for (const [i, port] of listOf(entry.ports, "ports", name).entries()) {
    const where = `${name} port #${i}`;
    if (!isRecord(port)) {
      throw invalid(`${where} must be a mapping`);
    }
    checkKeys(port, PORT_KEYS, where);
    builder.port(
      stringOf(port.name, "name", where),
      directionOf(port.direction, where),
      widthOf(port.width, where),
    );
  }

  for (const [i, wire] of listOf(entry.wires, "wires", name).entries()) {
    const where = `${name} wire #${i}`;
    if (!isRecord(wire)) {
      throw invalid(`${where} must be a mapping`);
    }
    checkKeys(wire, WIRE_KEYS, where);
    builder.wire(stringOf(wire.name, "name", where), widthOf(wire.width, where));
  }

  for (const [i, connection] of listOf(
    entry.connections,
    "connections",
    name,
  ).entries()) {
    const where = `${name} connection #${i}`;
    if (!isRecord(connection)) {
      throw invalid(`${where} must be a mapping`);
    }
    checkKeys(connection, CONNECTION_KEYS, where);
    builder.connect(
      stringOf(connection.dest, "dest", where),
      stringOf(connection.src, "src", where),
    );
  }

  for (const [i, cell] of listOf(entry.cells, "cells", name).entries()) {
    const where = `${name} cell #${i}`;
    if (!isRecord(cell)) {
      throw invalid(`${where} must be a mapping`);
    }
    checkKeys(cell, CELL_KEYS, where);
    if (!isRecord(cell.connections)) {
      throw invalid(`${where}: 'connections' must be a mapping`);
    }

    const connections: Record<string, string> = {};
    for (const [role, signal] of Object.entries(cell.connections)) {
      connections[role] = stringOf(signal, `connections.${role}`, where);
    }

    builder.cell(
      cell.name === undefined ? `$cell${i}` : stringOf(cell.name, "name", where),
      stringOf(cell.type, "type", where),
      connections,
    );
  }

  return builder.build();
}

/**
 * Build a design from a parsed native document
 */
export function loadNative(document: unknown): Result<Design, Error> {
  if (!isRecord(document) || !Array.isArray(document.modules)) {
    return Result.err(
      invalid("Native netlist must have a 'modules' list"),
    );
  }

  const modules: Module[] = [];
  const errors: Error[] = [];
  const names = new Set<string>();

  document.modules.forEach((entry: unknown, index: number) => {
    const name =
      isRecord(entry) && typeof entry.name === "string"
        ? entry.name
        : `#${index}`;
    try {
      const module = loadModule(entry, index);
      if (names.has(module.name)) {
        throw invalid(`duplicate module ${module.name}`);
      }
      names.add(module.name);
      modules.push(module);
    } catch (error) {
      errors.push(Error.from(error, { module: name }));
    }
  });

  return errors.length > 0 ? Result.err(errors) : Result.ok({ modules });
}
