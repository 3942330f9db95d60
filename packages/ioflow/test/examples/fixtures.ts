/**
 * Example netlist fixtures
 *
 * Each fixture is a netlist with an optional top-level `expect` mapping
 * from module name to either `sequential` or the expected dependencies of
 * every output bit:
 *
 *   expect:
 *     half_adder:
 *       "S[0]": ["A[0]", "B[0]"]
 *     counter: sequential
 *
 * YAML fixtures may also carry comment annotations:
 *   # @expect-error CODE    - Expected to fail with this error code
 */

import { promises as fs } from "fs";
import path from "path";
import { glob } from "glob";
import YAML from "yaml";

export type ModuleExpectation = "sequential" | Record<string, string[]>;

export interface Fixture {
  relativePath: string;
  source: string;
  annotations: {
    expectErrors: string[];
  };
  expectations: Map<string, ModuleExpectation>;
}

function parseAnnotations(source: string): Fixture["annotations"] {
  return {
    expectErrors: [...source.matchAll(/# @expect-error\s+(\S+)/g)].map(
      (match) => match[1],
    ),
  };
}

function isStringList(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((item) => typeof item === "string")
  );
}

function parseExpectations(
  relativePath: string,
  source: string,
): Map<string, ModuleExpectation> {
  const document: unknown = YAML.parse(source);
  const expectations = new Map<string, ModuleExpectation>();

  const block =
    typeof document === "object" && document !== null
      ? Reflect.get(document, "expect")
      : undefined;
  if (block === undefined) {
    return expectations;
  }
  if (typeof block !== "object" || block === null) {
    throw new Error(`${relativePath}: 'expect' must be a mapping`);
  }

  for (const [module, expected] of Object.entries(block)) {
    if (expected === "sequential") {
      expectations.set(module, expected);
      continue;
    }
    if (typeof expected !== "object" || expected === null) {
      throw new Error(`${relativePath}: bad expectation for ${module}`);
    }

    const dependencies: Record<string, string[]> = {};
    for (const [output, inputs] of Object.entries(expected)) {
      if (!isStringList(inputs)) {
        throw new Error(`${relativePath}: bad dependencies for ${output}`);
      }
      dependencies[output] = inputs;
    }
    expectations.set(module, dependencies);
  }

  return expectations;
}

export async function loadFixtures(directory: string): Promise<Fixture[]> {
  const files = await glob("**/*.{yaml,yml,json}", { cwd: directory });
  const fixtures: Fixture[] = [];

  for (const relativePath of files.sort()) {
    const source = await fs.readFile(path.join(directory, relativePath), "utf-8");

    fixtures.push({
      relativePath,
      source,
      annotations: parseAnnotations(source),
      expectations: parseExpectations(relativePath, source),
    });
  }

  return fixtures;
}
