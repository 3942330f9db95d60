/**
 * YAML configuration files
 *
 *   sequential-markers: [FF, DLATCH, DLE, SR, mem]
 *   primitives: [NOT, AND, OR, XOR, MUX, NAND]
 *   annotations: [$scopeinfo]
 */

import { promises as fs } from "fs";
import YAML from "yaml";

import { Result } from "../result.js";
import { isPrimitive, type Primitive } from "../graph/primitives.js";
import type { AnalysisOptions } from "./options.js";
import { ConfigError, ConfigErrorCode } from "./errors.js";

const KEYS = ["sequential-markers", "primitives", "annotations"] as const;

/**
 * Validate a parsed configuration document
 */
export function parseConfig(
  document: unknown,
): Result<Partial<AnalysisOptions>, ConfigError> {
  if (document === null || document === undefined) {
    return Result.ok({});
  }
  if (typeof document !== "object" || Array.isArray(document)) {
    return Result.err(
      new ConfigError(
        ConfigErrorCode.CONFIG_INVALID,
        "expected a mapping",
      ),
    );
  }

  const errors: ConfigError[] = [];
  const options: Partial<AnalysisOptions> = {};

  for (const [key, value] of Object.entries(document)) {
    if (!KEYS.some((known) => known === key)) {
      errors.push(
        new ConfigError(
          ConfigErrorCode.CONFIG_INVALID,
          `unknown key '${key}'`,
        ),
      );
      continue;
    }

    const list = stringList(value);
    if (!list) {
      errors.push(
        new ConfigError(
          ConfigErrorCode.CONFIG_INVALID,
          `'${key}' must be a list of strings`,
        ),
      );
      continue;
    }

    switch (key) {
      case "sequential-markers":
        options.sequentialMarkers = list;
        break;
      case "annotations":
        options.annotations = list;
        break;
      case "primitives": {
        const primitives: Primitive[] = [];
        for (const name of list) {
          if (isPrimitive(name)) {
            primitives.push(name);
          } else {
            errors.push(
              new ConfigError(
                ConfigErrorCode.CONFIG_INVALID,
                `unknown primitive '${name}'`,
              ),
            );
          }
        }
        options.primitives = primitives;
        break;
      }
    }
  }

  return errors.length > 0 ? Result.err(errors) : Result.ok(options);
}

export async function loadConfig(
  path: string,
): Promise<Result<Partial<AnalysisOptions>, ConfigError>> {
  let text: string;
  try {
    text = await fs.readFile(path, "utf-8");
  } catch (error) {
    return Result.err(
      new ConfigError(
        ConfigErrorCode.CONFIG_UNREADABLE,
        `${path}: ${error instanceof Error ? error.message : String(error)}`,
      ),
    );
  }

  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (error) {
    return Result.err(
      new ConfigError(
        ConfigErrorCode.CONFIG_INVALID,
        `Malformed YAML in ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ),
    );
  }

  return parseConfig(document);
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const list: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") {
      return undefined;
    }
    list.push(item);
  }
  return list;
}
