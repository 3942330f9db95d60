/**
 * Sequentiality classification pass
 */

import type { Module } from "../netlist/index.js";
import type { Pass } from "../analyzer/pass.js";
import { Result, Severity } from "../result.js";
import { classifyModule, type Classification } from "./classifier.js";
import { ClassifyError, ErrorCode } from "./errors.js";

export const pass: Pass<{
  needs: {
    module: Module;
    options: {
      sequentialMarkers: readonly string[];
    };
  };
  adds: {
    classification: Classification;
  };
  error: never;
}> = {
  async run({ module, options }) {
    const classification = classifyModule(module, options.sequentialMarkers);

    if (!classification.cell) {
      return Result.ok({ classification });
    }

    const { name, type } = classification.cell;
    return Result.okWith(
      { classification },
      {
        [Severity.Info]: [
          new ClassifyError(ErrorCode.SEQUENTIAL_CELL_FOUND, type, {
            module: module.name,
            cell: name,
          }),
        ],
      },
    );
  },
};
