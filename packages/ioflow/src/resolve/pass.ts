/**
 * Output dependency resolution pass
 */

import type { Module } from "../netlist/index.js";
import type { FanIn } from "../graph/index.js";
import type { Pass } from "../analyzer/pass.js";
import { Result } from "../result.js";
import { resolveOutputs, type OutputDependency } from "./resolver.js";
import type { ResolveError } from "./errors.js";

export const pass: Pass<{
  needs: {
    module: Module;
    fanIn: FanIn;
  };
  adds: {
    dependencies: OutputDependency[];
  };
  error: ResolveError;
}> = {
  async run({ module, fanIn }) {
    return Result.map(resolveOutputs(module, fanIn), (dependencies) => ({
      dependencies,
    }));
  },
};
