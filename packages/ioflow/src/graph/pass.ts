/**
 * Fan-in graph pass
 */

import type { Module } from "../netlist/index.js";
import type { Pass } from "../analyzer/pass.js";
import { Result } from "../result.js";
import { buildFanIn, type FanIn, type GraphOptions } from "./fanin.js";
import type { Error } from "./errors.js";

export const pass: Pass<{
  needs: {
    module: Module;
    options: GraphOptions;
  };
  adds: {
    fanIn: FanIn;
  };
  error: Error;
}> = {
  async run({ module, options }) {
    return Result.map(buildFanIn(module, options), (fanIn) => ({ fanIn }));
  },
};
