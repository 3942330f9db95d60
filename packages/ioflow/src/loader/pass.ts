/**
 * Netlist loading pass - converts netlist text to a design
 */

import type { Design } from "../netlist/index.js";
import type { Pass } from "../analyzer/pass.js";
import { Result } from "../result.js";
import type { Error } from "./errors.js";
import { loadNetlist, type FormatOption } from "./load.js";

export const pass: Pass<{
  needs: {
    source: string;
    format?: FormatOption;
  };
  adds: {
    design: Design;
  };
  error: Error;
}> = {
  async run({ source, format }) {
    return Result.map(loadNetlist(source, format), (design) => ({ design }));
  },
};
