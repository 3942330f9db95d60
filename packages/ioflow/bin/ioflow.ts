#!/usr/bin/env tsx

/**
 * Report the primary-input dependencies of every output bit of the
 * combinational modules in a netlist
 */

import { handleAnalyzeCommand } from "../src/cli/index.js";

process.exitCode = await handleAnalyzeCommand();
