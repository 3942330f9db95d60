/**
 * Analysis drivers
 *
 * A module is analyzed in two phases: classification, then (for
 * combinational modules only) fan-in construction and dependency
 * resolution. Modules share no state, so each is analyzed on its own.
 */

import { Design, type Module } from "../netlist/index.js";
import type { FlowError } from "../errors.js";
import { Result, Severity } from "../result.js";
import { resolveOptions, type AnalysisOptions } from "../config/options.js";
import { pass as classifyPass } from "../classify/pass.js";
import { pass as graphPass } from "../graph/pass.js";
import { pass as resolvePass } from "../resolve/pass.js";
import { pass as loadPass } from "../loader/pass.js";
import type { FormatOption } from "../loader/load.js";
import { assembleReport, type ModuleReport } from "../report/report.js";
import { AnalyzerError, ErrorCode } from "./errors.js";

export interface ModuleFailure {
  module: string;
  errors: FlowError[];
}

export interface DesignAnalysis {
  /** Reports of the modules that were analyzed, in design order */
  reports: ModuleReport[];
  /** Modules whose analysis failed */
  failures: ModuleFailure[];
  /** Info messages and warnings of every module, module by module */
  messages: FlowError[];
}

export interface SourceOptions {
  format?: FormatOption;
  /** Names of the modules to analyze; all modules when absent or empty */
  modules?: readonly string[];
  options?: Partial<AnalysisOptions>;
}

export async function analyzeModule(
  module: Module,
  options: Partial<AnalysisOptions> = {},
): Promise<Result<ModuleReport, FlowError>> {
  const resolved = resolveOptions(options);
  const locus = { module: module.name };

  const classified = await classifyPass.run({ module, options: resolved });
  if (!classified.success) {
    return classified;
  }
  const { classification } = classified.value;

  if (classification.sequential) {
    return Result.merge(
      [classified],
      Result.okWith(assembleReport(module, classification), {
        [Severity.Warning]: [
          new AnalyzerError(
            ErrorCode.SEQUENTIAL_MODULE_SKIPPED,
            module.name,
            locus,
            Severity.Warning,
          ),
        ],
      }),
    );
  }

  const analysing = Result.okWith(null, {
    [Severity.Info]: [
      new AnalyzerError(
        ErrorCode.COMBINATIONAL_MODULE,
        module.name,
        locus,
        Severity.Info,
      ),
    ],
  });

  const graph = await graphPass.run({ module, options: resolved });
  if (!graph.success) {
    return Result.merge([classified, analysing], graph);
  }

  const resolution = await resolvePass.run({
    module,
    fanIn: graph.value.fanIn,
  });
  if (!resolution.success) {
    return Result.merge([classified, analysing, graph], resolution);
  }

  return Result.merge(
    [classified, analysing, graph, resolution],
    Result.ok(
      assembleReport(module, classification, resolution.value.dependencies),
    ),
  );
}

/**
 * Modules of a design by name, in design order
 */
export function selectModules(
  design: Design,
  names: readonly string[] = [],
): Result<Module[], AnalyzerError> {
  if (names.length === 0) {
    return Result.ok(design.modules);
  }

  const unknown = names.filter((name) => !Design.find(design, name));
  if (unknown.length > 0) {
    return Result.err(
      unknown.map(
        (name) =>
          new AnalyzerError(ErrorCode.UNKNOWN_MODULE, name, { module: name }),
      ),
    );
  }

  return Result.ok(
    design.modules.filter((module) => names.includes(module.name)),
  );
}

/**
 * Analyze every module of a design; a failing module does not stop the
 * others
 */
export async function analyzeDesign(
  design: Design,
  options: Partial<AnalysisOptions> = {},
): Promise<DesignAnalysis> {
  const results = await Promise.all(
    design.modules.map((module) => analyzeModule(module, options)),
  );

  const analysis: DesignAnalysis = { reports: [], failures: [], messages: [] };

  results.forEach((result, index) => {
    analysis.messages.push(...Result.infos(result), ...Result.warnings(result));
    if (result.success) {
      analysis.reports.push(result.value);
    } else {
      analysis.failures.push({
        module: design.modules[index].name,
        errors: Result.errors(result),
      });
    }
  });

  return analysis;
}

/**
 * Load a netlist and analyze the selected modules
 */
export async function analyzeSource(
  source: string,
  { format, modules, options }: SourceOptions = {},
): Promise<Result<DesignAnalysis, FlowError>> {
  const loaded = await loadPass.run({ source, format });
  if (!loaded.success) {
    return loaded;
  }

  const selected = selectModules(loaded.value.design, modules);
  if (!selected.success) {
    return selected;
  }

  return Result.ok(await analyzeDesign({ modules: selected.value }, options));
}
