import { defaultPrimitives, type Primitive } from "../graph/primitives.js";

/**
 * Settings shared by every phase of the analysis
 */
export interface AnalysisOptions {
  /**
   * Substrings of cell types that mark a state-holding cell; a module with
   * any such cell is not analyzed
   */
  sequentialMarkers: readonly string[];
  /** Gate kinds the graph builder accepts */
  primitives: readonly Primitive[];
  /** Cell types skipped entirely by the graph builder */
  annotations: readonly string[];
}

export const defaultSequentialMarkers: readonly string[] = [
  "FF",
  "DLATCH",
  "DLE",
  "SR",
  "mem",
];

export const defaultAnnotations: readonly string[] = ["$scopeinfo"];

export const defaultOptions: AnalysisOptions = {
  sequentialMarkers: defaultSequentialMarkers,
  primitives: defaultPrimitives,
  annotations: defaultAnnotations,
};

export function resolveOptions(
  options: Partial<AnalysisOptions> = {},
): AnalysisOptions {
  return {
    sequentialMarkers:
      options.sequentialMarkers ?? defaultOptions.sequentialMarkers,
    primitives: options.primitives ?? defaultOptions.primitives,
    annotations: options.annotations ?? defaultOptions.annotations,
  };
}
