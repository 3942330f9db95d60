/**
 * Base error type for netlist loading and analysis
 */

import { Severity } from "./result.js";

/**
 * Where in a netlist an error or warning applies
 */
export interface Locus {
  module?: string;
  cell?: string;
  wire?: string;
}

export class FlowError extends Error {
  public readonly code: string;
  public readonly locus?: Locus;
  public readonly severity: Severity;

  constructor(
    message: string,
    code: string,
    locus?: Locus,
    severity: Severity = Severity.Error,
  ) {
    super(message);
    this.name = "FlowError";
    this.code = code;
    this.locus = locus;
    this.severity = severity;
  }
}
