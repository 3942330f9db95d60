/**
 * Dependency resolution errors
 */

import { FlowError, type Locus } from "../errors.js";

export enum ErrorCode {
  CYCLE_DETECTED = "RESOLVE001",
}

export const ErrorMessages = {
  [ErrorCode.CYCLE_DETECTED]: "Combinational cycle detected",
};

export class ResolveError extends FlowError {
  /** Bit labels along the cycle, each driven by the next */
  public readonly cycle: string[];

  constructor(cycle: string[], locus?: Locus) {
    super(
      `${ErrorMessages[ErrorCode.CYCLE_DETECTED]}: ${cycle.join(" <- ")}`,
      ErrorCode.CYCLE_DETECTED,
      locus,
    );
    this.cycle = cycle;
  }
}
