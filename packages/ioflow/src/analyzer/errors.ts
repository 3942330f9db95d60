/**
 * Analysis driver errors and diagnostics
 */

import { FlowError, type Locus } from "../errors.js";
import { Severity } from "../result.js";

export enum ErrorCode {
  UNKNOWN_MODULE = "ANALYZE001",
  SEQUENTIAL_MODULE_SKIPPED = "ANALYZE101",
  COMBINATIONAL_MODULE = "ANALYZE102",
}

export const ErrorMessages = {
  [ErrorCode.UNKNOWN_MODULE]: "Unknown module",
  [ErrorCode.SEQUENTIAL_MODULE_SKIPPED]:
    "No I/O flow analysis for sequential module",
  [ErrorCode.COMBINATIONAL_MODULE]: "Analysing combinational module",
};

export class AnalyzerError extends FlowError {
  constructor(
    code: ErrorCode,
    message?: string,
    locus?: Locus,
    severity: Severity = Severity.Error,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, locus, severity);
  }
}
