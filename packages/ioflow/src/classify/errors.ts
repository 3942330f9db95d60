/**
 * Sequentiality classification diagnostics
 */

import { FlowError, type Locus } from "../errors.js";
import { Severity } from "../result.js";

export enum ErrorCode {
  SEQUENTIAL_CELL_FOUND = "CLASSIFY101",
}

export const ErrorMessages = {
  [ErrorCode.SEQUENTIAL_CELL_FOUND]: "Sequential cell found",
};

export class ClassifyError extends FlowError {
  constructor(
    code: ErrorCode,
    message?: string,
    locus?: Locus,
    severity: Severity = Severity.Info,
  ) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = message ? `${baseMessage}: ${message}` : baseMessage;
    super(fullMessage, code, locus, severity);
  }
}
