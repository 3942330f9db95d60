/**
 * Fan-in graph construction errors and warnings
 */

import { FlowError, type Locus } from "../errors.js";
import { Severity } from "../result.js";

export enum ErrorCode {
  WIDTH_MISMATCH = "GRAPH001",
  UNSUPPORTED_CELL = "GRAPH002",
  MALFORMED_CELL = "GRAPH003",
  MULTIPLE_DRIVERS = "GRAPH101",
}

export const ErrorMessages = {
  [ErrorCode.WIDTH_MISMATCH]: "Connection width mismatch",
  [ErrorCode.UNSUPPORTED_CELL]: "Unsupported cell type",
  [ErrorCode.MALFORMED_CELL]: "Cell does not match its primitive contract",
  [ErrorCode.MULTIPLE_DRIVERS]: "Bit has multiple drivers",
};

export class Error extends FlowError {
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
