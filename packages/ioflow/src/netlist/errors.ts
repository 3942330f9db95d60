/**
 * Netlist construction errors
 */

import { FlowError, type Locus } from "../errors.js";

export enum ErrorCode {
  INVALID_NETLIST = "NETLIST001",
  SIGSPEC_SYNTAX = "NETLIST002",
  UNKNOWN_WIRE = "NETLIST003",
}

export const ErrorMessages = {
  [ErrorCode.INVALID_NETLIST]: "Invalid netlist",
  [ErrorCode.SIGSPEC_SYNTAX]: "Invalid signal expression",
  [ErrorCode.UNKNOWN_WIRE]: "Reference to undeclared wire",
};

export class Error extends FlowError {
  /** The message without its code's base text */
  public readonly detail?: string;

  constructor(code: ErrorCode, detail?: string, locus?: Locus) {
    const baseMessage = ErrorMessages[code];
    const fullMessage = detail ? `${baseMessage}: ${detail}` : baseMessage;
    super(fullMessage, code, locus);
    this.detail = detail;
  }
}
