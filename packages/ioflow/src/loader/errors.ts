/**
 * Netlist loading errors
 */

import { FlowError, type Locus } from "../errors.js";
import {
  Error as NetlistError,
  ErrorCode as NetlistErrorCode,
} from "../netlist/errors.js";

export enum ErrorCode {
  PARSE_ERROR = "LOAD001",
  UNKNOWN_FORMAT = "LOAD002",
  INVALID_NETLIST = "LOAD003",
}

export const ErrorMessages = {
  [ErrorCode.PARSE_ERROR]: "Cannot parse netlist",
  [ErrorCode.UNKNOWN_FORMAT]: "Cannot tell the netlist format",
  [ErrorCode.INVALID_NETLIST]: "Invalid netlist",
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

  /**
   * Wrap an error thrown while building a module
   */
  static from(error: unknown, locus: Locus): Error {
    if (error instanceof Error) {
      const code =
        Object.values(ErrorCode).find((code) => code === error.code) ??
        ErrorCode.INVALID_NETLIST;
      return new Error(code, error.detail, { ...error.locus, ...locus });
    }
    if (error instanceof NetlistError) {
      const detail =
        error.code === NetlistErrorCode.INVALID_NETLIST
          ? error.detail
          : error.message;
      return new Error(ErrorCode.INVALID_NETLIST, detail, {
        ...error.locus,
        ...locus,
      });
    }
    if (error instanceof FlowError) {
      return new Error(ErrorCode.INVALID_NETLIST, error.message, {
        ...error.locus,
        ...locus,
      });
    }
    if (error instanceof globalThis.Error) {
      return new Error(ErrorCode.INVALID_NETLIST, error.message, locus);
    }
    return new Error(ErrorCode.INVALID_NETLIST, String(error), locus);
  }
}
