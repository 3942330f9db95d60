/**
 * Result type shared by every analysis pass
 *
 * A result either carries a value or reports failure; in both cases it
 * carries the messages (errors, warnings, info) produced along the way.
 */

import type { FlowError } from "./errors.js";

export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

/**
 * Messages grouped by severity
 */
export interface Messages<E extends FlowError = FlowError> {
  [Severity.Error]?: E[];
  [Severity.Warning]?: FlowError[];
  [Severity.Info]?: FlowError[];
}

export interface Success<T> {
  success: true;
  value: T;
  messages: Messages<never>;
}

export interface Failure<E extends FlowError = FlowError> {
  success: false;
  messages: Messages<E>;
}

export type Result<T, E extends FlowError = FlowError> =
  | Success<T>
  | Failure<E>;

export namespace Result {
  export function ok<T>(value: T): Success<T> {
    return { success: true, value, messages: {} };
  }

  /**
   * Successful result that also carries non-error messages
   */
  export function okWith<T>(
    value: T,
    messages: Omit<Messages, Severity.Error>,
  ): Success<T> {
    return { success: true, value, messages: compact<never>(messages) };
  }

  export function err<E extends FlowError>(
    errors: E | E[],
    messages: Omit<Messages, Severity.Error> = {},
  ): Failure<E> {
    return {
      success: false,
      messages: compact({
        ...messages,
        [Severity.Error]: Array.isArray(errors) ? errors : [errors],
      }),
    };
  }

  export function map<T, U, E extends FlowError>(
    result: Result<T, E>,
    fn: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: fn(result.value), messages: result.messages };
  }

  export function errors<E extends FlowError>(result: Result<unknown, E>): E[] {
    return result.success ? [] : (result.messages[Severity.Error] ?? []);
  }

  export function warnings(result: Result<unknown, FlowError>): FlowError[] {
    return result.messages[Severity.Warning] ?? [];
  }

  export function infos(result: Result<unknown, FlowError>): FlowError[] {
    return result.messages[Severity.Info] ?? [];
  }

  /**
   * All messages of a result, errors first
   */
  export function messages(result: Result<unknown, FlowError>): FlowError[] {
    return [...errors(result), ...warnings(result), ...infos(result)];
  }

  /**
   * Prepend the non-error messages of earlier results to `result`
   */
  export function merge<E extends FlowError>(
    earlier: Result<unknown, FlowError>[],
    result: Failure<E>,
  ): Failure<E>;
  export function merge<T, E extends FlowError>(
    earlier: Result<unknown, FlowError>[],
    result: Result<T, E>,
  ): Result<T, E>;
  export function merge<T, E extends FlowError>(
    earlier: Result<unknown, FlowError>[],
    result: Result<T, E>,
  ): Result<T, E> {
    const carried = {
      [Severity.Warning]: [
        ...earlier.flatMap(warnings),
        ...warnings(result),
      ],
      [Severity.Info]: [...earlier.flatMap(infos), ...infos(result)],
    };

    if (result.success) {
      return okWith(result.value, carried);
    }
    return err(errors(result), carried);
  }

  function compact<E extends FlowError>(messages: Messages<E>): Messages<E> {
    const compacted: Messages<E> = {};
    if (messages[Severity.Error]?.length) {
      compacted[Severity.Error] = messages[Severity.Error];
    }
    if (messages[Severity.Warning]?.length) {
      compacted[Severity.Warning] = messages[Severity.Warning];
    }
    if (messages[Severity.Info]?.length) {
      compacted[Severity.Info] = messages[Severity.Info];
    }
    return compacted;
  }
}
